import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import stringWidth from 'string-width';
import { calculateLayout, dimensionOr, type LayoutDimensions } from '../utils/layoutCalculations.js';
import { escapeTags, truncateToWidth } from '../utils/text.js';

/**
 * LayoutManager creates and manages the blessed boxes of the single-pane layout:
 * header, title bar, main pane, bottom separator and footer.
 */
export class LayoutManager {
  public screen: Widgets.Screen;
  public headerBox: Widgets.BoxElement;
  public titleBar: Widgets.BoxElement;
  public mainPane: Widgets.BoxElement;
  public bottomSeparator: Widgets.BoxElement;
  public footerBox: Widgets.BoxElement;

  private _dimensions: LayoutDimensions;

  constructor(screen: Widgets.Screen) {
    this.screen = screen;
    this._dimensions = this.calculateDimensions();

    this.headerBox = this.createHeaderBox();
    this.titleBar = this.createSeparator(this._dimensions.headerHeight, true);
    this.mainPane = this.createMainPane();
    this.bottomSeparator = this.createSeparator(
      this._dimensions.mainPaneTop + this._dimensions.mainPaneHeight,
      false
    );
    this.footerBox = this.createFooterBox();

    screen.on('resize', () => this.updateLayout());
  }

  get dimensions(): LayoutDimensions {
    return this._dimensions;
  }

  private calculateDimensions(): LayoutDimensions {
    const height = dimensionOr(this.screen.height, 24);
    const width = dimensionOr(this.screen.width, 80);
    return calculateLayout(height, width);
  }

  private createHeaderBox(): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: this._dimensions.headerHeight,
      tags: true,
    });
  }

  private createSeparator(top: number, tags: boolean): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top,
      left: 0,
      width: '100%',
      height: 1,
      tags,
      content: '─'.repeat(this._dimensions.width),
      style: {
        fg: 'gray',
      },
    });
  }

  private createMainPane(): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top: this._dimensions.mainPaneTop,
      left: 0,
      width: '100%',
      height: this._dimensions.mainPaneHeight,
      tags: true,
    });
  }

  private createFooterBox(): Widgets.BoxElement {
    return blessed.box({
      parent: this.screen,
      top: this._dimensions.footerRow,
      left: 0,
      width: '100%',
      height: 1,
      tags: true,
    });
  }

  /**
   * Title bar: a separator line with the pane title set into it.
   */
  setTitle(title: string): void {
    const width = this._dimensions.width;
    const prefix = '── ';
    const shown = truncateToWidth(title, Math.max(0, width - prefix.length - 1));
    const rest = Math.max(0, width - prefix.length - stringWidth(shown) - 1);
    this.titleBar.setContent(
      `{gray-fg}${prefix}{/gray-fg}{bold}${escapeTags(shown)}{/bold}{gray-fg} ${'─'.repeat(rest)}{/gray-fg}`
    );
  }

  private updateLayout(): void {
    this._dimensions = this.calculateDimensions();
    const { width, headerHeight, mainPaneTop, mainPaneHeight, footerRow } = this._dimensions;

    this.headerBox.height = headerHeight;
    this.titleBar.top = headerHeight;
    this.mainPane.top = mainPaneTop;
    this.mainPane.height = mainPaneHeight;
    this.bottomSeparator.top = mainPaneTop + mainPaneHeight;
    this.bottomSeparator.setContent('─'.repeat(width));
    this.footerBox.top = footerRow;
  }
}
