import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { dialogHeight, type DialogContent } from './dialogText.js';
import { dimensionOr } from '../../utils/layoutCalculations.js';

const MAX_WIDTH = 64;

/**
 * Centered bordered box used for the confirm, new-stash and message dialogs.
 * Display only: keys are handled by the input dispatcher, not by the box.
 */
export class DialogBox {
  private box: Widgets.BoxElement;
  private screen: Widgets.Screen;

  constructor(screen: Widgets.Screen, content: DialogContent) {
    this.screen = screen;

    this.box = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width: this.calculateWidth(),
      height: 3,
      align: 'center',
      scrollable: true,
      border: {
        type: 'line',
      },
      style: {
        border: {
          fg: content.borderColor,
        },
      },
      tags: true,
    });

    this.update(content);
  }

  private calculateWidth(): number {
    const screenWidth = dimensionOr(this.screen.width, 80);
    return Math.max(20, Math.min(MAX_WIDTH, screenWidth - 6));
  }

  update(content: DialogContent): void {
    const width = this.calculateWidth();
    this.box.width = width;
    this.box.height = dialogHeight(content, width - 2, dimensionOr(this.screen.height, 24));
    this.box.style.border.fg = content.borderColor;
    this.box.setLabel(` ${content.title} `);
    this.box.setContent(content.lines.join('\n'));
    this.box.setFront();
  }

  destroy(): void {
    this.box.destroy();
  }
}
