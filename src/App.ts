import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { LayoutManager } from './ui/Layout.js';
import { setupKeyBindings } from './KeyBindings.js';
import { ModalController } from './ModalController.js';
import { formatHeader } from './ui/widgets/Header.js';
import { formatFooter } from './ui/widgets/Footer.js';
import { formatListTitle, formatStashList } from './ui/widgets/StashList.js';
import { formatContentTitle, formatContentView } from './ui/widgets/ContentView.js';
import { AppState } from './state/AppState.js';
import { errorMode } from './state/Mode.js';
import { OperationQueue } from './core/OperationQueue.js';
import { dispatchKey } from './core/InputDispatcher.js';
import { GitStashGateway, describeError, type StashGateway } from './core/StashGateway.js';
import { clampScrollOffset, scrollToKeepVisible } from './utils/layoutCalculations.js';
import { getTheme, type Theme } from './themes.js';
import type { Config } from './config.js';
import type { KeyEvent } from './types/keys.js';
import * as logger from './utils/logger.js';

export interface AppOptions {
  config: Config;
  repoPath: string;
  gateway?: StashGateway;
}

/**
 * Main application controller.
 * Owns the blessed screen and feeds key events through the operation queue
 * into the dispatcher; renders whenever the state changes.
 */
export class App {
  private screen: Widgets.Screen;
  private layout: LayoutManager;
  private appState: AppState;
  private queue: OperationQueue;
  private modals: ModalController;
  private config: Config;
  private theme: Theme;
  private repoPath: string;

  // Presentation-only: first visible row of the stash list
  private listScrollOffset = 0;
  private exiting = false;

  constructor(options: AppOptions) {
    this.config = options.config;
    this.repoPath = options.repoPath;
    this.theme = getTheme(options.config.theme);

    this.appState = new AppState(options.gateway ?? new GitStashGateway(this.repoPath));
    this.queue = new OperationQueue();
    this.queue.on('busy-change', (busy) => this.appState.setBusy(busy));

    this.screen = blessed.screen({
      smartCSR: true,
      fullUnicode: true,
      title: 'stashdeck',
      terminal: 'xterm-256color',
    });

    this.layout = new LayoutManager(this.screen);

    this.modals = new ModalController({
      screen: this.screen,
      appState: this.appState,
      getTheme: () => this.theme,
    });

    // Wait a tick so the layout has picked up the new size first
    this.screen.on('resize', () => {
      setImmediate(() => this.render());
    });

    this.appState.on('change', () => this.render());

    setupKeyBindings(this.screen, (key) => this.handleKey(key));

    this.render();
    this.loadInitial();
  }

  private loadInitial(): void {
    this.queue
      .enqueue(() => this.appState.reload())
      .catch((err: unknown) => {
        logger.error('Initial stash load failed', err);
        this.appState.setMode(errorMode(describeError(err)));
      });
  }

  private handleKey(key: KeyEvent): void {
    if (this.exiting) return;
    this.queue
      .enqueue(() => dispatchKey(this.appState, key, { pageSize: this.config.pageSize }))
      .then((result) => {
        if (result.quit) {
          this.exit();
        }
      })
      .catch((err: unknown) => {
        logger.error('Key handling failed', err);
      });
  }

  private render(): void {
    if (this.exiting) return;
    this.updateHeader();
    this.updateMainPane();
    this.updateFooter();
    this.modals.sync();
    this.screen.render();
  }

  private updateHeader(): void {
    const width = this.layout.dimensions.width;
    this.layout.headerBox.setContent(
      formatHeader(this.appState.state, this.repoPath, this.theme, width)
    );
  }

  private updateMainPane(): void {
    const { mainPaneHeight, width } = this.layout.dimensions;
    const state = this.appState.state;

    if (state.mode.kind === 'content') {
      this.layout.setTitle(formatContentTitle(state.mode.view, this.appState.selectedRecord()));
      this.layout.mainPane.setContent(
        formatContentView(state.contentBuffer, state.contentScroll, mainPaneHeight, this.theme, width)
      );
      return;
    }

    const records = this.appState.filteredView();
    this.listScrollOffset = clampScrollOffset(
      scrollToKeepVisible(state.selected, this.listScrollOffset, mainPaneHeight),
      records.length,
      mainPaneHeight
    );

    this.layout.setTitle(formatListTitle({ records, selected: state.selected }));
    this.layout.mainPane.setContent(
      formatStashList(
        {
          records,
          selected: state.selected,
          totalCount: state.stashes.length,
          scrollOffset: this.listScrollOffset,
          height: mainPaneHeight,
          width,
        },
        this.theme
      )
    );
  }

  private updateFooter(): void {
    const width = this.layout.dimensions.width;
    this.layout.footerBox.setContent(formatFooter(this.appState.state, this.theme, width));
  }

  exit(): void {
    if (this.exiting) return;
    this.exiting = true;
    this.modals.close();
    // Destroy screen (this will clean up terminal)
    this.screen.destroy();
  }

  /**
   * Resolves once the screen has been destroyed.
   */
  start(): Promise<void> {
    return new Promise((resolve) => {
      this.screen.on('destroy', () => {
        resolve();
      });
    });
  }
}
