import type { Widgets } from 'blessed';
import type { AppState } from './state/AppState.js';
import type { Theme } from './themes.js';
import { DialogBox } from './ui/modals/DialogBox.js';
import { dialogContentForMode } from './ui/modals/dialogText.js';

/**
 * Read-only context provided by App for modal management.
 */
export interface ModalContext {
  screen: Widgets.Screen;
  appState: AppState;
  getTheme(): Theme;
}

/**
 * Keeps the dialog overlay in step with the current mode: creates it when a
 * dialog mode is entered, refreshes it while the mode lasts, destroys it on exit.
 */
export class ModalController {
  private activeDialog: DialogBox | null = null;

  constructor(private ctx: ModalContext) {}

  /**
   * Called on every render.
   */
  sync(): void {
    const content = dialogContentForMode(
      this.ctx.appState.state,
      this.ctx.appState.selectedRecord(),
      this.ctx.getTheme()
    );

    if (!content) {
      this.close();
      return;
    }

    if (this.activeDialog) {
      this.activeDialog.update(content);
    } else {
      this.activeDialog = new DialogBox(this.ctx.screen, content);
    }
  }

  close(): void {
    if (this.activeDialog) {
      this.activeDialog.destroy();
      this.activeDialog = null;
    }
  }
}
