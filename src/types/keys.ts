/**
 * Shared key event type.
 * Lives in types/ so both the blessed bindings and core/ can import it.
 */

export type SpecialKey =
  | 'up'
  | 'down'
  | 'pageup'
  | 'pagedown'
  | 'home'
  | 'end'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'delete'
  | 'tab';

export type KeyEvent =
  | { type: 'special'; key: SpecialKey }
  | { type: 'char'; char: string }
  | { type: 'interrupt' } // Ctrl+C
  // Any other named key or chord (left, f1, C-x); only dismisses messages
  | { type: 'other'; name: string };
