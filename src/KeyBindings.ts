import type { Widgets } from 'blessed';
import type { KeyEvent, SpecialKey } from './types/keys.js';

/**
 * The subset of blessed's key descriptor the normalizer reads.
 */
export interface RawKey {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  full?: string;
}

const SPECIAL_KEYS: Record<string, SpecialKey> = {
  up: 'up',
  down: 'down',
  pageup: 'pageup',
  pagedown: 'pagedown',
  home: 'home',
  end: 'end',
  enter: 'enter',
  escape: 'escape',
  backspace: 'backspace',
  delete: 'delete',
  tab: 'tab',
};

function isPrintable(ch: string): boolean {
  const codePoints = [...ch];
  if (codePoints.length !== 1) return false;
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Translate a blessed keypress into the dispatcher's key event, or null when
 * blessed reports nothing usable.
 */
export function normalizeKey(ch: string | undefined, key: RawKey | undefined): KeyEvent | null {
  const name = key?.name;

  if (key?.ctrl && name === 'c') {
    return { type: 'interrupt' };
  }

  // blessed reports Enter twice, as 'return' and then 'enter'
  if (name === 'return') {
    return null;
  }

  if (name && Object.hasOwn(SPECIAL_KEYS, name)) {
    return { type: 'special', key: SPECIAL_KEYS[name] };
  }

  if (key?.ctrl || key?.meta) {
    return { type: 'other', name: key.full ?? name ?? '' };
  }

  if (ch !== undefined && isPrintable(ch)) {
    return { type: 'char', char: ch };
  }

  if (name) {
    return { type: 'other', name };
  }

  return null;
}

/**
 * Route every keypress on the screen through `onKey`.
 */
export function setupKeyBindings(screen: Widgets.Screen, onKey: (key: KeyEvent) => void): void {
  screen.on('keypress', (ch: string | undefined, key: RawKey | undefined) => {
    const event = normalizeKey(ch, key);
    if (event) {
      onKey(event);
    }
  });
}
