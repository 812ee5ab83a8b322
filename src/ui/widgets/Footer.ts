import type { AppStateData } from '../../state/AppState.js';
import type { Mode } from '../../state/Mode.js';
import type { Theme } from '../../themes.js';
import { escapeTags, textWidth, truncateToWidth, visibleLength } from '../../utils/text.js';

export interface KeyHint {
  key: string;
  label: string;
}

const NORMAL_HINTS: KeyHint[] = [
  { key: '↑↓/jk', label: 'navigate' },
  { key: 'Enter/d', label: 'diff' },
  { key: 'f', label: 'files' },
  { key: 'a', label: 'apply' },
  { key: 'p', label: 'pop' },
  { key: 'x', label: 'drop' },
  { key: 'n', label: 'new' },
  { key: '/', label: 'search' },
  { key: 'r', label: 'reload' },
  { key: 'q', label: 'quit' },
];

const SEARCH_HINTS: KeyHint[] = [
  { key: 'Enter', label: 'confirm' },
  { key: 'Esc', label: 'cancel search' },
];

const CONTENT_HINTS: KeyHint[] = [
  { key: '↑↓/jk', label: 'scroll' },
  { key: 'PgUp/PgDn', label: 'fast scroll' },
  { key: 'g/G', label: 'top/bottom' },
  { key: 'Esc/q', label: 'back' },
];

const CONFIRM_HINTS: KeyHint[] = [
  { key: 'y', label: 'yes' },
  { key: 'n', label: 'no' },
];

const NEW_STASH_HINTS: KeyHint[] = [
  { key: 'Enter', label: 'save' },
  { key: 'Tab', label: 'untracked' },
  { key: 'Esc', label: 'cancel' },
];

const MESSAGE_HINTS: KeyHint[] = [{ key: 'any key', label: 'continue' }];

export function getKeyHints(mode: Mode, isSearching: boolean): KeyHint[] {
  switch (mode.kind) {
    case 'normal':
      return isSearching ? SEARCH_HINTS : NORMAL_HINTS;
    case 'content':
      return CONTENT_HINTS;
    case 'confirm':
      return CONFIRM_HINTS;
    case 'newStash':
      return NEW_STASH_HINTS;
    case 'message':
      return MESSAGE_HINTS;
  }
}

/**
 * "line N/M" position indicator for the content view (M is at least 1).
 */
export function formatScrollPosition(contentScroll: number, lineCount: number): string {
  return `line ${contentScroll + 1}/${Math.max(1, lineCount)}`;
}

/**
 * Format footer content as blessed-compatible tagged string.
 */
export function formatFooter(
  state: Pick<
    AppStateData,
    'mode' | 'isSearching' | 'statusMessage' | 'contentScroll' | 'contentBuffer'
  >,
  theme: Theme,
  width: number
): string {
  const { colors } = theme;

  const leftContent = getKeyHints(state.mode, state.isSearching)
    .map(
      ({ key, label }) =>
        `{bold}{${colors.brand}-fg}[${key}]{/${colors.brand}-fg}{/bold}{${colors.dim}-fg} ${label}{/${colors.dim}-fg}`
    )
    .join('  ');

  let rightText = '';
  if (state.mode.kind === 'content') {
    rightText = formatScrollPosition(state.contentScroll, state.contentBuffer.length);
  } else if (state.statusMessage) {
    rightText = state.statusMessage;
  }
  if (!rightText) return leftContent;

  const room = width - visibleLength(leftContent) - 2;
  if (room < 4) return leftContent;
  const right = truncateToWidth(rightText, room);
  const padding = Math.max(1, width - visibleLength(leftContent) - textWidth(right) - 1);
  return `${leftContent}${' '.repeat(padding)}{${colors.dim}-fg}${escapeTags(right)}{/${colors.dim}-fg}`;
}
