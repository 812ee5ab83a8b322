import type { StashRecord } from '../../git/stash.js';
import type { Theme } from '../../themes.js';
import { escapeTags, fitToWidth } from '../../utils/text.js';

export const EMPTY_LIST_TEXT = "No stashes found. Press 'n' to create one.";
export const NO_MATCHES_TEXT = 'No stashes match your search.';

const INDEX_WIDTH = 3;
const BRANCH_WIDTH = 20;
const MESSAGE_WIDTH = 35;
const SELECTED_MARKER = '▶ ';

export interface StashListView {
  records: readonly StashRecord[];
  selected: number;
  totalCount: number; // size of the unfiltered collection
  scrollOffset: number;
  height: number;
  width: number;
}

/**
 * Title for the list pane, e.g. "Stashes (2/7)".
 */
export function formatListTitle(view: Pick<StashListView, 'records' | 'selected'>): string {
  if (view.records.length === 0) return 'Stashes';
  return `Stashes (${view.selected + 1}/${view.records.length})`;
}

/**
 * One row: index, branch, short message, date. Columns are fixed width;
 * the message column shrinks on narrow terminals.
 */
export function formatStashRow(
  record: StashRecord,
  isSelected: boolean,
  theme: Theme,
  width: number
): string {
  const { colors } = theme;
  const marker = isSelected ? SELECTED_MARKER : '  ';
  const fixed = marker.length + INDEX_WIDTH + 1 + BRANCH_WIDTH + 1 + 1;
  const messageWidth = Math.max(10, Math.min(MESSAGE_WIDTH, width - fixed - record.date.length));

  const index = fitToWidth(String(record.index), INDEX_WIDTH);
  const branch = fitToWidth(record.branch, BRANCH_WIDTH);
  const message = fitToWidth(record.shortMessage, messageWidth);

  const messageStyled = isSelected
    ? `{bold}{${colors.text}-fg}${escapeTags(message)}{/${colors.text}-fg}{/bold}`
    : `{${colors.dim}-fg}${escapeTags(message)}{/${colors.dim}-fg}`;

  const row =
    `${marker}{${colors.index}-fg}${index}{/${colors.index}-fg} ` +
    `{${colors.branch}-fg}${escapeTags(branch)}{/${colors.branch}-fg} ` +
    `${messageStyled} ` +
    `{${colors.date}-fg}${escapeTags(record.date)}{/${colors.date}-fg}`;

  if (isSelected) {
    return `{${colors.selectedBg}-bg}${row}{/${colors.selectedBg}-bg}`;
  }
  return row;
}

/**
 * Format the visible window of the (filtered) stash list.
 */
export function formatStashList(view: StashListView, theme: Theme): string {
  const { colors } = theme;

  if (view.records.length === 0) {
    const text = view.totalCount === 0 ? EMPTY_LIST_TEXT : NO_MATCHES_TEXT;
    return `{center}{${colors.dim}-fg}${text}{/${colors.dim}-fg}{/center}`;
  }

  const lines: string[] = [];
  const end = Math.min(view.records.length, view.scrollOffset + view.height);
  for (let i = view.scrollOffset; i < end; i++) {
    lines.push(formatStashRow(view.records[i], i === view.selected, theme, view.width));
  }
  return lines.join('\n');
}
