import type { StashRecord } from '../../git/stash.js';
import type { ContentKind } from '../../state/Mode.js';
import type { Theme } from '../../themes.js';
import { escapeTags, truncateToWidth } from '../../utils/text.js';

export type DiffLineType = 'added' | 'removed' | 'hunk' | 'fileHeader' | 'context';

export const EMPTY_CONTENT_TEXT = '(no changes)';

export function classifyDiffLine(line: string): DiffLineType {
  if (line.startsWith('+++') || line.startsWith('---')) return 'fileHeader';
  if (line.startsWith('+')) return 'added';
  if (line.startsWith('-')) return 'removed';
  if (line.startsWith('@@')) return 'hunk';
  if (line.startsWith('diff ') || line.startsWith('index ')) return 'fileHeader';
  return 'context';
}

function colorFor(type: DiffLineType, theme: Theme): string {
  switch (type) {
    case 'added':
      return theme.colors.added;
    case 'removed':
      return theme.colors.removed;
    case 'hunk':
      return theme.colors.hunk;
    case 'fileHeader':
      return theme.colors.fileHeader;
    case 'context':
      return theme.colors.dim;
  }
}

export function formatContentLine(line: string, theme: Theme, width: number): string {
  const type = classifyDiffLine(line);
  const color = colorFor(type, theme);
  const text = escapeTags(truncateToWidth(line.replace(/\t/g, '    '), width));
  if (type === 'fileHeader') {
    return `{bold}{${color}-fg}${text}{/${color}-fg}{/bold}`;
  }
  return `{${color}-fg}${text}{/${color}-fg}`;
}

/**
 * Title bar text, e.g. "Diff  stash@{0} - fix login".
 */
export function formatContentTitle(kind: ContentKind, record: StashRecord | null): string {
  const label = kind === 'files' ? 'Files' : 'Diff';
  if (!record) return label;
  return `${label}  ${record.name} - ${record.shortMessage}`;
}

/**
 * Format the visible slice of the content buffer starting at `scroll`.
 */
export function formatContentView(
  lines: readonly string[],
  scroll: number,
  height: number,
  theme: Theme,
  width: number
): string {
  if (lines.length === 0) {
    return `{${theme.colors.dim}-fg}${EMPTY_CONTENT_TEXT}{/${theme.colors.dim}-fg}`;
  }
  return lines
    .slice(scroll, scroll + height)
    .map((line) => formatContentLine(line, theme, width))
    .join('\n');
}
