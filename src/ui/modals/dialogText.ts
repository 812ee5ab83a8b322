import type { StashRecord } from '../../git/stash.js';
import type { AppStateData } from '../../state/AppState.js';
import { ConfirmAction, isErrorMessage } from '../../state/Mode.js';
import type { Theme, UIColors } from '../../themes.js';
import { escapeTags, visibleLength } from '../../utils/text.js';

export interface DialogContent {
  title: string;
  borderColor: string;
  lines: string[];
}

const CONFIRM_TEXT: Record<
  ConfirmAction,
  { title: string; body: string; color: keyof Pick<UIColors, 'success' | 'warning' | 'danger'> }
> = {
  apply: {
    title: 'Apply Stash',
    body: 'Apply this stash? (it stays in the stash list)',
    color: 'success',
  },
  pop: {
    title: 'Pop Stash',
    body: 'Apply and remove this stash from the list?',
    color: 'warning',
  },
  drop: {
    title: 'Drop Stash',
    body: 'Permanently delete this stash? This cannot be undone.',
    color: 'danger',
  },
};

export function confirmDialogContent(
  action: ConfirmAction,
  record: StashRecord | null,
  theme: Theme
): DialogContent {
  const { colors } = theme;
  const text = CONFIRM_TEXT[action];
  const lines = [''];
  if (record) {
    lines.push(
      `{${colors.index}-fg}${escapeTags(record.name)}{/${colors.index}-fg}  ${escapeTags(record.shortMessage)}`
    );
    lines.push('');
  }
  lines.push(`{${colors.text}-fg}${text.body}{/${colors.text}-fg}`);
  lines.push('');
  lines.push(
    `{bold}{${colors.success}-fg}[y] Yes{/${colors.success}-fg}{/bold}    {${colors.danger}-fg}[n] No{/${colors.danger}-fg}`
  );
  return { title: text.title, borderColor: colors[text.color], lines };
}

export function untrackedLabel(includeUntracked: boolean): string {
  return includeUntracked ? '[Tab] Include untracked: ON ' : '[Tab] Include untracked: off';
}

export function newStashDialogContent(
  text: string,
  includeUntracked: boolean,
  theme: Theme
): DialogContent {
  const { colors } = theme;
  const toggleColor = includeUntracked ? colors.success : colors.dim;
  return {
    title: 'New Stash',
    borderColor: colors.brand,
    lines: [
      '',
      `{${colors.dim}-fg}Stash message:{/${colors.dim}-fg}`,
      `{bold}{${colors.text}-fg}${escapeTags(text)}_{/${colors.text}-fg}{/bold}`,
      '',
      `{${toggleColor}-fg}${untrackedLabel(includeUntracked)}{/${toggleColor}-fg}`,
      '',
      `{${colors.brand}-fg}[Enter]{/${colors.brand}-fg} save   {${colors.danger}-fg}[Esc]{/${colors.danger}-fg} cancel`,
    ],
  };
}

export function messageDialogContent(text: string, theme: Theme): DialogContent {
  const { colors } = theme;
  const isError = isErrorMessage(text);
  return {
    title: isError ? 'Error' : 'Done',
    borderColor: isError ? colors.danger : colors.success,
    lines: [
      '',
      ...text
        .split(/\r?\n/)
        .map(
          (line) =>
            `{${colors.text}-fg}${escapeTags(line.replace(/\t/g, '    '))}{/${colors.text}-fg}`
        ),
      '',
      `{${colors.dim}-fg}Press any key to continue{/${colors.dim}-fg}`,
    ],
  };
}

/**
 * Outer box height: every line wrapped at `innerWidth`, plus the border,
 * never taller than `maxHeight`.
 */
export function dialogHeight(content: DialogContent, innerWidth: number, maxHeight: number): number {
  const width = Math.max(1, innerWidth);
  const rows = content.lines.reduce(
    (sum, line) => sum + Math.max(1, Math.ceil(visibleLength(line) / width)),
    0
  );
  return Math.max(3, Math.min(rows + 2, maxHeight));
}

/**
 * Dialog to show over the list for the current mode, or null when none.
 */
export function dialogContentForMode(
  state: Pick<AppStateData, 'mode' | 'newStashText' | 'newStashIncludeUntracked'>,
  record: StashRecord | null,
  theme: Theme
): DialogContent | null {
  const { mode } = state;
  switch (mode.kind) {
    case 'confirm':
      return confirmDialogContent(mode.action, record, theme);
    case 'newStash':
      return newStashDialogContent(state.newStashText, state.newStashIncludeUntracked, theme);
    case 'message':
      return messageDialogContent(mode.text, theme);
    case 'normal':
    case 'content':
      return null;
  }
}
