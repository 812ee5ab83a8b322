export type ContentKind = 'diff' | 'files';

export type ConfirmAction = 'apply' | 'pop' | 'drop';

/**
 * Which view is active. The single source of truth for the sub-view shown.
 */
export type Mode =
  | { kind: 'normal' }
  | { kind: 'content'; view: ContentKind }
  | { kind: 'confirm'; action: ConfirmAction }
  | { kind: 'newStash' }
  | { kind: 'message'; text: string };

export const NORMAL_MODE: Mode = { kind: 'normal' };

export function contentMode(view: ContentKind): Mode {
  return { kind: 'content', view };
}

export function confirmMode(action: ConfirmAction): Mode {
  return { kind: 'confirm', action };
}

export function messageMode(text: string): Mode {
  return { kind: 'message', text };
}

export function errorMode(description: string): Mode {
  return messageMode(`Error: ${description}`);
}

export function isErrorMessage(text: string): boolean {
  return text.startsWith('Error');
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled mode: ${JSON.stringify(value)}`);
}
