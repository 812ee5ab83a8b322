import type { KeyEvent, SpecialKey } from '../types/keys.js';
import { DEFAULT_PAGE_SIZE, type AppState } from '../state/AppState.js';
import {
  ConfirmAction,
  ContentKind,
  NORMAL_MODE,
  assertNever,
  confirmMode,
  contentMode,
  errorMode,
  messageMode,
} from '../state/Mode.js';
import { StashGateway, describeError } from './StashGateway.js';
import * as logger from '../utils/logger.js';

export interface DispatchResult {
  quit: boolean;
}

export interface DispatchOptions {
  /** Lines moved by PageUp / PageDown in content view. */
  pageSize: number;
}

const CONTINUE: DispatchResult = { quit: false };
const QUIT: DispatchResult = { quit: true };

const DEFAULT_OPTIONS: DispatchOptions = { pageSize: DEFAULT_PAGE_SIZE };

const CONFIRM_OPERATIONS: Record<
  ConfirmAction,
  { run: (gateway: StashGateway, name: string) => Promise<void>; success: string }
> = {
  apply: { run: (g, name) => g.apply(name), success: 'Stash applied successfully.' },
  pop: { run: (g, name) => g.pop(name), success: 'Stash popped successfully.' },
  drop: { run: (g, name) => g.drop(name), success: 'Stash dropped.' },
};

function isChar(key: KeyEvent, ...chars: string[]): boolean {
  return key.type === 'char' && chars.includes(key.char);
}

function isKey(key: KeyEvent, ...names: SpecialKey[]): boolean {
  return key.type === 'special' && names.includes(key.key);
}

/**
 * Surface a failed gateway call. Nothing but the mode changes.
 */
function showError(state: AppState, err: unknown): void {
  const description = describeError(err);
  logger.debug(`gateway error: ${description}`);
  state.setMode(errorMode(description));
}

/**
 * Run a gateway mutation, then reload. Whatever happens ends in message mode.
 */
async function runMutation(
  state: AppState,
  mutate: () => Promise<void>,
  success: string
): Promise<void> {
  try {
    await mutate();
  } catch (err) {
    showError(state, err);
    return;
  }

  try {
    await state.reload();
  } catch (err) {
    showError(state, err);
    return;
  }

  state.setStatusMessage(success);
  state.setMode(messageMode(success));
}

async function openContent(state: AppState, view: ContentKind): Promise<void> {
  if (!state.selectedRecord()) return;
  try {
    await state.loadContent(view);
    state.setMode(contentMode(view));
  } catch (err) {
    showError(state, err);
  }
}

function handleSearchInput(state: AppState, key: KeyEvent): DispatchResult {
  if (isKey(key, 'escape')) {
    state.cancelSearch();
  } else if (isKey(key, 'enter')) {
    state.commitSearch();
  } else if (isKey(key, 'backspace')) {
    state.backspaceSearch();
  } else if (key.type === 'char') {
    state.appendSearch(key.char);
  }
  return CONTINUE;
}

async function handleNormal(state: AppState, key: KeyEvent): Promise<DispatchResult> {
  if (state.state.isSearching) {
    return handleSearchInput(state, key);
  }

  if (isChar(key, 'q') || isKey(key, 'escape')) {
    return QUIT;
  }

  if (isChar(key, 'k') || isKey(key, 'up')) {
    state.moveSelection(-1);
  } else if (isChar(key, 'j') || isKey(key, 'down')) {
    state.moveSelection(1);
  } else if (isChar(key, 'd') || isKey(key, 'enter')) {
    await openContent(state, 'diff');
  } else if (isChar(key, 'f')) {
    await openContent(state, 'files');
  } else if (isChar(key, 'a')) {
    if (state.selectedRecord()) state.setMode(confirmMode('apply'));
  } else if (isChar(key, 'p')) {
    if (state.selectedRecord()) state.setMode(confirmMode('pop'));
  } else if (isChar(key, 'x') || isKey(key, 'delete')) {
    if (state.selectedRecord()) state.setMode(confirmMode('drop'));
  } else if (isChar(key, 'n')) {
    state.resetNewStashForm();
    state.setMode({ kind: 'newStash' });
  } else if (isChar(key, '/')) {
    state.startSearch();
  } else if (isChar(key, 'c')) {
    state.clearSearch();
  } else if (isChar(key, 'r')) {
    try {
      await state.reload();
    } catch (err) {
      showError(state, err);
    }
  }

  return CONTINUE;
}

function handleContent(state: AppState, key: KeyEvent, pageSize: number): DispatchResult {
  if (isChar(key, 'q') || isKey(key, 'escape')) {
    state.setMode(NORMAL_MODE);
  } else if (isChar(key, 'k') || isKey(key, 'up')) {
    state.scrollContent(-1);
  } else if (isChar(key, 'j') || isKey(key, 'down')) {
    state.scrollContent(1);
  } else if (isKey(key, 'pageup')) {
    state.scrollContent(-pageSize);
  } else if (isKey(key, 'pagedown')) {
    state.scrollContent(pageSize);
  } else if (isChar(key, 'g') || isKey(key, 'home')) {
    state.scrollContentToTop();
  } else if (isChar(key, 'G') || isKey(key, 'end')) {
    state.scrollContentToBottom();
  }
  return CONTINUE;
}

async function handleConfirm(
  state: AppState,
  key: KeyEvent,
  action: ConfirmAction
): Promise<DispatchResult> {
  if (isChar(key, 'y') || isKey(key, 'enter')) {
    const record = state.selectedRecord();
    if (!record) return CONTINUE;
    const { run, success } = CONFIRM_OPERATIONS[action];
    logger.debug(`${action} ${record.name}`);
    await runMutation(state, () => run(state.gateway, record.name), success);
  } else if (isChar(key, 'n') || isKey(key, 'escape')) {
    state.setMode(NORMAL_MODE);
  }
  return CONTINUE;
}

async function handleNewStash(state: AppState, key: KeyEvent): Promise<DispatchResult> {
  const { newStashText, newStashIncludeUntracked } = state.state;

  if (isKey(key, 'escape')) {
    state.setMode(NORMAL_MODE);
  } else if (isKey(key, 'enter')) {
    const message = newStashText.trim();
    if (message) {
      logger.debug(`create stash "${message}" untracked=${newStashIncludeUntracked}`);
      await runMutation(
        state,
        () => state.gateway.create(message, newStashIncludeUntracked),
        `Stash '${message}' created.`
      );
    }
  } else if (isKey(key, 'backspace')) {
    state.backspaceNewStashText();
  } else if (isKey(key, 'tab')) {
    state.toggleIncludeUntracked();
  } else if (isChar(key, 'u') && newStashText === '') {
    // Shortcut only while nothing has been typed; afterwards 'u' is text
    state.toggleIncludeUntracked();
  } else if (key.type === 'char') {
    state.appendNewStashText(key.char);
  }
  return CONTINUE;
}

/**
 * Apply one key event to the state according to the current mode.
 * Resolves once every gateway call the key triggered has finished.
 */
export async function dispatchKey(
  state: AppState,
  key: KeyEvent,
  options: DispatchOptions = DEFAULT_OPTIONS
): Promise<DispatchResult> {
  if (key.type === 'interrupt') {
    return QUIT;
  }

  const mode = state.state.mode;
  switch (mode.kind) {
    case 'normal':
      return handleNormal(state, key);
    case 'content':
      return handleContent(state, key, options.pageSize);
    case 'confirm':
      return handleConfirm(state, key, mode.action);
    case 'newStash':
      return handleNewStash(state, key);
    case 'message':
      // Any key dismisses the message
      state.setMode(NORMAL_MODE);
      return CONTINUE;
    default:
      return assertNever(mode);
  }
}
