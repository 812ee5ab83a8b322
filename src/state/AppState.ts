import { EventEmitter } from 'node:events';
import type { StashGateway, StashRecord } from '../core/StashGateway.js';
import { ContentKind, Mode, NORMAL_MODE } from './Mode.js';

export const DEFAULT_PAGE_SIZE = 20;

export interface AppStateData {
  stashes: readonly StashRecord[];
  selected: number; // index into filteredView()
  mode: Mode;

  // Diff / file-stat lines for content mode
  contentBuffer: readonly string[];
  contentScroll: number;

  // Search
  searchQuery: string;
  isSearching: boolean;

  // New stash form
  newStashText: string;
  newStashIncludeUntracked: boolean;

  statusMessage: string | null;
  currentBranch: string;
  busy: boolean;
}

type AppStateEventMap = {
  change: [AppStateData];
};

const DEFAULT_STATE: AppStateData = {
  stashes: [],
  selected: 0,
  mode: NORMAL_MODE,
  contentBuffer: [],
  contentScroll: 0,
  searchQuery: '',
  isSearching: false,
  newStashText: '',
  newStashIncludeUntracked: false,
  statusMessage: null,
  currentBranch: '',
  busy: false,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// Drop the trailing empty line left by output ending in a newline
function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function filterStashes(
  stashes: readonly StashRecord[],
  query: string
): readonly StashRecord[] {
  if (query === '') return stashes;
  const q = query.toLowerCase();
  return stashes.filter(
    (s) => s.shortMessage.toLowerCase().includes(q) || s.branch.toLowerCase().includes(q)
  );
}

/**
 * The single application state object. Created once per process and mutated
 * only by the input dispatcher; emits 'change' after every mutation.
 */
export class AppState extends EventEmitter<AppStateEventMap> {
  private _state: AppStateData;
  readonly gateway: StashGateway;

  constructor(gateway: StashGateway, initialState: Partial<AppStateData> = {}) {
    super();
    this.gateway = gateway;
    this._state = { ...DEFAULT_STATE, ...initialState };
  }

  get state(): AppStateData {
    return this._state;
  }

  private update(partial: Partial<AppStateData>): void {
    this._state = { ...this._state, ...partial };
    this.emit('change', this._state);
  }

  // --- Queries ---

  filteredView(): readonly StashRecord[] {
    return filterStashes(this._state.stashes, this._state.searchQuery);
  }

  selectedRecord(): StashRecord | null {
    const view = this.filteredView();
    const { selected } = this._state;
    if (selected < 0 || selected >= view.length) return null;
    return view[selected];
  }

  // --- Gateway-backed operations ---

  /**
   * Replace the collection and branch with a fresh snapshot.
   * Rejects with GatewayError and leaves state untouched when listing fails.
   */
  async reload(): Promise<void> {
    const stashes = await this.gateway.listStashes();
    const currentBranch = await this.gateway.currentBranch();
    const viewLength = filterStashes(stashes, this._state.searchQuery).length;
    const selected = viewLength === 0 ? 0 : Math.min(this._state.selected, viewLength - 1);
    this.update({ stashes, currentBranch, selected });
  }

  /**
   * Fill the content buffer with the diff or file stat of the selected stash.
   * No-op when nothing is selected.
   */
  async loadContent(kind: ContentKind): Promise<void> {
    const record = this.selectedRecord();
    if (!record) return;
    const raw =
      kind === 'diff'
        ? await this.gateway.getDiff(record.name)
        : await this.gateway.getFileStat(record.name);
    this.update({ contentBuffer: splitLines(raw), contentScroll: 0 });
  }

  // --- Navigation ---

  moveSelection(delta: number): void {
    const length = this.filteredView().length;
    if (length === 0) return;
    const selected = clamp(this._state.selected + delta, 0, length - 1);
    if (selected !== this._state.selected) {
      this.update({ selected });
    }
  }

  scrollContent(delta: number): void {
    const max = Math.max(0, this._state.contentBuffer.length - 1);
    const contentScroll = clamp(this._state.contentScroll + delta, 0, max);
    if (contentScroll !== this._state.contentScroll) {
      this.update({ contentScroll });
    }
  }

  scrollContentToTop(): void {
    this.scrollContent(-this._state.contentScroll);
  }

  scrollContentToBottom(): void {
    this.scrollContent(this._state.contentBuffer.length);
  }

  // --- Search ---

  startSearch(): void {
    this.update({ searchQuery: '', isSearching: true, selected: 0 });
  }

  commitSearch(): void {
    this.update({ isSearching: false });
  }

  cancelSearch(): void {
    this.update({ searchQuery: '', isSearching: false, selected: 0 });
  }

  clearSearch(): void {
    this.update({ searchQuery: '', selected: 0 });
  }

  appendSearch(text: string): void {
    this.update({ searchQuery: this._state.searchQuery + text, selected: 0 });
  }

  backspaceSearch(): void {
    this.update({ searchQuery: dropLastChar(this._state.searchQuery), selected: 0 });
  }

  // --- New stash form ---

  resetNewStashForm(): void {
    this.update({ newStashText: '', newStashIncludeUntracked: false });
  }

  appendNewStashText(text: string): void {
    this.update({ newStashText: this._state.newStashText + text });
  }

  backspaceNewStashText(): void {
    this.update({ newStashText: dropLastChar(this._state.newStashText) });
  }

  toggleIncludeUntracked(): void {
    this.update({ newStashIncludeUntracked: !this._state.newStashIncludeUntracked });
  }

  // --- Misc ---

  setMode(mode: Mode): void {
    this.update({ mode });
  }

  setStatusMessage(statusMessage: string | null): void {
    this.update({ statusMessage });
  }

  setBusy(busy: boolean): void {
    if (busy !== this._state.busy) {
      this.update({ busy });
    }
  }
}

// Remove one code point, not one UTF-16 unit
function dropLastChar(text: string): string {
  const chars = Array.from(text);
  chars.pop();
  return chars.join('');
}
