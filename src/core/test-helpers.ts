import { extractBranch, extractShortMessage } from '../git/stash.js';
import { GatewayError, StashGateway, StashRecord } from './StashGateway.js';

/**
 * Build a stash record the way the git gateway would parse it.
 */
export function makeStash(index: number, message: string, date: string = '2 hours ago'): StashRecord {
  return {
    index,
    name: `stash@{${index}}`,
    message,
    branch: extractBranch(message),
    shortMessage: extractShortMessage(message),
    date,
  };
}

export function makeStashes(messages: string[]): StashRecord[] {
  return messages.map((message, i) => makeStash(i, message));
}

export type GatewayCall =
  | { op: 'listStashes' }
  | { op: 'currentBranch' }
  | { op: 'getDiff'; name: string }
  | { op: 'getFileStat'; name: string }
  | { op: 'apply'; name: string }
  | { op: 'pop'; name: string }
  | { op: 'drop'; name: string }
  | { op: 'create'; message: string; includeUntracked: boolean };

type FailableOp = Exclude<GatewayCall['op'], 'currentBranch'>;

/**
 * In-memory StashGateway. Mutations behave like git on a list of messages;
 * any operation can be made to fail with a fixed description.
 */
export class FakeStashGateway implements StashGateway {
  stashes: StashRecord[];
  branch: string;
  diffs = new Map<string, string>();
  fileStats = new Map<string, string>();
  readonly calls: GatewayCall[] = [];
  private failures = new Map<FailableOp, string>();

  constructor(stashes: StashRecord[] = [], branch: string = 'main') {
    this.stashes = stashes;
    this.branch = branch;
  }

  failNext(op: FailableOp, description: string): void {
    this.failures.set(op, description);
  }

  private check(op: FailableOp): void {
    const description = this.failures.get(op);
    if (description !== undefined) {
      this.failures.delete(op);
      throw new GatewayError(description);
    }
  }

  private remove(name: string): void {
    const remaining = this.stashes.filter((s) => s.name !== name);
    if (remaining.length === this.stashes.length) {
      throw new GatewayError(`${name} is not a valid reference`);
    }
    this.stashes = remaining.map((s, i) => makeStash(i, s.message, s.date));
  }

  async listStashes(): Promise<StashRecord[]> {
    this.calls.push({ op: 'listStashes' });
    this.check('listStashes');
    return [...this.stashes];
  }

  async currentBranch(): Promise<string> {
    this.calls.push({ op: 'currentBranch' });
    return this.branch;
  }

  async getDiff(name: string): Promise<string> {
    this.calls.push({ op: 'getDiff', name });
    this.check('getDiff');
    return this.diffs.get(name) ?? '';
  }

  async getFileStat(name: string): Promise<string> {
    this.calls.push({ op: 'getFileStat', name });
    this.check('getFileStat');
    return this.fileStats.get(name) ?? '';
  }

  async apply(name: string): Promise<void> {
    this.calls.push({ op: 'apply', name });
    this.check('apply');
  }

  async pop(name: string): Promise<void> {
    this.calls.push({ op: 'pop', name });
    this.check('pop');
    this.remove(name);
  }

  async drop(name: string): Promise<void> {
    this.calls.push({ op: 'drop', name });
    this.check('drop');
    this.remove(name);
  }

  async create(message: string, includeUntracked: boolean): Promise<void> {
    this.calls.push({ op: 'create', message, includeUntracked });
    this.check('create');
    const messages = [`On ${this.branch}: ${message}`, ...this.stashes.map((s) => s.message)];
    this.stashes = makeStashes(messages);
  }

  mutationCalls(): GatewayCall[] {
    return this.calls.filter((c) => c.op !== 'listStashes' && c.op !== 'currentBranch');
  }
}
