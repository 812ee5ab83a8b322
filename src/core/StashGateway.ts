import * as logger from '../utils/logger.js';
import {
  listStashes as gitListStashes,
  getCurrentBranch as gitGetCurrentBranch,
  getStashDiff,
  getStashFileStat,
  applyStash,
  popStash,
  dropStash,
  pushStash,
  StashRecord,
} from '../git/stash.js';

export type { StashRecord } from '../git/stash.js';

/**
 * Any failed stash operation. Only the description is ever shown to the user.
 */
export class GatewayError extends Error {
  constructor(description: string) {
    super(description);
    this.name = 'GatewayError';
  }

  get description(): string {
    return this.message;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message.trim();
  return String(err).trim();
}

/**
 * Read and mutate the stash list without knowing how it is stored.
 */
export interface StashGateway {
  listStashes(): Promise<StashRecord[]>;
  /** Best effort: resolves to '' when the branch cannot be determined. */
  currentBranch(): Promise<string>;
  getDiff(name: string): Promise<string>;
  getFileStat(name: string): Promise<string>;
  apply(name: string): Promise<void>;
  pop(name: string): Promise<void>;
  drop(name: string): Promise<void>;
  create(message: string, includeUntracked: boolean): Promise<void>;
}

/**
 * StashGateway backed by the git CLI of one repository.
 */
export class GitStashGateway implements StashGateway {
  constructor(private repoPath: string) {}

  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const detail = describeError(err);
      logger.debug(`${context}: ${detail}`);
      throw new GatewayError(detail ? `${context}: ${detail}` : context);
    }
  }

  listStashes(): Promise<StashRecord[]> {
    return this.run('Failed to list stashes', () => gitListStashes(this.repoPath));
  }

  async currentBranch(): Promise<string> {
    try {
      return await gitGetCurrentBranch(this.repoPath);
    } catch (err) {
      logger.debug(`Failed to get current branch: ${describeError(err)}`);
      return '';
    }
  }

  getDiff(name: string): Promise<string> {
    return this.run('Failed to get stash diff', () => getStashDiff(this.repoPath, name));
  }

  getFileStat(name: string): Promise<string> {
    return this.run('Failed to get stash file list', () => getStashFileStat(this.repoPath, name));
  }

  async apply(name: string): Promise<void> {
    await this.run('Failed to apply stash', () => applyStash(this.repoPath, name));
  }

  async pop(name: string): Promise<void> {
    await this.run('Failed to pop stash', () => popStash(this.repoPath, name));
  }

  async drop(name: string): Promise<void> {
    await this.run('Failed to drop stash', () => dropStash(this.repoPath, name));
  }

  async create(message: string, includeUntracked: boolean): Promise<void> {
    await this.run('Failed to create stash', () =>
      pushStash(this.repoPath, message, includeUntracked)
    );
  }
}
