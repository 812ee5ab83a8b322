import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GatewayError, GitStashGateway, describeError } from './StashGateway.js';
import { isGitRepo } from '../git/stash.js';

const gitMock = vi.hoisted(() => ({
  raw: vi.fn(),
  stash: vi.fn(),
  checkIsRepo: vi.fn(),
}));

vi.mock('simple-git', () => ({
  simpleGit: () => gitMock,
}));

beforeEach(() => {
  gitMock.raw.mockReset();
  gitMock.stash.mockReset();
  gitMock.checkIsRepo.mockReset();
});

describe('GitStashGateway', () => {
  const gateway = new GitStashGateway('/repo');

  it('lists stashes with the stash list format', async () => {
    gitMock.raw.mockResolvedValueOnce('stash@{0}|On main: cleanup|5 minutes ago\n');

    const stashes = await gateway.listStashes();

    expect(gitMock.raw).toHaveBeenCalledWith(['stash', 'list', '--format=%gd|%gs|%cr']);
    expect(stashes.map((s) => s.shortMessage)).toEqual(['cleanup']);
  });

  it('wraps listing failures in a GatewayError', async () => {
    gitMock.raw.mockRejectedValueOnce(new Error('fatal: not a git repository\n'));

    await expect(gateway.listStashes()).rejects.toThrow(
      new GatewayError('Failed to list stashes: fatal: not a git repository')
    );
  });

  it('trims the current branch', async () => {
    gitMock.raw.mockResolvedValueOnce('feature/x\n');
    await expect(gateway.currentBranch()).resolves.toBe('feature/x');
  });

  it('resolves to an empty branch when git fails', async () => {
    gitMock.raw.mockRejectedValueOnce(new Error('boom'));
    await expect(gateway.currentBranch()).resolves.toBe('');
  });

  it('requests a plain patch for the diff', async () => {
    gitMock.raw.mockResolvedValueOnce('diff --git a/x b/x\n');

    await expect(gateway.getDiff('stash@{1}')).resolves.toBe('diff --git a/x b/x\n');
    expect(gitMock.raw).toHaveBeenCalledWith(['stash', 'show', '-p', '--color=never', 'stash@{1}']);
  });

  it('requests a stat for the file list', async () => {
    gitMock.raw.mockResolvedValueOnce(' a.ts | 2 +-\n');

    await gateway.getFileStat('stash@{0}');
    expect(gitMock.raw).toHaveBeenCalledWith([
      'stash',
      'show',
      '--stat',
      '--color=never',
      'stash@{0}',
    ]);
  });

  it('passes the stash name to apply, pop and drop', async () => {
    gitMock.stash.mockResolvedValue('');

    await gateway.apply('stash@{0}');
    await gateway.pop('stash@{1}');
    await gateway.drop('stash@{2}');

    expect(gitMock.stash.mock.calls).toEqual([
      [['apply', 'stash@{0}']],
      [['pop', 'stash@{1}']],
      [['drop', 'stash@{2}']],
    ]);
  });

  it('reports a failed apply with its context', async () => {
    gitMock.stash.mockRejectedValueOnce(new Error('error: conflict in a.ts'));

    await expect(gateway.apply('stash@{0}')).rejects.toThrow(
      'Failed to apply stash: error: conflict in a.ts'
    );
  });

  it('creates a stash with and without untracked files', async () => {
    gitMock.stash.mockResolvedValue('');

    await gateway.create('wip', false);
    await gateway.create('wip all', true);

    expect(gitMock.stash.mock.calls).toEqual([
      [['push', '-m', 'wip']],
      [['push', '-m', 'wip all', '--include-untracked']],
    ]);
  });
});

describe('isGitRepo', () => {
  it('returns the check result', async () => {
    gitMock.checkIsRepo.mockResolvedValueOnce(true);
    await expect(isGitRepo('/repo')).resolves.toBe(true);
  });

  it('returns false when the check throws', async () => {
    gitMock.checkIsRepo.mockRejectedValueOnce(new Error('no'));
    await expect(isGitRepo('/repo')).resolves.toBe(false);
  });
});

describe('describeError', () => {
  it('uses the trimmed message of an Error', () => {
    expect(describeError(new Error('  not found \n'))).toBe('not found');
  });

  it('stringifies other values', () => {
    expect(describeError('plain')).toBe('plain');
  });
});
