import { simpleGit, SimpleGit } from 'simple-git';

export interface StashRecord {
  readonly index: number;
  readonly name: string; // e.g. "stash@{0}"
  readonly message: string; // e.g. "WIP on main: abc123 Some commit"
  readonly branch: string;
  readonly shortMessage: string;
  readonly date: string; // relative, as git prints it
}

export const STASH_LIST_FORMAT = '%gd|%gs|%cr';

const BRANCH_PREFIXES = ['WIP on ', 'On '];

/**
 * Extract the branch from a stash subject such as "WIP on main: ..." or "On main: ...".
 */
export function extractBranch(message: string): string {
  for (const prefix of BRANCH_PREFIXES) {
    if (message.startsWith(prefix)) {
      return message.slice(prefix.length).split(':')[0].trim();
    }
  }
  return 'unknown';
}

/**
 * Text after the first ": ", or the whole message when there is none.
 */
export function extractShortMessage(message: string): string {
  const sep = message.indexOf(': ');
  if (sep === -1) return message;
  return message.slice(sep + 2);
}

// Split into at most three fields; the last one keeps any further '|'
function splitFields(line: string): string[] | null {
  const first = line.indexOf('|');
  if (first === -1) return null;
  const second = line.indexOf('|', first + 1);
  if (second === -1) return null;
  return [line.slice(0, first), line.slice(first + 1, second), line.slice(second + 1)];
}

/**
 * Parse `git stash list --format=%gd|%gs|%cr` output, most recent first.
 */
export function parseStashList(output: string): StashRecord[] {
  const records: StashRecord[] = [];
  for (const line of output.split('\n')) {
    const fields = splitFields(line.replace(/\r$/, ''));
    if (!fields) continue;
    const [name, message, date] = fields;
    records.push({
      index: records.length,
      name,
      message,
      branch: extractBranch(message),
      shortMessage: extractShortMessage(message),
      date,
    });
  }
  return records;
}

export async function isGitRepo(repoPath: string): Promise<boolean> {
  try {
    // simpleGit throws synchronously when the directory does not exist
    const git: SimpleGit = simpleGit(repoPath);
    return await git.checkIsRepo();
  } catch {
    return false;
  }
}

export async function listStashes(repoPath: string): Promise<StashRecord[]> {
  const git = simpleGit(repoPath);
  const output = await git.raw(['stash', 'list', `--format=${STASH_LIST_FORMAT}`]);
  return parseStashList(output);
}

export async function getCurrentBranch(repoPath: string): Promise<string> {
  const git = simpleGit(repoPath);
  const output = await git.raw(['branch', '--show-current']);
  return output.trim();
}

export async function getStashDiff(repoPath: string, name: string): Promise<string> {
  const git = simpleGit(repoPath);
  return git.raw(['stash', 'show', '-p', '--color=never', name]);
}

export async function getStashFileStat(repoPath: string, name: string): Promise<string> {
  const git = simpleGit(repoPath);
  return git.raw(['stash', 'show', '--stat', '--color=never', name]);
}

export async function applyStash(repoPath: string, name: string): Promise<string> {
  const git = simpleGit(repoPath);
  return git.stash(['apply', name]);
}

export async function popStash(repoPath: string, name: string): Promise<string> {
  const git = simpleGit(repoPath);
  return git.stash(['pop', name]);
}

export async function dropStash(repoPath: string, name: string): Promise<string> {
  const git = simpleGit(repoPath);
  return git.stash(['drop', name]);
}

export async function pushStash(
  repoPath: string,
  message: string,
  includeUntracked: boolean = false
): Promise<string> {
  const git = simpleGit(repoPath);
  const args = ['push', '-m', message];
  if (includeUntracked) {
    args.push('--include-untracked');
  }
  return git.stash(args);
}
