/**
 * Command-line parsing for the stashdeck binary.
 */

export interface ParsedArgs {
  repoPath?: string;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (const arg of args) {
    if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (!arg.startsWith('-')) {
      result.repoPath = arg;
    }
  }

  return result;
}

export const HELP_TEXT = `
stashdeck - Terminal browser for the git stash list

Usage: stashdeck [options] [path]

Options:
  -d, --debug     Log git calls to stderr
  -v, --version   Print the version and exit
  -h, --help      Show this help message

Arguments:
  [path]          Path to a git repository (default: current directory)

Environment:
  STASHDECK_CONFIG      Config file (default: ~/.config/stashdeck/config.json)
  STASHDECK_THEME       Theme name, overrides the config file
  STASHDECK_PAGE_SIZE   Lines per PgUp/PgDn in the diff view

Keyboard:
  j/k, Up/Down  Move selection / scroll
  Enter, d      Show diff of the selected stash
  f             Show changed files
  a / p / x     Apply / pop / drop (asks for confirmation)
  n             Create a new stash
  /             Search by message or branch
  c             Clear the search filter
  r             Reload the stash list
  q / Esc       Back / quit
  Ctrl+C        Quit
`;
