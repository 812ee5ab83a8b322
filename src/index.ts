#!/usr/bin/env node
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { App } from './App.js';
import { HELP_TEXT, parseArgs } from './args.js';
import { loadConfig } from './config.js';
import { isGitRepo } from './git/stash.js';
import * as logger from './utils/logger.js';

// Reset terminal state on exit
function cleanupTerminal(): void {
  // Leave the alternate screen buffer
  process.stdout.write('\x1b[?1049l');
  // Show cursor
  process.stdout.write('\x1b[?25h');
}

process.on('SIGTERM', () => {
  cleanupTerminal();
  process.exit(0);
});
process.on('uncaughtException', (err) => {
  cleanupTerminal();
  console.error('Uncaught exception:', err);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  cleanupTerminal();
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

function readVersion(): string {
  const packagePath = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      return String(parsed.version);
    }
  } catch (err) {
    logger.debug(`Could not read ${packagePath}: ${String(err)}`);
  }
  return 'unknown';
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(readVersion());
    return;
  }

  const config = loadConfig();
  if (args.debug) {
    config.debug = true;
  }
  logger.setDebug(config.debug);

  const repoPath = path.resolve(args.repoPath ?? process.cwd());
  if (!(await isGitRepo(repoPath))) {
    console.error('Not inside a git repository. Please run stashdeck from within a git repo.');
    process.exit(1);
  }

  const app = new App({ config, repoPath });

  // Wait for app to exit
  await app.start();

  process.exit(0);
}

main().catch((err: unknown) => {
  cleanupTerminal();
  console.error('Fatal error:', err);
  process.exit(1);
});
