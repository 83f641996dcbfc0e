#!/usr/bin/env node
import { App } from './App.js';
import { loadConfig } from './config.js';
import * as logger from './utils/logger.js';
import pkg from '../package.json' with { type: 'json' };

// Cleanup function to reset terminal state on exit
function cleanupTerminal(): void {
  // Show cursor
  process.stdout.write('\x1b[?25h');
}

// Ensure terminal is cleaned up on any exit
process.on('exit', cleanupTerminal);
process.on('SIGINT', () => {
  cleanupTerminal();
  process.exit(0);
});
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

// Parse CLI arguments
interface ParsedArgs {
  initialPath?: string;
  debug?: boolean;
}

const HELP = `
duopane - Two-pane terminal file manager

Usage: duopane [options] [path]

Options:
  -d, --debug     Log to stderr for debugging
  -v, --version   Print the version and exit
  -h, --help      Show this help message

Arguments:
  [path]          Directory to open in both panes (default: current directory)

Environment:
  DUOPANE_DEBUG=1       Same as --debug
  DUOPANE_LOG_FILE      Append log lines to this file instead of stderr

Keyboard:
  j/k, Up/Down  Move down/up (a number before the key repeats it)
  gg / 0 / G    First / first / last entry
  h/l           Parent directory, or switch to the other pane
  Enter         Open directory or view file
  v             Mark entry
  V             Visual mode (mark a range)
  y / p         Copy marked entries / paste into the active pane
  x / X         Delete with / without confirmation
  r             Rename
  /             Search
  s             Sort picker
  q / Ctrl+C    Quit
`;

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (const arg of args) {
    if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      console.log(HELP);
      process.exit(0);
    } else if (arg === '--version' || arg === '-v') {
      console.log(pkg.version);
      process.exit(0);
    } else if (arg.startsWith('-')) {
      console.error(`Error: unknown option ${arg}`);
      process.exit(1);
    } else {
      result.initialPath = arg;
    }
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  if (args.debug) {
    config.debug = true;
  }
  logger.setDebug(config.debug);
  logger.setLogFile(process.env.DUOPANE_LOG_FILE || null);

  // Create and start the app
  const app = new App({
    config,
    initialPath: args.initialPath,
  });

  // Wait for app to exit
  await app.start();

  process.exit(0);
}

main().catch((err: unknown) => {
  cleanupTerminal();
  logger.error('Fatal error', err);
  process.exit(1);
});
