#!/usr/bin/env node
/**
 * kmeans-lab Command-Line Interface
 *
 * Usage: kmeans-lab <command> [options]
 */

import type { Command } from './types.js';
import { runCommand } from './commands/run.js';
import { demoCommand } from './commands/demo.js';
import { configCommand } from './commands/config.js';
import { KmeansLabError } from '../utils/errors.js';
import { exitCodeFor } from './utils.js';

const VERSION = '0.1.0';

const commands: Command[] = [runCommand, demoCommand, configCommand];

function showHelp(): void {
  console.log('kmeans-lab: k-means clustering over named features');
  console.log('');
  console.log('Usage: kmeans-lab <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`kmeans-lab ${VERSION}`);
    return;
  }

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "kmeans-lab --help" for available commands.');
    process.exit(2);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    if (error instanceof KmeansLabError) {
      console.error(error.toDetailedString());
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
