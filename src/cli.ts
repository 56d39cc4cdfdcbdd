/**
 * whois-tools CLI entry point
 *
 * The shebang is added by the tsup banner, not here.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { FileSystemAdapter } from '@/platform/FileSystemAdapter.js';
import { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import {
  createHealthCommand,
  createLookupCommand,
  createToolsCommand,
} from '@/features/whois/index.js';
import { logger } from '@/shared/utils/logger.js';

// Initialize dependencies
const fs = new FileSystemAdapter();
const configLoader = new ConfigLoader(fs);

const program = new Command();

program
  .name('whois-tools')
  .description('WHOIS lookup tools for LLM tool-calling frameworks')
  .version('0.1.0');

program.addCommand(createLookupCommand(configLoader));
program.addCommand(createHealthCommand(configLoader));
program.addCommand(createToolsCommand(configLoader));

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.debug('Command failed', { error: message });
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
});
