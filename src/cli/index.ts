#!/usr/bin/env node
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_CODES } from '../lib/errors.js';
import { publishCommand } from './commands/publish.js';
import { showHelp } from './help.js';
import { ArgumentError, parseArgs, type ParsedArgs } from './utils/args.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return 'unknown';
}

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(chalk.red(error.message));
      console.log('Run "md2cf --help" for usage information');
      process.exit(EXIT_CODES.INVALID_ARGUMENTS);
    }
    throw error;
  }

  if (args.help) {
    showHelp();
    process.exit(EXIT_CODES.SUCCESS);
  }

  if (args.version) {
    console.log(`md2cf version ${readVersion()}`);
    process.exit(EXIT_CODES.SUCCESS);
  }

  // Check for verbose mode
  if (args.verbose && process.env.MD2CF_DEBUG !== '1') {
    process.env.MD2CF_DEBUG = '1';
  }

  process.exit(await publishCommand(args));
}

// Run the CLI
main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.GENERAL_ERROR);
});
