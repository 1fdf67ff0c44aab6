import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { resolveConfig } from '../../lib/config.js';
import { ConfluenceClient } from '../../lib/confluence-client/index.js';
import { EXIT_CODES, getExitCodeForError, isMd2cfError } from '../../lib/errors.js';
import { resolveInputMode, selectFiles } from '../../lib/file-selector.js';
import { getFormatter } from '../../lib/formatters.js';
import { hasFailures, Publisher, type PublishResult } from '../../lib/publisher.js';
import type { ParsedArgs } from '../utils/args.js';

/**
 * Report each document on the spinner as it completes
 */
function reportResult(spinner: Ora, result: PublishResult): void {
  switch (result.status) {
    case 'created':
      spinner.succeed(`${result.path} → created "${result.title}"`);
      break;
    case 'updated':
      spinner.succeed(`${result.path} → updated "${result.title}" (version ${result.version})`);
      break;
    case 'skipped':
      spinner.info(chalk.gray(`${result.path} skipped (${result.reason})`));
      break;
    case 'failed':
      spinner.fail(`${result.path}: ${result.error.message}`);
      break;
  }

  if (result.status === 'created' || result.status === 'updated') {
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`  ! ${warning}`));
    }
  }
}

/**
 * Publish command - returns the process exit code
 */
export async function publishCommand(args: ParsedArgs): Promise<number> {
  let paths: string[];
  let publisher: Publisher;

  try {
    const config = resolveConfig(args.flags);
    const mode = resolveInputMode({ paths: args.paths, gitRepo: args.gitRepo ?? process.cwd() });
    paths = selectFiles(mode);

    if (config.dryRun) {
      console.log(chalk.gray('Dry run: no changes will be made.'));
    }

    if (args.xml) {
      publisher = new Publisher(config, new ConfluenceClient(config));
    } else {
      const spinner = ora();
      publisher = new Publisher(config, new ConfluenceClient(config), {
        onStart: (path) => {
          spinner.start(`Publishing ${path}...`);
        },
        onResult: (result) => reportResult(spinner, result),
      });
    }
  } catch (error) {
    if (isMd2cfError(error)) {
      console.error(chalk.red(error.message));
      return getExitCodeForError(error);
    }
    throw error;
  }

  const summary = await publisher.publish(paths);

  if (!args.xml) {
    console.log('');
  }
  console.log(getFormatter(args.xml).formatSummary(summary));

  return hasFailures(summary) ? EXIT_CODES.GENERAL_ERROR : EXIT_CODES.SUCCESS;
}
