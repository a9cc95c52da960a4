#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { PullRequestFiles } from './index.js';
import { logger, setLogLevel } from './utils/logger.js';
import { loadEnvConfig } from './config/env.js';
import { DEFAULTS } from './config/defaults.js';
import { findMissingOptions, resolveOptions } from './config/options.js';
import type { CliOptions } from './config/options.js';

interface ProgramOptions extends CliOptions {
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name('pr-files')
  .description('List the files changed and deleted by GitHub pull requests')
  .version('0.1.0')
  .option('--repo <owner/name>', "Full name of the repository in the format 'owner/name'")
  .option('--pulls <numbers>', 'Comma-separated list of pull request numbers')
  .option('--token <token>', 'GitHub API token (defaults to GITHUB_TOKEN)')
  .option('--output-dir <path>', 'Directory to save output files', DEFAULTS.outputDir)
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Only log errors')
  .action(async (options: ProgramOptions) => {
    if (options.verbose) {
      setLogLevel('debug');
    } else if (options.quiet) {
      setLogLevel('error');
    }

    const envConfig = loadEnvConfig();
    const resolved: CliOptions = {
      ...options,
      token: options.token || envConfig.githubToken,
    };

    const missing = findMissingOptions(resolved);
    if (missing.length > 0) {
      logger.error(`Missing required flags: ${missing.join(', ')}`);
      program.help({ error: true });
    }

    let runner: PullRequestFiles;
    try {
      runner = new PullRequestFiles(resolveOptions(resolved));
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }

    const spinner = ora('Fetching pull request files...').start();

    try {
      const result = await runner.run();
      spinner.succeed('Done!');

      console.log('');
      console.log(chalk.bold('Results:'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`Processed: ${chalk.cyan(result.processed.length)}`);
      if (result.skipped.length > 0) {
        const skipped = [...result.skipped].sort((a, b) => a - b).map((pr) => `#${pr}`);
        console.log(`Skipped: ${chalk.yellow(skipped.join(', '))}`);
      }
      console.log(`All files: ${chalk.cyan(result.aggregate.all.length)}`);
      console.log(`Changed files: ${chalk.cyan(result.aggregate.chg.length)}`);
      console.log(`Deleted files: ${chalk.cyan(result.aggregate.del.length)}`);
      console.log('');
      console.log(`Output directory: ${chalk.green(runner.getOutputWriter().getOutputDir())}`);
    } catch (error) {
      spinner.fail('Failed');
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
