#!/usr/bin/env node
import { CommanderError, program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createFetchCommand } from './cli/fetch';
import { createLanguagesCommand } from './cli/languages';
import { setupShutdownHandlers } from './utils/shutdown';
import { handleError } from './errors/handler';
import { EXIT_CODES } from './errors/exit-codes';
import { levelForQuiet, logger } from './utils/logger';

// Setup graceful shutdown handlers
setupShutdownHandlers();

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(EXIT_CODES.FAILURE);
});

// Handle uncaught exceptions (not covered by setupShutdownHandlers)
process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(EXIT_CODES.FAILURE);
});

// Usage errors exit with their own code; help and version exit 0
function exitOnUsageError(error: CommanderError): never {
  process.exit(error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE);
}

function increaseQuiet(_value: string, previous: number): number {
  return previous + 1;
}

program
  .name('subfetch')
  .description(
    chalk.blue.bold('subfetch') +
    '\n\nFind subtitles for video files by content hash or file name and download them.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('-q, --quiet', 'Hide the result table when nothing is asked; twice hides all but errors', increaseQuiet, 0)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ debug?: boolean; quiet: number }>();

    if (opts.debug) {
      process.env.DEBUG = 'true';
    }
    logger.setLevel(levelForQuiet(opts.quiet, opts.debug === true || process.env.DEBUG === 'true'));
  });

program.addCommand(createFetchCommand(), { isDefault: true });
program.addCommand(createLanguagesCommand());

program.exitOverride(exitOnUsageError);
for (const command of program.commands) {
  command.exitOverride(exitOnUsageError);
}

// Custom help
program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Environment:'));
  console.log(`  ${chalk.cyan('SUBFETCH_USERNAME')}, ${chalk.cyan('SUBFETCH_PASSWORD')}  account (anonymous when unset)`);
  console.log(`  ${chalk.cyan('SUBFETCH_USER_AGENT')}                    registered user agent`);
  console.log(`  ${chalk.cyan('SUBFETCH_ENDPOINT')}                      XML-RPC endpoint`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ subfetch movie.mkv');
  console.log('  $ subfetch -l ger,eng -a movie.mkv');
  console.log('  $ subfetch -n -e season1/*.mkv');
  console.log('  $ subfetch languages');
  console.log('');
  console.log(chalk.dim('For the options of the default command:'));
  console.log('  $ subfetch fetch --help');
});

program.parse();
