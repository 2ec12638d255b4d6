import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { LoginCredentials, SubtitleDbClient } from '../api/subtitle-db';
import { loadServiceConfig, ServiceConfig } from '../config';
import { handleError, toAppError } from '../errors/handler';
import { AppError } from '../errors/types';
import { exitCodeFor, ExitCode } from '../errors/exit-codes';
import { createPrompter, Prompter, retrieveAll } from '../subtitles';
import { SelectionPolicy, SubtitleService } from '../types/subtitles';
import { onShutdown } from '../utils/shutdown';
import { normalizeLanguageFilter, parseLimit } from '../utils/validation';

export interface FetchOptions {
  lang: string;
  alwaysAsk?: boolean;
  neverAsk?: boolean;
  force?: boolean;
  hashSearchOnly?: boolean;
  nameSearchOnly?: boolean;
  sameName?: boolean;
  limit: string;
  exitOnFail: boolean;
}

export interface GlobalOptions {
  debug?: boolean;
  quiet: number;
}

export interface SessionClient extends SubtitleService {
  logIn(credentials: LoginCredentials): Promise<string>;
}

export interface FetchDependencies {
  config: ServiceConfig;
  client: SessionClient;
  prompter: Prompter;
}

export function buildSelectionPolicy(options: FetchOptions, quiet: number): SelectionPolicy {
  return {
    alwaysAsk: options.alwaysAsk === true,
    neverAsk: options.neverAsk === true,
    hashOnly: options.hashSearchOnly === true,
    nameOnly: options.nameSearchOnly === true,
    limit: parseLimit(options.limit),
    sameName: options.sameName === true,
    forceOverwrite: options.force === true,
    language: normalizeLanguageFilter(options.lang),
    quiet,
  };
}

async function logIn(client: SessionClient, config: ServiceConfig, showSpinner: boolean): Promise<string> {
  const spinner = showSpinner ? ora('Logging in...').start() : undefined;
  try {
    const token = await client.logIn({
      username: config.username,
      password: config.password,
      language: config.loginLanguage,
      userAgent: config.userAgent,
    });
    spinner?.stop();
    return token;
  } catch (error) {
    spinner?.fail(chalk.red('Login failed'));
    throw error;
  }
}

function defaultDependencies(): FetchDependencies {
  const config = loadServiceConfig();
  return {
    config,
    client: SubtitleDbClient.fromConfig(config),
    prompter: createPrompter(),
  };
}

/**
 * Log in once, then retrieve subtitles for each file in turn. Resolves with
 * the exit code of the run.
 */
export async function runFetch(
  files: string[],
  options: FetchOptions,
  globals: GlobalOptions,
  dependencies: FetchDependencies = defaultDependencies()
): Promise<ExitCode> {
  const { config, client, prompter } = dependencies;
  const debug = globals.debug === true;
  const unregister = onShutdown(() => prompter.close());

  try {
    const policy = buildSelectionPolicy(options, globals.quiet);
    const showSpinner = process.stderr.isTTY === true && globals.quiet === 0;
    const token = await logIn(client, config, showSpinner);

    const summary = await retrieveAll(files, {
      service: client,
      token,
      policy,
      prompter,
      exitOnFailure: options.exitOnFail,
      reportFailure: (filePath: string, error: AppError) => {
        if (files.length > 1) {
          console.error(chalk.dim(`\n${filePath}:`));
        }
        handleError(error, debug);
      },
    });

    return summary.exitCode;
  } finally {
    prompter.close();
    unregister();
  }
}

/**
 * Create the default command: fetch subtitles for video files
 */
export function createFetchCommand(): Command {
  const fetch = new Command('fetch');

  fetch
    .description('Find and download subtitles for video files')
    .argument('<file...>', 'Video files to find subtitles for')
    .option('-l, --lang <languages>', "Subtitle languages, comma-separated, or 'all'", 'eng')
    .option('-a, --always-ask', 'Always show the list of subtitles, even on a hash match')
    .option('-n, --never-ask', 'Never ask; take the first result when nothing matches the hash')
    .option('-f, --force', 'Overwrite existing subtitle files')
    .addOption(
      new Option('-o, --hash-search-only', 'Search by file hash only').conflicts('nameSearchOnly')
    )
    .addOption(new Option('-O, --name-search-only', 'Search by file name only'))
    .option('-s, --same-name', 'Name the subtitle after the video file')
    .option('-t, --limit <number>', 'Maximum number of results', '10')
    .option('-e, --no-exit-on-fail', 'Continue with the next file after a failure')
    .action(async (files: string[], options: FetchOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      try {
        const exitCode = await runFetch(files, options, globals);
        process.exit(exitCode);
      } catch (error) {
        handleError(error, globals.debug === true);
        process.exit(exitCodeFor(toAppError(error).code));
      }
    });

  return fetch;
}
