import * as fs from 'fs-extra';
import * as path from 'path';
import { toAppError } from '../errors/handler';
import { AppError, ErrorCode } from '../errors/types';
import { EXIT_CODES, exitCodeFor, ExitCode } from '../errors/exit-codes';
import { SearchCandidate, SelectionPolicy, SubtitleService } from '../types/subtitles';
import { logger } from '../utils/logger';
import { decodeStream, DecodeOptions } from './decoder';
import { fingerprintFile } from './fingerprint';
import { deriveOutputPath } from './output-path';
import { Prompter } from './prompt';
import { searchCandidates } from './search';
import { selectAndDownload } from './selector';
import { renderCandidateTable } from './table';

/**
 * Everything a run needs, built once by the CLI
 */
export interface RetrievalContext {
  service: SubtitleService;
  token: string;
  policy: SelectionPolicy;
  prompter: Prompter;
  /** Called with each per-file error before the run moves on or stops */
  reportFailure: (filePath: string, error: AppError) => void;
  /** Stop at the first failed file */
  exitOnFailure: boolean;
  showTable?: (candidates: SearchCandidate[]) => void;
  decodeOptions?: DecodeOptions;
}

export interface RetrievalResult {
  filePath: string;
  /** Subtitle files written, in order */
  outputPaths: string[];
  automatic: boolean;
}

export interface FileOutcome {
  filePath: string;
  result?: RetrievalResult;
  error?: AppError;
}

export interface RunSummary {
  outcomes: FileOutcome[];
  /** Outcome of the last file processed */
  exitCode: ExitCode;
}

function printTable(candidates: SearchCandidate[]): void {
  console.log(renderCandidateTable(candidates));
}

/**
 * Write one candidate next to the video. An existing file is only replaced
 * with `forceOverwrite`, and is checked before anything is downloaded.
 */
async function downloadCandidate(
  videoPath: string,
  candidate: SearchCandidate,
  context: RetrievalContext
): Promise<string> {
  const { policy } = context;
  const outputPath = deriveOutputPath(videoPath, candidate.fileName, policy.sameName);
  logger.info(`downloading to ${outputPath} ...`);

  if (await fs.pathExists(outputPath)) {
    if (!policy.forceOverwrite) {
      throw new AppError(
        'File already exists',
        ErrorCode.ALREADY_EXISTS,
        { path: outputPath },
        false
      );
    }
    logger.info('file already exists, overwriting.');
  }

  const payload = await context.service.downloadSubtitle(context.token, candidate.id);
  await decodeStream(payload, fs.createWriteStream(outputPath), context.decodeOptions);

  logger.debug(`Wrote subtitle ${candidate.id} to ${outputPath}`);
  return outputPath;
}

/**
 * Find, choose and write subtitles for one video file
 */
export async function retrieveSubtitles(
  filePath: string,
  context: RetrievalContext
): Promise<RetrievalResult> {
  const { policy } = context;
  const fingerprint = policy.nameOnly ? undefined : await fingerprintFile(filePath);
  const fileName = path.basename(filePath);

  logger.info(`searching for ${fileName}...`);
  const candidates = await searchCandidates(context.service, context.token, {
    fileName,
    fingerprint,
    policy,
  });

  if (candidates.length === 0) {
    throw new AppError('No results', ErrorCode.NO_RESULTS, { fileName }, false);
  }

  const outputPaths: string[] = [];
  const selection = await selectAndDownload(candidates, policy, {
    prompter: context.prompter,
    showTable: context.showTable ?? printTable,
    download: async (candidate) => {
      outputPaths.push(await downloadCandidate(filePath, candidate, context));
    },
  });

  return { filePath, outputPaths, automatic: selection.automatic };
}

/**
 * Process files one after another. With `exitOnFailure` the first failure
 * ends the run; otherwise every file is tried and the exit code is that of
 * the last one.
 */
export async function retrieveAll(
  filePaths: string[],
  context: RetrievalContext
): Promise<RunSummary> {
  const outcomes: FileOutcome[] = [];
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  for (const filePath of filePaths) {
    try {
      const result = await retrieveSubtitles(filePath, context);
      outcomes.push({ filePath, result });
      exitCode = EXIT_CODES.SUCCESS;
    } catch (error) {
      const appError = toAppError(error);
      outcomes.push({ filePath, error: appError });
      exitCode = exitCodeFor(appError.code);
      context.reportFailure(filePath, appError);

      if (context.exitOnFailure) {
        break;
      }
    }
  }

  return { outcomes, exitCode };
}
