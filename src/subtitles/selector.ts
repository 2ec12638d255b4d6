import { AppError, ErrorCode } from '../errors/types';
import { SearchCandidate, SelectionPolicy } from '../types/subtitles';
import { Prompter } from './prompt';

export interface SelectionHooks {
  prompter: Prompter;
  download: (candidate: SearchCandidate) => Promise<void>;
  showTable: (candidates: SearchCandidate[]) => void;
}

export interface SelectionResult {
  /** Candidates downloaded, in order */
  downloaded: SearchCandidate[];
  /** True when the choice was made without prompting */
  automatic: boolean;
}

export type PromptAnswer = { kind: 'quit' } | { kind: 'choice'; index: number } | { kind: 'invalid' };

const INTEGER_ANSWER = /^\s*[+-]?\d+$/;

/**
 * Candidate picked without asking: the first hash match, or the first
 * candidate when `neverAsk` is set. Null means the user must choose.
 */
export function preselect(
  candidates: SearchCandidate[],
  policy: Pick<SelectionPolicy, 'neverAsk'>
): number | null {
  if (candidates.length === 0) {
    return null;
  }
  const hashMatch = candidates.findIndex((candidate) => candidate.matchedByHash);
  if (hashMatch >= 0) {
    return hashMatch;
  }
  return policy.neverAsk ? 0 : null;
}

/**
 * Interpret one answer to the prompt. Choices are 1-based; a leading q or Q
 * quits whatever follows it.
 */
export function parseAnswer(answer: string, count: number): PromptAnswer {
  if (answer.startsWith('q') || answer.startsWith('Q')) {
    return { kind: 'quit' };
  }
  if (!INTEGER_ANSWER.test(answer)) {
    return { kind: 'invalid' };
  }
  const choice = Number.parseInt(answer, 10);
  if (choice < 1 || choice > count) {
    return { kind: 'invalid' };
  }
  return { kind: 'choice', index: choice - 1 };
}

async function askUntilValid(prompter: Prompter, count: number): Promise<number> {
  for (;;) {
    const answer = parseAnswer(await prompter.ask(count), count);
    if (answer.kind === 'quit') {
      throw new AppError('Selection cancelled', ErrorCode.OPERATION_CANCELLED, {}, false);
    }
    if (answer.kind === 'choice') {
      return answer.index;
    }
  }
}

/**
 * Choose and download subtitles for one file.
 *
 * A preselected candidate is downloaded straight away unless `alwaysAsk`
 * is set. Otherwise the table is shown and the user picks; after each
 * download the table comes back so another can be taken, until the user
 * quits. A single candidate ends the loop after its download.
 */
export async function selectAndDownload(
  candidates: SearchCandidate[],
  policy: Pick<SelectionPolicy, 'alwaysAsk' | 'neverAsk' | 'quiet'>,
  hooks: SelectionHooks
): Promise<SelectionResult> {
  const downloaded: SearchCandidate[] = [];
  const pick = preselect(candidates, policy);

  if (pick !== null && !policy.alwaysAsk) {
    if (policy.quiet < 1) {
      hooks.showTable(candidates);
    }
    await hooks.download(candidates[pick]);
    downloaded.push(candidates[pick]);
    return { downloaded, automatic: true };
  }

  for (;;) {
    hooks.showTable(candidates);
    const index = await askUntilValid(hooks.prompter, candidates.length);

    await hooks.download(candidates[index]);
    downloaded.push(candidates[index]);

    if (candidates.length === 1) {
      return { downloaded, automatic: false };
    }
  }
}
