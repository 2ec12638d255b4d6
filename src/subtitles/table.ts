import chalk from 'chalk';
import Table from 'cli-table3';
import { SearchCandidate } from '../types/subtitles';

/** Marks a candidate matched on the file fingerprint */
export const HASH_MATCH_FLAG = '*';

/**
 * Plain cells for each candidate: 1-based index, hash flag, language and
 * release name above file name
 */
export function candidateRows(candidates: SearchCandidate[]): string[][] {
  return candidates.map((candidate, index) => [
    String(index + 1),
    candidate.matchedByHash ? HASH_MATCH_FLAG : ' ',
    candidate.language,
    `${candidate.releaseName}\n└ ${candidate.fileName}`,
  ]);
}

export function renderCandidateTable(candidates: SearchCandidate[]): string {
  const table = new Table({
    head: [chalk.cyan('#'), chalk.cyan('H'), chalk.cyan('Lng'), chalk.cyan('Release / File Name')],
    style: {
      head: [],
      border: ['dim'],
    },
  });

  for (const [index, flag, language, names] of candidateRows(candidates)) {
    table.push([index, flag === HASH_MATCH_FLAG ? chalk.green(flag) : flag, language, names]);
  }

  return table.toString();
}
