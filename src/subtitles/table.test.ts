import { candidateRows, renderCandidateTable } from './table';
import { SearchCandidate } from '../types/subtitles';

const candidates: SearchCandidate[] = [
  {
    id: 11,
    matchedByHash: false,
    language: 'eng',
    releaseName: 'Movie.2014.720p.BluRay',
    fileName: 'Movie.2014.720p.BluRay.srt',
  },
  {
    id: 12,
    matchedByHash: true,
    language: 'ger',
    releaseName: 'Movie.2014.1080p.WEB',
    fileName: 'movie-de.srt',
  },
];

describe('candidateRows', () => {
  it('numbers candidates from 1 and flags hash matches', () => {
    expect(candidateRows(candidates)).toEqual([
      ['1', ' ', 'eng', 'Movie.2014.720p.BluRay\n└ Movie.2014.720p.BluRay.srt'],
      ['2', '*', 'ger', 'Movie.2014.1080p.WEB\n└ movie-de.srt'],
    ]);
  });

  it('returns no rows for no candidates', () => {
    expect(candidateRows([])).toEqual([]);
  });
});

describe('renderCandidateTable', () => {
  it('includes every release and file name', () => {
    const output = renderCandidateTable(candidates);

    expect(output).toContain('Movie.2014.720p.BluRay');
    expect(output).toContain('└ movie-de.srt');
    expect(output).toContain('Release / File Name');
  });
});
