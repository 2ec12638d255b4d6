/**
 * Subtitle identification and retrieval pipeline.
 */

export { fingerprintFile, formatFingerprintHash } from './fingerprint';
export { decodeStream, Base64Decoder } from './decoder';
export type { DecodeOptions } from './decoder';
export { buildSearchTerms, searchCandidates } from './search';
export type { SearchRequest } from './search';
export { parseAnswer, preselect, selectAndDownload } from './selector';
export type { PromptAnswer, SelectionHooks, SelectionResult } from './selector';
export { createPrompter, InquirerPrompter, ReadlinePrompter } from './prompt';
export type { Prompter } from './prompt';
export { candidateRows, renderCandidateTable } from './table';
export { deriveOutputPath } from './output-path';
export { retrieveAll, retrieveSubtitles } from './retriever';
export type { FileOutcome, RetrievalContext, RetrievalResult, RunSummary } from './retriever';
