export * from './types/index.js';
export * from './runner.js';
export * from './discovery.js';
export * from './config.js';
export * from './templates/index.js';
export { classifyLine, extractSymbols, extractModule, DEFAULT_MARKERS } from './extract/extractor.js';
export type { Declaration, DeclarationMarkers, ModuleExtraction } from './extract/extractor.js';
export { SubstringMatcher, IdentifierMatcher, createMatcher } from './search/matcher.js';
export type { Matcher } from './search/matcher.js';
export { ScanningSearcher, IndexedSearcher, createSearcher, listCandidateFiles } from './search/searcher.js';
export type { EquivalenceSearcher, SearchHit, CandidateFile } from './search/searcher.js';
export { CoverageAggregator, aggregate, percentageOf } from './aggregate/aggregator.js';
export { ReportEmitter, renderReport, writeArtifacts, readArtifact, formatPercentage, isPassing } from './report/emitter.js';
export type { EmitOptions, ArtifactPaths } from './report/emitter.js';
export * from './utils/logger.js';
export * from './utils/errors.js';
