/**
 * Main entry point - exports all public APIs
 */

export { loadCollection, parseCollection, classifyDocument, normalizeDocument } from './prompt_loader';
export { analyze, charLength, preview } from './analyzer';
export { search } from './search_engine';
export { extract, renderMarkdown, fenceFor } from './markdown_extractor';
export type { ExtractDestination, ExtractOptions, ExtractOutcome } from './markdown_extractor';
export { formatStatsTable, formatSearchResults, renderAnalysis, isAnalysisFormat } from './report_formatter';
export type { AnalysisFormat } from './report_formatter';
export { writeTextFileSync } from './output_writer';
export { isSearchResult } from './prompt_types';
export type {
    AnalysisReport,
    LengthStats,
    PromptCollection,
    PromptEntry,
    RawDocument,
    SearchCriteria,
    SearchMatch,
    SearchResult,
} from './prompt_types';
export {
    PromptscopeError,
    FileAccessError,
    DataFormatError,
    InvalidArgumentError,
    toStructuredError,
    exitCodeFor,
} from './structured_error';
export type { ErrorCode, ErrorKind, StructuredError } from './structured_error';
export { loadRuntimeConfig, EXIT_CODES } from './config';
export type { RuntimeConfig, FsyncMode } from './config';
export { PromptscopeCLI } from './cli';
export type { CliIO } from './cli';
