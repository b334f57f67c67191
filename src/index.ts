/**
 * Legal case timeline extraction
 */

export { ProviderFactory } from './concurrent/ProviderFactory.js';
export { SecondaryExtractor, repairRow, uniqueChunks } from './concurrent/SecondaryExtractor.js';
export type { EscalationChunk, EscalationResult, SecondaryExtractorOptions } from './concurrent/SecondaryExtractor.js';
export type { CompletionClient, CompletionResponse, ChatMessage } from './concurrent/CompletionClient.js';
export { compileRules, loadRules } from './config/rules.js';
export type { CompiledRules, RawRules } from './config/rules.js';
export { loadSettings, loadSettingsFromEnvironment } from './config/settings.js';
export type { ExtractorProvider, Settings } from './config/settings.js';
export { parseDate, isValidIsoDate } from './core/dates.js';
export { EVENT_LABELS, normalizeEventLabel } from './core/events.js';
export type { EventLabel } from './core/events.js';
export { buildSections, isSectionHeading } from './core/sectionChunker.js';
export { parsePage, detectEventType, findDates } from './core/ruleMatcher.js';
export { selectForEscalation, shouldEscalate } from './core/escalationGate.js';
export { mergeDocumentRows, dedupeRows } from './core/merger.js';
export type { CandidateRow, MergedRow, PageRecord, SecondaryRow, TimelineRow } from './core/types.js';
export { discoverInputs, loadPages } from './loaders/index.js';
export type { OcrProvider } from './loaders/index.js';
export { TimelinePipeline } from './pipeline/TimelinePipeline.js';
export type { RunResult, RunSummary } from './pipeline/TimelinePipeline.js';
export { writeTimeline, sortTimeline } from './output/timelineWriter.js';
export { ConfigError, DocumentLoadError, ExtractorResponseError } from './utils/errors.js';
