export { createPipeline, createAnalyzer } from "./pipeline/createPipeline";
export type { Pipeline, PipelineDependencies } from "./pipeline/createPipeline";
export { PaperPipeline } from "./pipeline/PaperPipeline";
export type { RunOptions, RunSummary, PipelineSettings } from "./pipeline/PaperPipeline";
export { resolveConfig, DEFAULT_CONFIG } from "./config";
export type { AppConfig, AnalyzerConfig } from "./config";
export { MarkdownEntryParser } from "./extraction/MarkdownEntryParser";
export { deriveIdentifier } from "./extraction/identifiers";
export type { ReferenceRecord, IEntryParser } from "./extraction/types";
export { ProgressTracker } from "./progress/ProgressTracker";
export type { ProgressState } from "./progress/ProgressState";
export { DatasetWriter, formatRow } from "./report/DatasetWriter";
export { partition } from "./batch/partition";
export type { ResultRecord } from "./batch/types";
export type { AnalysisResult, IPaperAnalyzer } from "./analysis/types";
export { PaperLedgerError, ProgressStoreError, AnalysisError, ConfigError } from "./errors";
