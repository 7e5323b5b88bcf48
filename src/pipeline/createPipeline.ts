import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { ITimer } from "../abstractions/ITimer";
import { AgentCliAnalyzer } from "../analysis/AgentCliAnalyzer";
import { PendingAnalyzer } from "../analysis/PendingAnalyzer";
import type { IPaperAnalyzer } from "../analysis/types";
import { BatchCoordinator } from "../batch/BatchCoordinator";
import type { AnalyzerConfig, AppConfig } from "../config";
import { EntryExtractor } from "../extraction/EntryExtractor";
import { MarkdownEntryParser } from "../extraction/MarkdownEntryParser";
import type { IEntryParser } from "../extraction/types";
import type { ILogger } from "../logging";
import { ProgressTracker } from "../progress/ProgressTracker";
import { DatasetWriter } from "../report/DatasetWriter";
import { PaperPipeline } from "./PaperPipeline";

export interface PipelineDependencies {
  fs: IFileSystem;
  timer: ITimer;
  processRunner: IProcessRunner;
  logger: ILogger;
  /** Replaces the analyzer built from config.analyzer. */
  analyzer?: IPaperAnalyzer;
  parser?: IEntryParser;
}

export interface Pipeline {
  pipeline: PaperPipeline;
  tracker: ProgressTracker;
  writer: DatasetWriter;
}

export function createAnalyzer(
  config: AnalyzerConfig,
  processRunner: IProcessRunner,
  logger: ILogger
): IPaperAnalyzer {
  switch (config.kind) {
    case "pending":
      return new PendingAnalyzer();
    case "agent-cli":
      return new AgentCliAnalyzer(processRunner, logger, {
        command: config.command,
        model: config.model,
        timeoutMs: config.timeoutMs,
      });
  }
}

export function createPipeline(config: AppConfig, deps: PipelineDependencies): Pipeline {
  const { fs, timer, processRunner, logger } = deps;

  const extractor = new EntryExtractor(fs, deps.parser ?? new MarkdownEntryParser(), logger);
  const tracker = new ProgressTracker(fs, config.progressPath, logger);
  const writer = new DatasetWriter(fs, config.reportPath);
  const analyzer = deps.analyzer ?? createAnalyzer(config.analyzer, processRunner, logger);
  const coordinator = new BatchCoordinator(analyzer, writer, tracker, logger);

  const pipeline = new PaperPipeline(extractor, tracker, coordinator, writer, timer, logger, {
    sources: config.sources,
    batchSize: config.batchSize,
    maxPapers: config.maxPapers,
    batchDelayMs: config.batchDelayMs,
  });

  return { pipeline, tracker, writer };
}
