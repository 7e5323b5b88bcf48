import type { ITimer } from "../abstractions/ITimer";
import type { BatchCoordinator } from "../batch/BatchCoordinator";
import { partition } from "../batch/partition";
import type { EntryExtractor } from "../extraction/EntryExtractor";
import type { ReferenceRecord } from "../extraction/types";
import type { ILogger } from "../logging";
import type { ProgressTracker } from "../progress/ProgressTracker";
import type { DatasetWriter } from "../report/DatasetWriter";

export interface PipelineSettings {
  sources: string[];
  batchSize: number;
  maxPapers?: number;
  batchDelayMs: number;
}

export interface RunOptions {
  /** Queue identifiers listed as failed again, even though they are completed. */
  retryFailed?: boolean;
}

export interface RunSummary {
  /** Records found across all sources, before any filtering. */
  discovered: number;
  /** Records skipped as already completed or repeated within this run. */
  skipped: number;
  processed: number;
  failed: number;
  batches: number;
  completedTotal: number;
}

interface PendingRecords {
  pending: ReferenceRecord[];
  discovered: number;
  skipped: number;
  retried: number;
}

/**
 * Sequential run: load progress, extract from every source, drop what is
 * already done, cap, batch, and hand each batch to the coordinator with a
 * fixed pause in between.
 */
export class PaperPipeline {
  constructor(
    private readonly extractor: EntryExtractor,
    private readonly tracker: ProgressTracker,
    private readonly coordinator: BatchCoordinator,
    private readonly writer: DatasetWriter,
    private readonly timer: ITimer,
    private readonly logger: ILogger,
    private readonly settings: PipelineSettings
  ) {}

  async run(options: RunOptions = {}): Promise<RunSummary> {
    await this.tracker.load();

    if (await this.writer.ensureHeader()) {
      this.logger.debug("run: created dataset report");
    }

    const retryFailed = options.retryFailed ?? false;
    const { pending, discovered, skipped, retried } = await this.collectPending(retryFailed);
    if (retryFailed) {
      this.logger.debug(`run: ${retried} failed record(s) queued for retry`);
    }
    const capped =
      this.settings.maxPapers !== undefined ? pending.slice(0, this.settings.maxPapers) : pending;
    const batches = partition(capped, this.settings.batchSize);

    this.logger.debug(
      `run: ${discovered} discovered, ${skipped} skipped, ${capped.length} to process in ${batches.length} batch(es)`
    );

    let failed = 0;
    const firstBatchNumber = this.tracker.lastBatch + 1;
    for (let i = 0; i < batches.length; i++) {
      const outcome = await this.coordinator.processBatch(batches[i], firstBatchNumber + i);
      failed += outcome.failed.length;

      if (i < batches.length - 1 && this.settings.batchDelayMs > 0) {
        await this.timer.delay(this.settings.batchDelayMs);
      }
    }

    const summary: RunSummary = {
      discovered,
      skipped,
      processed: capped.length,
      failed,
      batches: batches.length,
      completedTotal: this.tracker.completedCount,
    };
    this.logger.debug(`run: finished — ${summary.processed} processed, ${summary.completedTotal} completed in total`);
    return summary;
  }

  private async collectPending(retryFailed: boolean): Promise<PendingRecords> {
    const pending: ReferenceRecord[] = [];
    const seen = new Set<string>();
    let discovered = 0;
    let skipped = 0;
    let retried = 0;

    for (const source of this.settings.sources) {
      const records = await this.extractor.extractFromFile(source);
      discovered += records.length;
      for (const record of records) {
        if (seen.has(record.identifier)) {
          skipped++;
          continue;
        }
        const retry = retryFailed && this.tracker.isFailed(record.identifier);
        if (this.tracker.isCompleted(record.identifier) && !retry) {
          skipped++;
          continue;
        }
        if (retry) {
          retried++;
        }
        seen.add(record.identifier);
        pending.push(record);
      }
    }

    return { pending, discovered, skipped, retried };
  }
}
