import type { IPaperAnalyzer } from "../analysis/types";
import { pendingAnalysis } from "../analysis/types";
import { errorMessage } from "../errors";
import type { ReferenceRecord } from "../extraction/types";
import type { ILogger } from "../logging";
import type { ProgressTracker } from "../progress/ProgressTracker";
import type { DatasetWriter } from "../report/DatasetWriter";
import type { BatchOutcome, ResultRecord } from "./types";

/**
 * Runs one batch: asks the analyzer about each record in order, appends a
 * row per record, then marks the whole batch completed and persists
 * progress once.
 *
 * A delegate failure does not stop the batch. The record keeps the
 * placeholder values and is still marked completed, so a plain re-run skips
 * it; it is also listed as failed so `run --retry-failed` can pick it up.
 * A later successful analysis removes it from the failed list.
 */
export class BatchCoordinator {
  constructor(
    private readonly analyzer: IPaperAnalyzer,
    private readonly writer: DatasetWriter,
    private readonly tracker: ProgressTracker,
    private readonly logger: ILogger
  ) {}

  async processBatch(batch: readonly ReferenceRecord[], batchNumber: number): Promise<BatchOutcome> {
    this.logger.debug(`batch ${batchNumber}: analyzing ${batch.length} record(s)`);

    const results: ResultRecord[] = [];
    const failed: string[] = [];

    for (const record of batch) {
      const result = await this.analyzeRecord(record, batchNumber);
      if (!result.analyzed) {
        failed.push(record.identifier);
      }
      results.push(result);
    }

    for (const result of results) {
      await this.writer.append(result);
    }

    for (const result of results) {
      this.tracker.markCompleted(result.identifier);
      if (result.analyzed) {
        this.tracker.clearFailed(result.identifier);
      } else {
        this.tracker.markFailed(result.identifier);
      }
    }
    this.tracker.recordBatch(batchNumber);
    await this.tracker.save();

    this.logger.debug(
      `batch ${batchNumber}: wrote ${results.length} row(s), ${failed.length} failed, ${this.tracker.completedCount} completed in total`
    );
    return { batchNumber, results, failed };
  }

  private async analyzeRecord(record: ReferenceRecord, batchNumber: number): Promise<ResultRecord> {
    const base = {
      title: record.title,
      externalUrl: record.externalUrl,
      identifier: record.identifier,
    };

    try {
      const analysis = await this.analyzer.analyze(record);
      return { ...base, ...analysis, analyzed: true };
    } catch (err) {
      this.logger.debug(`batch ${batchNumber}: analysis failed for ${record.identifier} — ${errorMessage(err)}`);
      return { ...base, ...pendingAnalysis(), analyzed: false };
    }
  }
}
