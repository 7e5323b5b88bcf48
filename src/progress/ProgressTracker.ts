import * as path from "node:path";
import { IFileSystem } from "../abstractions/IFileSystem";
import { ProgressStoreError, errorMessage } from "../errors";
import { ILogger } from "../logging";
import {
  ProgressState,
  emptyProgressState,
  fromStoredProgress,
  storedProgressSchema,
  toStoredProgress,
} from "./ProgressState";

/**
 * Holds the set of processed identifiers and the last completed batch for
 * one progress file. State lives in memory between explicit load() and
 * save() calls; nothing is written implicitly.
 *
 * A missing file loads as an empty state. A file that exists but cannot be
 * parsed is fatal: the operator must fix or delete it.
 */
export class ProgressTracker {
  private state: ProgressState = emptyProgressState();

  constructor(
    private readonly fs: IFileSystem,
    private readonly progressPath: string,
    private readonly logger: ILogger
  ) {}

  async load(): Promise<ProgressState> {
    if (!(await this.fs.exists(this.progressPath))) {
      this.logger.debug(`progress: no store at ${this.progressPath}, starting empty`);
      this.state = emptyProgressState();
      return this.snapshot();
    }

    let raw: string;
    try {
      raw = await this.fs.readFile(this.progressPath);
    } catch (err) {
      throw new ProgressStoreError(
        `Cannot read progress store ${this.progressPath}: ${errorMessage(err)}`,
        this.progressPath,
        { cause: err }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ProgressStoreError(
        `Progress store ${this.progressPath} is not valid JSON: ${errorMessage(err)}`,
        this.progressPath,
        { cause: err }
      );
    }

    const result = storedProgressSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ProgressStoreError(
        `Progress store ${this.progressPath} has an invalid shape: ${issues.join("; ")}`,
        this.progressPath
      );
    }

    this.state = fromStoredProgress(result.data);
    this.logger.debug(
      `progress: loaded ${this.state.completed.size} completed, last batch ${this.state.lastBatch}`
    );
    return this.snapshot();
  }

  /** Write to a sibling temp file, then rename over the store. */
  async save(): Promise<void> {
    await this.fs.mkdir(path.dirname(this.progressPath), { recursive: true });
    const tmpPath = `${this.progressPath}.tmp`;
    const content = JSON.stringify(toStoredProgress(this.state), null, 2) + "\n";
    await this.fs.writeFile(tmpPath, content);
    await this.fs.rename(tmpPath, this.progressPath);
  }

  isCompleted(identifier: string): boolean {
    return this.state.completed.has(identifier);
  }

  markCompleted(identifier: string): void {
    this.state.completed.add(identifier);
  }

  markFailed(identifier: string): void {
    this.state.failed.add(identifier);
  }

  isFailed(identifier: string): boolean {
    return this.state.failed.has(identifier);
  }

  /** A failed identifier was analyzed again successfully; it stays completed. */
  clearFailed(identifier: string): void {
    this.state.failed.delete(identifier);
  }

  /** Batch indexes only move forward. */
  recordBatch(batchNumber: number): void {
    if (batchNumber > this.state.lastBatch) {
      this.state.lastBatch = batchNumber;
    }
  }

  get lastBatch(): number {
    return this.state.lastBatch;
  }

  get completedCount(): number {
    return this.state.completed.size;
  }

  reset(): void {
    this.state = emptyProgressState();
  }

  snapshot(): ProgressState {
    return {
      completed: new Set(this.state.completed),
      lastBatch: this.state.lastBatch,
      failed: new Set(this.state.failed),
    };
  }
}
