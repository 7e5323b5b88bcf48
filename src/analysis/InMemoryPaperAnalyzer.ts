import type { ReferenceRecord } from "../extraction/types";
import { AnalysisResult, IPaperAnalyzer, pendingAnalysis } from "./types";

/**
 * Canned answers keyed by identifier, for tests. Unknown identifiers get
 * placeholder values; identifiers registered with failWith() throw.
 */
export class InMemoryPaperAnalyzer implements IPaperAnalyzer {
  private results = new Map<string, AnalysisResult>();
  private failures = new Map<string, Error>();
  private calls: string[] = [];

  respondWith(identifier: string, result: AnalysisResult): void {
    this.results.set(identifier, result);
  }

  failWith(identifier: string, error: Error): void {
    this.failures.set(identifier, error);
  }

  async analyze(record: ReferenceRecord): Promise<AnalysisResult> {
    this.calls.push(record.identifier);
    const failure = this.failures.get(record.identifier);
    if (failure) {
      throw failure;
    }
    return this.results.get(record.identifier) ?? pendingAnalysis();
  }

  getCalls(): string[] {
    return [...this.calls];
  }
}
