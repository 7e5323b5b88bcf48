import type { ReferenceRecord } from "../extraction/types";
import { AnalysisResult, IPaperAnalyzer, pendingAnalysis } from "./types";

/**
 * Answers every record with placeholder values. Used when no delegate is
 * configured, so the dataset still gets one row per paper.
 */
export class PendingAnalyzer implements IPaperAnalyzer {
  async analyze(_record: ReferenceRecord): Promise<AnalysisResult> {
    return pendingAnalysis();
  }
}
