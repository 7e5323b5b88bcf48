import type { ReferenceRecord } from "../extraction/types";

/** What the external delegate supplies for one paper. */
export interface AnalysisResult {
  githubUrl: string | null;
  githubValid: boolean;
  codebaseSummary: string;
  relevanceScore: number;
}

export interface IPaperAnalyzer {
  analyze(record: ReferenceRecord): Promise<AnalysisResult>;
}

export const PENDING_SUMMARY = "Pending analysis";

export function pendingAnalysis(): AnalysisResult {
  return {
    githubUrl: null,
    githubValid: false,
    codebaseSummary: PENDING_SUMMARY,
    relevanceScore: 0,
  };
}
