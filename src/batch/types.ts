import type { AnalysisResult } from "../analysis/types";

/** One dataset row's worth of data: the reference plus what the delegate said about it. */
export interface ResultRecord extends AnalysisResult {
  title: string;
  externalUrl: string;
  identifier: string;
  /** False when the delegate failed and the placeholder values were kept. */
  analyzed: boolean;
}

export interface BatchOutcome {
  batchNumber: number;
  results: ResultRecord[];
  failed: string[];
}
