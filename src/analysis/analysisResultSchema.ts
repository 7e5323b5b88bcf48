import { z } from "zod";
import type { AnalysisResult } from "./types";

/** Wire shape the delegate answers with. */
export const delegateResponseSchema = z.object({
  github_url: z.string().min(1).nullable(),
  github_valid: z.boolean(),
  codebase_summary: z.string(),
  relevance_score: z.number().min(0).max(10),
});

export type DelegateResponse = z.infer<typeof delegateResponseSchema>;

export function toAnalysisResult(response: DelegateResponse): AnalysisResult {
  return {
    githubUrl: response.github_url,
    githubValid: response.github_valid,
    codebaseSummary: response.codebase_summary,
    relevanceScore: response.relevance_score,
  };
}
