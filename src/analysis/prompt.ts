import type { ReferenceRecord } from "../extraction/types";

export const ANALYSIS_INSTRUCTIONS = `You are analyzing one research paper for a dataset of papers and their code.
Find the paper's official GitHub repository, check that it exists and contains code,
summarize what the codebase implements, and rate how relevant the codebase is to the paper
on a scale from 0 to 10.

Answer with a single JSON object and nothing else:
{"github_url": string | null, "github_valid": boolean, "codebase_summary": string, "relevance_score": number}`;

export function buildAnalysisPrompt(record: ReferenceRecord): string {
  const sections: string[] = [ANALYSIS_INSTRUCTIONS];

  sections.push(`## Paper\n\nTitle: ${record.title}\nURL: ${record.externalUrl}\nIdentifier: ${record.identifier}`);

  if (record.rawSnippet.trim()) {
    sections.push(`## Context from the reading list\n\n${record.rawSnippet}`);
  }

  return sections.join("\n\n");
}
