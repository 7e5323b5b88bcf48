import { ANALYSIS_INSTRUCTIONS, buildAnalysisPrompt } from "../../src/analysis/prompt";

const record = {
  title: "Paper A",
  externalUrl: "https://arxiv.org/abs/2401.00001",
  identifier: "2401.00001",
  rawSnippet: "[Paper A](https://arxiv.org/abs/2401.00001)\nA short note.",
};

describe("buildAnalysisPrompt", () => {
  it("starts with the instructions and names the paper", () => {
    const prompt = buildAnalysisPrompt(record);

    expect(prompt.startsWith(ANALYSIS_INSTRUCTIONS)).toBe(true);
    expect(prompt).toContain("## Paper\n\nTitle: Paper A\nURL: https://arxiv.org/abs/2401.00001\nIdentifier: 2401.00001");
  });

  it("includes the reading-list snippet", () => {
    expect(buildAnalysisPrompt(record)).toContain("## Context from the reading list\n\n[Paper A](https://arxiv.org/abs/2401.00001)\nA short note.");
  });

  it("omits the context section for an empty snippet", () => {
    expect(buildAnalysisPrompt({ ...record, rawSnippet: "  " })).not.toContain("## Context");
  });
});
