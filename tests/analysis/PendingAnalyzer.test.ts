import { InMemoryPaperAnalyzer } from "../../src/analysis/InMemoryPaperAnalyzer";
import { PendingAnalyzer } from "../../src/analysis/PendingAnalyzer";

const record = {
  title: "Paper A",
  externalUrl: "https://arxiv.org/abs/2401.00001",
  identifier: "2401.00001",
  rawSnippet: "",
};

describe("PendingAnalyzer", () => {
  it("answers with placeholder values", async () => {
    expect(await new PendingAnalyzer().analyze(record)).toEqual({
      githubUrl: null,
      githubValid: false,
      codebaseSummary: "Pending analysis",
      relevanceScore: 0,
    });
  });
});

describe("InMemoryPaperAnalyzer", () => {
  it("returns canned results, placeholders, or failures by identifier", async () => {
    const analyzer = new InMemoryPaperAnalyzer();
    analyzer.respondWith("2401.00001", {
      githubUrl: "https://github.com/example/paper-a",
      githubValid: true,
      codebaseSummary: "Reference implementation",
      relevanceScore: 8,
    });
    analyzer.failWith("2401.00002", new Error("agent crashed"));

    expect((await analyzer.analyze(record)).githubValid).toBe(true);
    await expect(analyzer.analyze({ ...record, identifier: "2401.00002" })).rejects.toThrow("agent crashed");
    expect((await analyzer.analyze({ ...record, identifier: "2401.00003" })).codebaseSummary).toBe("Pending analysis");
    expect(analyzer.getCalls()).toEqual(["2401.00001", "2401.00002", "2401.00003"]);
  });
});
