import { InMemoryProcessRunner } from "../../src/abstractions/InMemoryProcessRunner";
import { AgentCliAnalyzer } from "../../src/analysis/AgentCliAnalyzer";
import { AnalysisError } from "../../src/errors";
import { InMemoryLogger } from "../../src/logging";

const record = {
  title: "Paper A",
  externalUrl: "https://arxiv.org/abs/2401.00001",
  identifier: "2401.00001",
  rawSnippet: "[Paper A](https://arxiv.org/abs/2401.00001)",
};

const VALID_RESPONSE = JSON.stringify({
  github_url: "https://github.com/example/paper-a",
  github_valid: true,
  codebase_summary: "Training and evaluation code for the model.",
  relevance_score: 7.5,
});

describe("AgentCliAnalyzer", () => {
  let runner: InMemoryProcessRunner;
  let logger: InMemoryLogger;
  let analyzer: AgentCliAnalyzer;

  beforeEach(() => {
    runner = new InMemoryProcessRunner();
    logger = new InMemoryLogger();
    analyzer = new AgentCliAnalyzer(runner, logger, { command: "claude", timeoutMs: 60_000 });
  });

  it("invokes the command with --print and the composed prompt", async () => {
    runner.enqueue({ stdout: VALID_RESPONSE, stderr: "", exitCode: 0 });

    await analyzer.analyze(record);

    const calls = runner.getCalls();
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("claude");
    expect(calls[0].args.slice(0, 2)).toEqual(["--print", "-p"]);
    expect(calls[0].args[2]).toContain("Title: Paper A");
    expect(calls[0].args).toHaveLength(3);
    expect(calls[0].options).toEqual({ timeoutMs: 60_000, cwd: undefined });
  });

  it("passes --model when configured", async () => {
    const withModel = new AgentCliAnalyzer(runner, logger, { command: "claude", model: "sonnet" });
    runner.enqueue({ stdout: VALID_RESPONSE, stderr: "", exitCode: 0 });

    await withModel.analyze(record);

    expect(runner.getCalls()[0].args.slice(3)).toEqual(["--model", "sonnet"]);
  });

  it("maps the delegate response onto an AnalysisResult", async () => {
    runner.enqueue({ stdout: `Here you go:\n${VALID_RESPONSE}\n`, stderr: "", exitCode: 0 });

    expect(await analyzer.analyze(record)).toEqual({
      githubUrl: "https://github.com/example/paper-a",
      githubValid: true,
      codebaseSummary: "Training and evaluation code for the model.",
      relevanceScore: 7.5,
    });
  });

  it("accepts a null github_url", async () => {
    runner.enqueue({
      stdout: JSON.stringify({ github_url: null, github_valid: false, codebase_summary: "No code released", relevance_score: 0 }),
      stderr: "",
      exitCode: 0,
    });

    const result = await analyzer.analyze(record);

    expect(result.githubUrl).toBeNull();
    expect(result.codebaseSummary).toBe("No code released");
  });

  it("logs raw output at verbose level only", async () => {
    runner.enqueue({ stdout: VALID_RESPONSE, stderr: "", exitCode: 0 });

    await analyzer.analyze(record);

    expect(logger.getEntries()).toEqual([]);
    expect(logger.getVerboseEntries()).toEqual([`analyze 2401.00001: ${VALID_RESPONSE}`]);
  });

  it("raises AnalysisError on a non-zero exit code", async () => {
    runner.enqueue({ stdout: "", stderr: "rate limited\n", exitCode: 2 });

    await expect(analyzer.analyze(record)).rejects.toThrow(
      "claude failed for 2401.00001: exit code 2: rate limited"
    );
  });

  it("raises AnalysisError when the command cannot be spawned", async () => {
    runner.enqueueError(new Error("spawn claude ENOENT"));

    const error = await analyzer.analyze(record).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AnalysisError);
    expect(error).toHaveProperty("identifier", "2401.00001");
    expect(error).toHaveProperty("message", "claude failed for 2401.00001: spawn claude ENOENT");
  });

  it("raises AnalysisError when the output holds no JSON", async () => {
    runner.enqueue({ stdout: "I could not find a repository.", stderr: "", exitCode: 0 });

    await expect(analyzer.analyze(record)).rejects.toThrow("claude returned no JSON for 2401.00001");
  });

  it("raises AnalysisError when the JSON has the wrong shape", async () => {
    runner.enqueue({
      stdout: JSON.stringify({ github_url: "https://github.com/x/y", github_valid: "yes", codebase_summary: "", relevance_score: 3 }),
      stderr: "",
      exitCode: 0,
    });

    await expect(analyzer.analyze(record)).rejects.toThrow(
      "claude returned an invalid result for 2401.00001: github_valid: Expected boolean, received string"
    );
  });

  it("rejects relevance scores outside 0-10", async () => {
    runner.enqueue({
      stdout: JSON.stringify({ github_url: null, github_valid: false, codebase_summary: "", relevance_score: 11 }),
      stderr: "",
      exitCode: 0,
    });

    await expect(analyzer.analyze(record)).rejects.toBeInstanceOf(AnalysisError);
  });
});
