import type { IProcessRunner } from "../abstractions/IProcessRunner";
import { AnalysisError, errorMessage } from "../errors";
import type { ReferenceRecord } from "../extraction/types";
import type { ILogger } from "../logging";
import { delegateResponseSchema, toAnalysisResult } from "./analysisResultSchema";
import { findJsonObject } from "./findJsonObject";
import { buildAnalysisPrompt } from "./prompt";
import type { AnalysisResult, IPaperAnalyzer } from "./types";

export interface AgentCliAnalyzerOptions {
  command: string;
  model?: string;
  timeoutMs?: number;
  cwd?: string;
}

/**
 * Hands one record to an external agent CLI (`<command> --print -p <prompt>`)
 * and reads the JSON object it prints. Any failure surfaces as AnalysisError;
 * the caller decides what a failed record means.
 */
export class AgentCliAnalyzer implements IPaperAnalyzer {
  constructor(
    private readonly processRunner: IProcessRunner,
    private readonly logger: ILogger,
    private readonly options: AgentCliAnalyzerOptions
  ) {}

  async analyze(record: ReferenceRecord): Promise<AnalysisResult> {
    const args = ["--print", "-p", buildAnalysisPrompt(record)];
    if (this.options.model) {
      args.push("--model", this.options.model);
    }

    let stdout: string;
    try {
      const result = await this.processRunner.run(this.options.command, args, {
        timeoutMs: this.options.timeoutMs,
        cwd: this.options.cwd,
      });
      if (result.exitCode !== 0) {
        throw new Error(`exit code ${result.exitCode}: ${result.stderr.trim() || "(no stderr)"}`);
      }
      stdout = result.stdout;
    } catch (err) {
      throw new AnalysisError(
        `${this.options.command} failed for ${record.identifier}: ${errorMessage(err)}`,
        record.identifier,
        { cause: err }
      );
    }

    this.logger.verbose(`analyze ${record.identifier}: ${stdout.trim()}`);

    const payload = findJsonObject(stdout);
    if (!payload) {
      throw new AnalysisError(`${this.options.command} returned no JSON for ${record.identifier}`, record.identifier);
    }

    const parsed = delegateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new AnalysisError(
        `${this.options.command} returned an invalid result for ${record.identifier}: ${issues.join("; ")}`,
        record.identifier
      );
    }

    return toAnalysisResult(parsed.data);
  }
}
