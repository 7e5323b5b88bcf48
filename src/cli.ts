#!/usr/bin/env node
import { NodeFileSystem } from "./abstractions/NodeFileSystem";
import { NodeProcessRunner } from "./abstractions/NodeProcessRunner";
import { NodeTimer } from "./abstractions/NodeTimer";
import { resolveConfig } from "./config";
import { ConfigError, PaperLedgerError, errorMessage } from "./errors";
import { FileLogger } from "./logging";
import { createPipeline } from "./pipeline/createPipeline";

export type Command = "run" | "status" | "reset";

export interface ParsedArgs {
  command: Command;
  configPath?: string;
  batchSize?: number;
  maxPapers?: number;
  retryFailed: boolean;
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command: Command = "run";
  let configPath: string | undefined;
  let batchSize: number | undefined;
  let maxPapers: number | undefined;
  let retryFailed = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "run" || arg === "status" || arg === "reset") {
      command = arg;
    } else if (arg === "--retry-failed") {
      retryFailed = true;
    } else if (arg === "--config" || arg === "--batch-size" || arg === "--max-papers") {
      if (i + 1 >= args.length) {
        throw new ConfigError(`${arg} expects a value`);
      }
      const value = args[++i];
      if (arg === "--config") {
        configPath = value;
      } else if (arg === "--batch-size") {
        batchSize = parsePositiveInt(arg, value);
      } else {
        maxPapers = parsePositiveInt(arg, value);
      }
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return { command, configPath, batchSize, maxPapers, retryFailed };
}

async function main(): Promise<void> {
  const { command, configPath, batchSize, maxPapers, retryFailed } = parseArgs(process.argv);
  const fs = new NodeFileSystem();

  const config = await resolveConfig(fs, {
    cwd: process.cwd(),
    configPath,
    overrides: { batchSize, maxPapers },
  });

  const logger = new FileLogger({ filePath: config.logPath, logLevel: config.logLevel });
  const { pipeline, tracker } = createPipeline(config, {
    fs,
    timer: new NodeTimer(),
    processRunner: new NodeProcessRunner(),
    logger,
  });

  if (command === "status") {
    const state = await tracker.load();
    console.log(`Completed: ${state.completed.size}`);
    console.log(`Failed (kept as placeholders): ${state.failed.size}`);
    console.log(`Last batch: ${state.lastBatch}`);
  } else if (command === "reset") {
    tracker.reset();
    await tracker.save();
    logger.debug(`reset: cleared progress store ${config.progressPath}`);
    console.log(`Progress cleared: ${config.progressPath}`);
  } else {
    const summary = await pipeline.run({ retryFailed });
    if (summary.failed > 0) {
      console.warn(`${summary.failed} paper(s) kept placeholder values after a failed analysis.`);
    }
    console.log(
      `Processed ${summary.processed} paper(s) in ${summary.batches} batch(es); ${summary.completedTotal} completed in total.`
    );
  }
}

// Skip main() in test runners (Jest sets JEST_WORKER_ID)
if (!process.env.JEST_WORKER_ID) {
  main().catch((err: unknown) => {
    if (err instanceof PaperLedgerError) {
      console.error(`${err.name}: ${err.message}`);
    } else {
      console.error("Fatal error:", err instanceof Error ? err.stack ?? err.message : errorMessage(err));
    }
    process.exit(1);
  });
}
