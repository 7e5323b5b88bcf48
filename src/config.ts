import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import type { IFileSystem } from "./abstractions/IFileSystem";
import { ConfigError, errorMessage } from "./errors";

export const CONFIG_FILE_NAME = "paper-ledger.config.json";

const analyzerSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("pending") }),
  z.object({
    kind: z.literal("agent-cli"),
    command: z.string().min(1).default("claude"),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
]);

const appConfigSchema = z.object({
  /** Markdown documents to read, in order. */
  sources: z.array(z.string().min(1)),
  progressPath: z.string().min(1),
  reportPath: z.string().min(1),
  logPath: z.string().min(1),
  batchSize: z.number().int().positive(),
  /** Cap on papers processed per run; unset means no cap. */
  maxPapers: z.number().int().positive().optional(),
  /** Pause between batches. */
  batchDelayMs: z.number().int().nonnegative(),
  logLevel: z.enum(["info", "debug"]),
  analyzer: analyzerSchema,
});

export type AnalyzerConfig = z.infer<typeof analyzerSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

const fileConfigSchema = appConfigSchema.partial().strict();

export type ConfigOverrides = Partial<Pick<AppConfig, "batchSize" | "maxPapers">>;

export interface ResolveConfigOptions {
  cwd: string;
  configPath?: string;
  overrides?: ConfigOverrides;
}

export const DEFAULT_CONFIG: AppConfig = {
  sources: ["README.md", "resources/2024-papers.md", "resources/2025-papers.md"],
  progressPath: "data/progress.json",
  reportPath: "data/paper-dataset.md",
  logPath: "data/paper-ledger.log",
  batchSize: 5,
  batchDelayMs: 2000,
  logLevel: "info",
  analyzer: { kind: "pending" },
};

/**
 * `~` and `~/...` expand to the home directory; other relative paths join
 * onto cwd, with posix joins when cwd is a posix path (tests and Unix).
 */
function resolvePath(cwd: string, value: string): string {
  if (value === "~" || value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(1));
  }
  const impl = cwd.startsWith("/") ? path.posix : path;
  return impl.isAbsolute(value) ? value : impl.join(cwd, value);
}

async function readConfigFile(fs: IFileSystem, filePath: string): Promise<Partial<AppConfig>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Defaults, then the config file (--config, which must exist, or
 * paper-ledger.config.json in cwd if present), then CLI overrides.
 * Relative paths in the result are resolved against cwd.
 */
export async function resolveConfig(fs: IFileSystem, options: ResolveConfigOptions): Promise<AppConfig> {
  let fileConfig: Partial<AppConfig> = {};

  if (options.configPath) {
    const configPath = resolvePath(options.cwd, options.configPath);
    if (!(await fs.exists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = await readConfigFile(fs, configPath);
  } else {
    const cwdConfig = resolvePath(options.cwd, CONFIG_FILE_NAME);
    if (await fs.exists(cwdConfig)) {
      fileConfig = await readConfigFile(fs, cwdConfig);
    }
  }

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ...definedOnly(options.overrides ?? {}),
  };

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const config = result.data;
  return {
    ...config,
    sources: config.sources.map((source) => resolvePath(options.cwd, source)),
    progressPath: resolvePath(options.cwd, config.progressPath),
    reportPath: resolvePath(options.cwd, config.reportPath),
    logPath: resolvePath(options.cwd, config.logPath),
  };
}

function definedOnly(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  if (overrides.batchSize !== undefined) result.batchSize = overrides.batchSize;
  if (overrides.maxPapers !== undefined) result.maxPapers = overrides.maxPapers;
  return result;
}
