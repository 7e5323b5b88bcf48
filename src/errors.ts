export class PaperLedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PaperLedgerError";
  }
}

/** The progress file exists but cannot be read or does not hold a valid state. */
export class ProgressStoreError extends PaperLedgerError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProgressStoreError";
    this.path = path;
  }
}

/** The analysis delegate failed or answered with something unusable for one record. */
export class AnalysisError extends PaperLedgerError {
  readonly identifier: string;

  constructor(message: string, identifier: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalysisError";
    this.identifier = identifier;
  }
}

export class ConfigError extends PaperLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
