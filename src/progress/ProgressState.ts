import { z } from "zod";

export interface ProgressState {
  completed: Set<string>;
  lastBatch: number;
  /** Identifiers whose delegate call failed; they are also in `completed`. */
  failed: Set<string>;
}

/** On-disk shape: {"completed": [...], "last_batch": n} plus optional "failed". */
export const storedProgressSchema = z.object({
  completed: z.array(z.string()),
  last_batch: z.number().int().nonnegative(),
  failed: z.array(z.string()).optional(),
});

export type StoredProgress = z.infer<typeof storedProgressSchema>;

export function emptyProgressState(): ProgressState {
  return { completed: new Set(), lastBatch: 0, failed: new Set() };
}

export function toStoredProgress(state: ProgressState): StoredProgress {
  const stored: StoredProgress = {
    completed: [...state.completed],
    last_batch: state.lastBatch,
  };
  if (state.failed.size > 0) {
    stored.failed = [...state.failed];
  }
  return stored;
}

export function fromStoredProgress(stored: StoredProgress): ProgressState {
  return {
    completed: new Set(stored.completed),
    lastBatch: stored.last_batch,
    failed: new Set(stored.failed ?? []),
  };
}
