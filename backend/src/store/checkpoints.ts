// Checkpoint store contract and the in-process implementation

import { CheckpointAlreadyConsumed, CheckpointNotFound, ContractViolation } from "../pipeline/errors.js";
import type { Checkpoint, CheckpointSummary } from "../pipeline/types.js";

/**
 * Holds suspended runs until their decision arrives. `consume` must be atomic:
 * of any number of concurrent calls for one id, exactly one resolves.
 */
export interface CheckpointStore {
  save(checkpoint: Checkpoint): Promise<void>;
  /** Read without consuming. Throws CheckpointNotFound / CheckpointAlreadyConsumed. */
  get(id: string): Promise<Checkpoint>;
  consume(id: string): Promise<Checkpoint>;
  listPending(): Promise<CheckpointSummary[]>;
}

interface Entry {
  checkpoint: Checkpoint;
  consumedAt: string | null;
}

export function summarize(checkpoint: Checkpoint): CheckpointSummary {
  return {
    id: checkpoint.id,
    runId: checkpoint.runId,
    mode: checkpoint.snapshot.mode,
    createdAt: checkpoint.createdAt,
  };
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private entries = new Map<string, Entry>();

  async save(checkpoint: Checkpoint): Promise<void> {
    if (this.entries.has(checkpoint.id)) {
      throw new ContractViolation(`Checkpoint ${checkpoint.id} already exists`);
    }
    this.entries.set(checkpoint.id, { checkpoint: structuredClone(checkpoint), consumedAt: null });
  }

  async get(id: string): Promise<Checkpoint> {
    return structuredClone(this.lookup(id).checkpoint);
  }

  async consume(id: string): Promise<Checkpoint> {
    // Check-and-set with no await in between.
    const entry = this.lookup(id);
    entry.consumedAt = new Date().toISOString();
    return structuredClone(entry.checkpoint);
  }

  async listPending(): Promise<CheckpointSummary[]> {
    return Array.from(this.entries.values())
      .filter((e) => e.consumedAt === null)
      .map((e) => summarize(e.checkpoint));
  }

  private lookup(id: string): Entry {
    const entry = this.entries.get(id);
    if (!entry) throw new CheckpointNotFound(id);
    if (entry.consumedAt !== null) throw new CheckpointAlreadyConsumed(id);
    return entry;
  }
}
