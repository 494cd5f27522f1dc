// Durable checkpoint store using SQLite

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { CheckpointAlreadyConsumed, CheckpointNotFound, ContractViolation } from "../pipeline/errors.js";
import { CheckpointSchema, OperatingModeSchema } from "../pipeline/types.js";
import type { Checkpoint, CheckpointSummary } from "../pipeline/types.js";
import type { CheckpointStore } from "./checkpoints.js";

interface CheckpointRow {
  id: string;
  run_id: string;
  mode: string;
  payload: string;
  created_at: string;
  consumed_at: string | null;
}

type SummaryRow = Pick<CheckpointRow, "id" | "run_id" | "mode" | "created_at">;

/**
 * Each checkpoint is one row holding its JSON payload. Consumption is a
 * conditional UPDATE, so it stays single-use across processes sharing the file.
 */
export class SqliteCheckpointStore implements CheckpointStore {
  private db: Database.Database;
  private insertRow: Database.Statement<[string, string, string, string, string]>;
  private findRow: Database.Statement<[string]>;
  private consumeRow: Database.Statement<[string, string]>;
  private pendingRows: Database.Statement<[]>;

  constructor(path: string = ":memory:") {
    if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        id TEXT PRIMARY KEY,
        run_id TEXT NOT NULL,
        mode TEXT NOT NULL,
        payload TEXT NOT NULL,
        created_at TEXT NOT NULL,
        consumed_at TEXT
      )
    `);

    this.insertRow = this.db.prepare<[string, string, string, string, string]>(
      `INSERT INTO checkpoints (id, run_id, mode, payload, created_at)
       VALUES (?, ?, ?, ?, ?)`,
    );
    this.findRow = this.db.prepare<[string]>("SELECT * FROM checkpoints WHERE id = ?");
    this.consumeRow = this.db.prepare<[string, string]>(
      "UPDATE checkpoints SET consumed_at = ? WHERE id = ? AND consumed_at IS NULL",
    );
    this.pendingRows = this.db.prepare<[]>(
      `SELECT id, run_id, mode, created_at FROM checkpoints
       WHERE consumed_at IS NULL ORDER BY created_at, id`,
    );
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    if (this.findRow.get(checkpoint.id) !== undefined) {
      throw new ContractViolation(`Checkpoint ${checkpoint.id} already exists`);
    }
    this.insertRow.run(
      checkpoint.id,
      checkpoint.runId,
      checkpoint.snapshot.mode,
      JSON.stringify(checkpoint),
      checkpoint.createdAt,
    );
  }

  async get(id: string): Promise<Checkpoint> {
    const row = this.readRow(id);
    if (row.consumed_at !== null) throw new CheckpointAlreadyConsumed(id);
    return this.decode(row);
  }

  async consume(id: string): Promise<Checkpoint> {
    const result = this.consumeRow.run(new Date().toISOString(), id);
    if (result.changes === 0) {
      // Either it never existed or another caller got there first.
      this.readRow(id);
      throw new CheckpointAlreadyConsumed(id);
    }
    return this.decode(this.readRow(id));
  }

  async listPending(): Promise<CheckpointSummary[]> {
    const rows: unknown[] = this.pendingRows.all();
    return rows.filter(isSummaryRow).map((row) => ({
      id: row.id,
      runId: row.run_id,
      mode: OperatingModeSchema.parse(row.mode),
      createdAt: row.created_at,
    }));
  }

  close(): void {
    this.db.close();
  }

  private readRow(id: string): CheckpointRow {
    const row: unknown = this.findRow.get(id);
    if (!isCheckpointRow(row)) throw new CheckpointNotFound(id);
    return row;
  }

  private decode(row: CheckpointRow): Checkpoint {
    const parsed = CheckpointSchema.safeParse(JSON.parse(row.payload));
    if (!parsed.success) {
      console.error(`[store] Checkpoint ${row.id} has an unreadable payload: ${parsed.error.message}`);
      throw new ContractViolation(`Checkpoint ${row.id} payload is corrupt`);
    }
    return parsed.data;
  }
}

function isSummaryRow(row: unknown): row is SummaryRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "id" in row &&
    typeof row.id === "string" &&
    "run_id" in row &&
    typeof row.run_id === "string" &&
    "mode" in row &&
    typeof row.mode === "string" &&
    "created_at" in row &&
    typeof row.created_at === "string"
  );
}

function isCheckpointRow(row: unknown): row is CheckpointRow {
  return (
    isSummaryRow(row) &&
    "payload" in row &&
    typeof row.payload === "string" &&
    "consumed_at" in row &&
    (row.consumed_at === null || typeof row.consumed_at === "string")
  );
}
