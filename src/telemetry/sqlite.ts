/**
 * SQLite Telemetry Store — persists runs and their per-step records.
 *
 * Uses better-sqlite3 for zero-config, embedded, synchronous SQLite.
 * Schema changes ship as forward-only migrations tracked in SchemaVersions.
 */
import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod/v4";
import type { TelemetryRecord, TelemetrySink } from "../core/types.js";
import { ObservationMap } from "../schemas/protocol.js";
import type { RunOutcome } from "../orchestrator.js";

/** Schema migration definition. */
export interface Migration {
    version: number;
    description: string;
    up: string;
}

const INITIAL_SCHEMA = `
CREATE TABLE IF NOT EXISTS Runs (
  id TEXT PRIMARY KEY,
  label TEXT,
  seed INTEGER,
  max_steps INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'running',
  completion_reason TEXT,
  error TEXT,
  steps INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  finished_at TEXT
);

CREATE TABLE IF NOT EXISTS StepRecords (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL,
  step_index INTEGER NOT NULL,
  committed TEXT NOT NULL DEFAULT '[]',
  utilities TEXT NOT NULL DEFAULT '{}',
  failures TEXT NOT NULL DEFAULT '[]',
  observation_snapshot TEXT NOT NULL DEFAULT '{}',
  rewards TEXT NOT NULL DEFAULT '{}',
  done INTEGER NOT NULL DEFAULT 0,
  FOREIGN KEY (run_id) REFERENCES Runs(id)
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_steprecords_run_step ON StepRecords(run_id, step_index);
CREATE INDEX IF NOT EXISTS idx_runs_status ON Runs(status);
`;

/** Forward-only migrations. */
const MIGRATIONS: Migration[] = [
    { version: 1, description: "Initial schema", up: INITIAL_SCHEMA },
    {
        version: 2,
        description: "Per-step metrics",
        up: "ALTER TABLE StepRecords ADD COLUMN metrics TEXT NOT NULL DEFAULT '{}';",
    },
];

export interface StoredRun {
    id: string;
    label: string | null;
    seed: number | null;
    maxSteps: number;
    status: "running" | "completed" | "aborted";
    completionReason: string | null;
    error: string | null;
    steps: number;
    createdAt: string;
    finishedAt: string | null;
}

interface RunRow {
    id: string;
    label: string | null;
    seed: number | null;
    max_steps: number;
    status: string;
    completion_reason: string | null;
    error: string | null;
    steps: number;
    created_at: string;
    finished_at: string | null;
}

interface StepRow {
    step_index: number;
    committed: string;
    utilities: string;
    failures: string;
    observation_snapshot: string;
    rewards: string;
    done: number;
    metrics: string;
}

const RunStatus = z.enum(["running", "completed", "aborted"]);
const AgentIds = z.array(z.string());
const NumberMap = z.record(z.string(), z.number());

export class SqliteTelemetryStore {
    private db: Database.Database;

    constructor(dbPath: string = ":memory:") {
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("foreign_keys = ON");
        this.runMigrations();
    }

    private runMigrations(): void {
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS SchemaVersions (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);

        const current = this.db.prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM SchemaVersions").get();
        const version = current?.v ?? 0;

        for (const migration of MIGRATIONS) {
            if (migration.version > version) {
                this.db.exec(migration.up);
                this.db
                    .prepare("INSERT INTO SchemaVersions (version, description) VALUES (?, ?)")
                    .run(migration.version, migration.description);
            }
        }
    }

    startRun(params: { maxSteps: number; seed?: number; label?: string }): string {
        const id = uuidv4();
        this.db
            .prepare("INSERT INTO Runs (id, label, seed, max_steps) VALUES (?, ?, ?, ?)")
            .run(id, params.label ?? null, params.seed ?? null, params.maxSteps);
        return id;
    }

    /** A sink that appends every record it receives to `runId`. */
    sinkFor(runId: string): TelemetrySink {
        const insert = this.db.prepare(
            `INSERT INTO StepRecords (id, run_id, step_index, committed, utilities, failures, observation_snapshot, rewards, done, metrics)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        );
        return {
            record: (entry: TelemetryRecord) => {
                insert.run(
                    uuidv4(),
                    runId,
                    entry.step_index,
                    JSON.stringify(entry.plan_summary.committed),
                    JSON.stringify(entry.plan_summary.utilities),
                    JSON.stringify(entry.plan_summary.failures),
                    JSON.stringify(entry.observation_snapshot),
                    JSON.stringify(entry.rewards),
                    entry.done ? 1 : 0,
                    JSON.stringify(entry.metrics),
                );
            },
        };
    }

    finishRun(runId: string, outcome: RunOutcome): void {
        this.db
            .prepare(
                `UPDATE Runs SET status = ?, completion_reason = ?, error = ?, steps = ?, finished_at = datetime('now')
         WHERE id = ?`,
            )
            .run(
                outcome.status,
                outcome.status === "completed" ? outcome.reason : null,
                outcome.status === "aborted" ? outcome.error.message : null,
                outcome.steps,
                runId,
            );
    }

    getRun(runId: string): StoredRun | undefined {
        const row = this.db.prepare<[string], RunRow>("SELECT * FROM Runs WHERE id = ?").get(runId);
        if (!row) return undefined;
        return {
            id: row.id,
            label: row.label,
            seed: row.seed,
            maxSteps: row.max_steps,
            status: RunStatus.parse(row.status),
            completionReason: row.completion_reason,
            error: row.error,
            steps: row.steps,
            createdAt: row.created_at,
            finishedAt: row.finished_at,
        };
    }

    /** Records of one run, in step order. */
    getStepRecords(runId: string): TelemetryRecord[] {
        const rows = this.db
            .prepare<[string], StepRow>("SELECT * FROM StepRecords WHERE run_id = ? ORDER BY step_index ASC")
            .all(runId);
        return rows.map((row) => ({
            step_index: row.step_index,
            plan_summary: {
                committed: AgentIds.parse(JSON.parse(row.committed)),
                utilities: NumberMap.parse(JSON.parse(row.utilities)),
                failures: AgentIds.parse(JSON.parse(row.failures)),
            },
            observation_snapshot: ObservationMap.parse(JSON.parse(row.observation_snapshot)),
            rewards: NumberMap.parse(JSON.parse(row.rewards)),
            done: row.done === 1,
            metrics: NumberMap.parse(JSON.parse(row.metrics)),
        }));
    }

    /** Close the database connection. */
    close(): void {
        this.db.close();
    }

    /** Expose raw db for advanced queries in tests. */
    get raw(): Database.Database {
        return this.db;
    }
}
