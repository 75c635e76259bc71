// src/kernel_store.ts
//
// SQLite-backed coordination state shared by every kernel process:
// - Run registry (one row per run, finished exactly once)
// - Interop request states with compare-and-swap transitions
// - Per-run read usage for the cumulative read budget
// - Forward-compatible schema migrations (schema_version)
//
// Files under the state root stay the source of truth for documents
// (request/response JSON, capsules, manifests); this database only
// arbitrates who may write them.

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';

import { TIMEOUTS } from './config';
import { createLogger } from './logger';
import { errnoCode } from './output_writer';
import { StorageError } from './structured_error';
import type { RequestState, Run } from './kernel_types';

const log = createLogger('store');

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Row types                                                                  */
/* -------------------------------------------------------------------------- */

interface RunRow {
  run_id: string;
  pipeline_kind: string;
  phase: string;
  parent_run_id: string | null;
  started_at: string;
  ended_at: string | null;
  exit_code: number | null;
  run_dir: string;
  args_json: string;
}

interface RequestRow {
  request_id: string;
  from_pipeline: string;
  to_pipeline: string;
  action: string;
  parent_run_id: string;
  state: string;
  enqueued_at: string;
  claimed_at: string | null;
  claimed_by: string | null;
  completed_at: string | null;
  child_run_id: string | null;
  request_path: string;
  response_path: string | null;
}

export interface RunRecord extends Run {
  run_dir: string;
}

export interface RequestRecord {
  request_id: string;
  from_pipeline: string;
  to_pipeline: string;
  action: string;
  parent_run_id: string;
  state: RequestState;
  enqueued_at: string;
  claimed_at?: string;
  claimed_by?: string;
  completed_at?: string;
  child_run_id?: string;
  request_path: string;
  response_path?: string;
}

export interface ReadUsage {
  unique_files: number;
  total_bytes: number;
  already_counted: boolean;
}

export interface RequestTransition {
  claimed_by?: string;
  claimed_at?: string;
  completed_at?: string;
  child_run_id?: string;
  response_path?: string;
}

const REQUEST_STATES: readonly RequestState[] = ['queued', 'running', 'ok', 'blocked', 'failed'];

function isRequestState(s: string): s is RequestState {
  return REQUEST_STATES.some((r) => r === s);
}

/* -------------------------------------------------------------------------- */
/* SQLITE_BUSY retry                                                          */
/* -------------------------------------------------------------------------- */

function sleepMs(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function sqliteIsBusyError(e: unknown): boolean {
  const code = errnoCode(e) ?? '';
  const msg = e instanceof Error ? e.message : '';
  return code.startsWith('SQLITE_BUSY') || msg.includes('database is locked');
}

export function withSqliteRetry<T>(fn: () => T, maxAttempts = 3): T {
  let attempt = 1;
  while (true) {
    try {
      return fn();
    } catch (e: unknown) {
      if (sqliteIsBusyError(e) && attempt < maxAttempts) {
        sleepMs(50 * attempt);
        attempt++;
        continue;
      }
      throw e;
    }
  }
}

/* -------------------------------------------------------------------------- */
/* Store                                                                      */
/* -------------------------------------------------------------------------- */

export class KernelStore {
  private readonly db: Database.Database;

  constructor(public readonly dbPath: string) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    try {
      this.db = new Database(dbPath);
    } catch (e: unknown) {
      throw new StorageError(`Cannot open kernel database ${dbPath}`, e);
    }
    this.configureDatabase();
    this.runMigrations();
    this.integrityCheck();
  }

  close(): void {
    this.db.close();
  }

  /** Run `fn` inside BEGIN IMMEDIATE so concurrent writers serialize on the database lock. */
  immediate<T>(fn: () => T): T {
    return withSqliteRetry(() => this.db.transaction(fn).immediate());
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = FULL');
    this.db.pragma(`busy_timeout = ${TIMEOUTS.SQLITE_BUSY_MS}`);
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        )
      `);

      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();
      const current = row?.version ?? 0;

      if (current > SCHEMA_VERSION) {
        throw new StorageError(`Kernel database schema v${current} is newer than supported v${SCHEMA_VERSION}`);
      }

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS runs (
            run_id TEXT PRIMARY KEY,
            pipeline_kind TEXT NOT NULL,
            phase TEXT NOT NULL,
            parent_run_id TEXT,
            started_at TEXT NOT NULL,
            ended_at TEXT,
            exit_code INTEGER,
            run_dir TEXT NOT NULL,
            args_json TEXT NOT NULL DEFAULT '[]'
          );

          CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

          CREATE TABLE IF NOT EXISTS interop_requests (
            request_id TEXT PRIMARY KEY,
            from_pipeline TEXT NOT NULL,
            to_pipeline TEXT NOT NULL,
            action TEXT NOT NULL,
            parent_run_id TEXT NOT NULL,
            state TEXT NOT NULL CHECK(state IN ('queued','running','ok','blocked','failed')),
            enqueued_at TEXT NOT NULL,
            claimed_at TEXT,
            claimed_by TEXT,
            completed_at TEXT,
            child_run_id TEXT,
            request_path TEXT NOT NULL,
            response_path TEXT
          );

          CREATE INDEX IF NOT EXISTS idx_interop_state ON interop_requests(state, enqueued_at);

          CREATE TABLE IF NOT EXISTS read_usage (
            run_id TEXT NOT NULL,
            path TEXT NOT NULL,
            bytes INTEGER NOT NULL CHECK(bytes >= 0),
            read_at TEXT NOT NULL,
            PRIMARY KEY (run_id, path)
          );
        `);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
        log.debug('Applied schema v1', { db: this.dbPath });
      }
    });

    withSqliteRetry(() => tx.immediate());
  }

  /* ------------------------------------------------------------------------ */
  /* Integrity                                                                */
  /* ------------------------------------------------------------------------ */

  private integrityCheck(): void {
    const result = this.db.pragma('quick_check', { simple: true });
    if (result !== 'ok') {
      throw new StorageError(`Kernel database integrity check failed: ${String(result)}`);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Runs                                                                     */
  /* ------------------------------------------------------------------------ */

  insertRun(run: Run, runDir: string): void {
    withSqliteRetry(() =>
      this.db
        .prepare<[string, string, string, string | null, string, string, string]>(
          `INSERT INTO runs (run_id, pipeline_kind, phase, parent_run_id, started_at, run_dir, args_json)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          run.run_id,
          run.pipeline_kind,
          run.phase,
          run.parent_run_id ?? null,
          run.started_at,
          runDir,
          JSON.stringify(run.args)
        )
    );
  }

  /** Returns false when the run is unknown or already finished. */
  finishRun(runId: string, endedAt: string, exitCode: number): boolean {
    const info = withSqliteRetry(() =>
      this.db
        .prepare<[string, number, string]>(
          `UPDATE runs SET ended_at = ?, exit_code = ? WHERE run_id = ? AND ended_at IS NULL`
        )
        .run(endedAt, exitCode, runId)
    );
    return info.changes === 1;
  }

  getRun(runId: string): RunRecord | undefined {
    const row = withSqliteRetry(() =>
      this.db.prepare<[string], RunRow>(`SELECT * FROM runs WHERE run_id = ?`).get(runId)
    );
    return row ? toRunRecord(row) : undefined;
  }

  listRuns(limit = 50): RunRecord[] {
    const rows = withSqliteRetry(() =>
      this.db
        .prepare<[number], RunRow>(`SELECT * FROM runs ORDER BY started_at DESC, run_id DESC LIMIT ?`)
        .all(limit)
    );
    return rows.map(toRunRecord);
  }

  /* ------------------------------------------------------------------------ */
  /* Interop requests                                                         */
  /* ------------------------------------------------------------------------ */

  insertRequest(rec: Omit<RequestRecord, 'state'>): void {
    withSqliteRetry(() =>
      this.db
        .prepare<[string, string, string, string, string, string, string]>(
          `INSERT INTO interop_requests
             (request_id, from_pipeline, to_pipeline, action, parent_run_id, state, enqueued_at, request_path)
           VALUES (?, ?, ?, ?, ?, 'queued', ?, ?)`
        )
        .run(
          rec.request_id,
          rec.from_pipeline,
          rec.to_pipeline,
          rec.action,
          rec.parent_run_id,
          rec.enqueued_at,
          rec.request_path
        )
    );
  }

  /** Compare-and-swap on the request state. True only for the caller that moved it. */
  transitionRequest(requestId: string, from: RequestState, to: RequestState, fields: RequestTransition = {}): boolean {
    const info = withSqliteRetry(() =>
      this.db
        .prepare<[string, string | null, string | null, string | null, string | null, string | null, string, string]>(
          `UPDATE interop_requests SET
             state = ?,
             claimed_by = COALESCE(?, claimed_by),
             claimed_at = COALESCE(?, claimed_at),
             completed_at = COALESCE(?, completed_at),
             child_run_id = COALESCE(?, child_run_id),
             response_path = COALESCE(?, response_path)
           WHERE request_id = ? AND state = ?`
        )
        .run(
          to,
          fields.claimed_by ?? null,
          fields.claimed_at ?? null,
          fields.completed_at ?? null,
          fields.child_run_id ?? null,
          fields.response_path ?? null,
          requestId,
          from
        )
    );
    return info.changes === 1;
  }

  getRequest(requestId: string): RequestRecord | undefined {
    const row = withSqliteRetry(() =>
      this.db.prepare<[string], RequestRow>(`SELECT * FROM interop_requests WHERE request_id = ?`).get(requestId)
    );
    return row ? toRequestRecord(row) : undefined;
  }

  oldestQueued(): string | undefined {
    const row = withSqliteRetry(() =>
      this.db
        .prepare<[], { request_id: string }>(
          `SELECT request_id FROM interop_requests WHERE state = 'queued' ORDER BY enqueued_at, rowid LIMIT 1`
        )
        .get()
    );
    return row?.request_id;
  }

  listRequests(state?: RequestState): RequestRecord[] {
    const rows = withSqliteRetry(() =>
      state
        ? this.db
            .prepare<[string], RequestRow>(`SELECT * FROM interop_requests WHERE state = ? ORDER BY enqueued_at, rowid`)
            .all(state)
        : this.db.prepare<[], RequestRow>(`SELECT * FROM interop_requests ORDER BY enqueued_at, rowid`).all()
    );
    return rows.map(toRequestRecord);
  }

  /* ------------------------------------------------------------------------ */
  /* Read usage                                                               */
  /* ------------------------------------------------------------------------ */

  readUsage(runId: string, filePath?: string): ReadUsage {
    const totals = this.db
      .prepare<[string], { n: number; total: number }>(
        `SELECT COUNT(*) AS n, COALESCE(SUM(bytes), 0) AS total FROM read_usage WHERE run_id = ?`
      )
      .get(runId);
    const seen =
      filePath !== undefined &&
      this.db
        .prepare<[string, string], { path: string }>(`SELECT path FROM read_usage WHERE run_id = ? AND path = ?`)
        .get(runId, filePath) !== undefined;
    return {
      unique_files: totals?.n ?? 0,
      total_bytes: totals?.total ?? 0,
      already_counted: seen,
    };
  }

  recordRead(runId: string, filePath: string, bytes: number, readAt: string): void {
    this.db
      .prepare<[string, string, number, string]>(
        `INSERT OR IGNORE INTO read_usage (run_id, path, bytes, read_at) VALUES (?, ?, ?, ?)`
      )
      .run(runId, filePath, bytes, readAt);
  }
}

function toRunRecord(row: RunRow): RunRecord {
  const args: unknown = JSON.parse(row.args_json);
  const run: RunRecord = {
    run_id: row.run_id,
    pipeline_kind: row.pipeline_kind,
    phase: row.phase,
    started_at: row.started_at,
    args: Array.isArray(args) ? args.map((a) => String(a)) : [],
    run_dir: row.run_dir,
  };
  if (row.ended_at !== null) run.ended_at = row.ended_at;
  if (row.exit_code !== null) run.exit_code = row.exit_code;
  if (row.parent_run_id !== null) run.parent_run_id = row.parent_run_id;
  return run;
}

function toRequestRecord(row: RequestRow): RequestRecord {
  if (!isRequestState(row.state)) {
    throw new StorageError(`Request ${row.request_id} has unknown state ${row.state}`);
  }
  const rec: RequestRecord = {
    request_id: row.request_id,
    from_pipeline: row.from_pipeline,
    to_pipeline: row.to_pipeline,
    action: row.action,
    parent_run_id: row.parent_run_id,
    state: row.state,
    enqueued_at: row.enqueued_at,
    request_path: row.request_path,
  };
  if (row.claimed_at !== null) rec.claimed_at = row.claimed_at;
  if (row.claimed_by !== null) rec.claimed_by = row.claimed_by;
  if (row.completed_at !== null) rec.completed_at = row.completed_at;
  if (row.child_run_id !== null) rec.child_run_id = row.child_run_id;
  if (row.response_path !== null) rec.response_path = row.response_path;
  return rec;
}
