import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'initial-schema',
  up(db) {
    // ── Agent executions (append-only history) ───────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS agent_executions (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id      TEXT NOT NULL,
        agent_name  TEXT NOT NULL,
        status      TEXT NOT NULL,
        output      TEXT,
        metrics     TEXT NOT NULL DEFAULT '{}',
        errors      TEXT NOT NULL DEFAULT '[]',
        metadata    TEXT NOT NULL DEFAULT '{}',
        timestamp   TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_executions_agent ON agent_executions(agent_name, id)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_executions_run ON agent_executions(run_id)');

    // ── Ingestion checkpoints ────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        id          TEXT PRIMARY KEY,
        last_row    INTEGER NOT NULL CHECK (last_row >= 0),
        updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    // ── Traces ───────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS traces (
        trace_id      TEXT PRIMARY KEY,
        subject       TEXT NOT NULL,
        started_at    TEXT NOT NULL,
        completed_at  TEXT,
        duration_ms   REAL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_traces_started ON traces(started_at)');

    db.exec(`
      CREATE TABLE IF NOT EXISTS trace_spans (
        id              TEXT PRIMARY KEY,
        trace_id        TEXT NOT NULL REFERENCES traces(trace_id) ON DELETE CASCADE,
        parent_span_id  TEXT,
        name            TEXT NOT NULL,
        start_time      REAL NOT NULL,
        end_time        REAL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_spans_trace ON trace_spans(trace_id)');

    db.exec(`
      CREATE TABLE IF NOT EXISTS trace_events (
        id          TEXT PRIMARY KEY,
        trace_id    TEXT NOT NULL REFERENCES traces(trace_id) ON DELETE CASCADE,
        span_id     TEXT,
        type        TEXT NOT NULL,
        timestamp   REAL NOT NULL,
        wall_clock  TEXT NOT NULL,
        duration    REAL,
        data        TEXT
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_events_trace ON trace_events(trace_id)');
  },
};
