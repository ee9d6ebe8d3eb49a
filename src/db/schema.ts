/**
 * mimizuku — Scan history SQLite schema
 *
 * This schema is the single source of truth for the database structure.
 */

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- ============================================================
-- スキャン 1 回分
-- ============================================================
CREATE TABLE IF NOT EXISTS scans (
  id            TEXT PRIMARY KEY,
  target        TEXT NOT NULL,
  scan_time     TEXT NOT NULL,              -- ISO 8601 (UTC)
  finished_at   TEXT NOT NULL,
  summary_json  TEXT NOT NULL               -- SeveritySummary
);

CREATE INDEX IF NOT EXISTS idx_scans_target ON scans(target);
CREATE INDEX IF NOT EXISTS idx_scans_scan_time ON scans(scan_time);

-- ============================================================
-- Probe ごとの Outcome
-- ============================================================
CREATE TABLE IF NOT EXISTS probe_outcomes (
  scan_id       TEXT NOT NULL,
  probe         TEXT NOT NULL,
  position      INTEGER NOT NULL,           -- Registry 順
  priority      TEXT NOT NULL,              -- "critical" | "high" | "medium" | "low"
  status        TEXT NOT NULL,              -- "success" | "skipped" | "error"
  detail        TEXT,                       -- skipped reason / error message
  payload_json  TEXT,                       -- success のときの payload
  duration_ms   INTEGER NOT NULL,
  PRIMARY KEY (scan_id, probe),
  FOREIGN KEY (scan_id) REFERENCES scans(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_probe_outcomes_scan ON probe_outcomes(scan_id, position);
`;
