import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import { z } from 'zod';
import type { FindScansOptions, StoredProbeOutcome, StoredScan } from '../../types/entities.js';
import type { ProbeOutcome, ScanResult } from '../../types/probe.js';
import { PRIORITIES, isProbePayload } from '../../types/probe.js';
import type { AggregatedReport, SeveritySummary } from '../../types/report.js';

/** Row shape returned by better-sqlite3 for the scans table. */
interface ScanRow {
  id: string;
  target: string;
  scan_time: string;
  finished_at: string;
  summary_json: string;
  probe_count: number;
}

/** Row shape returned by better-sqlite3 for the probe_outcomes table. */
interface OutcomeRow {
  scan_id: string;
  probe: string;
  position: number;
  priority: string;
  status: string;
  detail: string | null;
  payload_json: string | null;
  duration_ms: number;
}

const severitySummarySchema: z.ZodType<SeveritySummary> = z.object({
  critical: z.number().int().nonnegative(),
  high: z.number().int().nonnegative(),
  medium: z.number().int().nonnegative(),
  low: z.number().int().nonnegative(),
  info: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

const prioritySchema = z.enum(PRIORITIES);
const statusSchema = z.enum(['success', 'skipped', 'error']);

const SCAN_COLUMNS = `s.id, s.target, s.scan_time, s.finished_at, s.summary_json,
  (SELECT COUNT(*) FROM probe_outcomes o WHERE o.scan_id = s.id) AS probe_count`;

/** Maps a snake_case DB row to a camelCase StoredScan entity. */
function rowToScan(row: ScanRow): StoredScan {
  return {
    id: row.id,
    target: row.target,
    scanTime: row.scan_time,
    finishedAt: row.finished_at,
    summary: severitySummarySchema.parse(JSON.parse(row.summary_json)),
    probeCount: row.probe_count,
  };
}

function rowToStoredOutcome(row: OutcomeRow): StoredProbeOutcome {
  return {
    scanId: row.scan_id,
    probe: row.probe,
    position: row.position,
    priority: prioritySchema.parse(row.priority),
    status: statusSchema.parse(row.status),
    ...(row.detail !== null ? { detail: row.detail } : {}),
    durationMs: row.duration_ms,
  };
}

/** Rebuilds a ProbeOutcome from its stored row. */
function rowToOutcome(row: OutcomeRow): ProbeOutcome {
  const stored = rowToStoredOutcome(row);
  const base = { priority: stored.priority, durationMs: stored.durationMs };
  switch (stored.status) {
    case 'success': {
      const data: unknown = JSON.parse(row.payload_json ?? 'null');
      if (!isProbePayload(data)) {
        throw new Error(`Stored payload for ${row.probe} is malformed`);
      }
      return { status: 'success', ...base, data };
    }
    case 'skipped':
      return { status: 'skipped', ...base, reason: stored.detail ?? '' };
    case 'error':
      return { status: 'error', ...base, error: stored.detail ?? '' };
  }
}

function outcomeDetail(outcome: ProbeOutcome): string | null {
  switch (outcome.status) {
    case 'success':
      return null;
    case 'skipped':
      return outcome.reason;
    case 'error':
      return outcome.error;
  }
}

/**
 * Repository for the `scans` and `probe_outcomes` tables.
 *
 * Provides persistence of ScanResult with camelCase ↔ snake_case mapping
 * between the TypeScript entity layer and the SQLite storage layer.
 */
export class ScanRepository {
  private readonly db: Database.Database;

  private readonly insertScanStmt: Database.Statement<[string, string, string, string, string]>;
  private readonly insertOutcomeStmt: Database.Statement<
    [string, string, number, string, string, string | null, string | null, number]
  >;
  private readonly selectByIdStmt: Database.Statement<[string], ScanRow>;
  private readonly selectAllStmt: Database.Statement<[{ target: string | null; limit: number }], ScanRow>;
  private readonly selectOutcomesStmt: Database.Statement<[string], OutcomeRow>;

  constructor(db: Database.Database) {
    this.db = db;

    this.insertScanStmt = this.db.prepare<[string, string, string, string, string]>(
      'INSERT INTO scans (id, target, scan_time, finished_at, summary_json) VALUES (?, ?, ?, ?, ?)',
    );

    this.insertOutcomeStmt = this.db.prepare<
      [string, string, number, string, string, string | null, string | null, number]
    >(
      `INSERT INTO probe_outcomes
         (scan_id, probe, position, priority, status, detail, payload_json, duration_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    this.selectByIdStmt = this.db.prepare<[string], ScanRow>(`SELECT ${SCAN_COLUMNS} FROM scans s WHERE s.id = ?`);

    this.selectAllStmt = this.db.prepare<{ target: string | null; limit: number }, ScanRow>(
      `SELECT ${SCAN_COLUMNS} FROM scans s
       WHERE (@target IS NULL OR s.target = @target)
       ORDER BY s.scan_time DESC, s.rowid DESC
       LIMIT @limit`,
    );

    this.selectOutcomesStmt = this.db.prepare<[string], OutcomeRow>(
      `SELECT scan_id, probe, position, priority, status, detail, payload_json, duration_ms
       FROM probe_outcomes WHERE scan_id = ? ORDER BY position`,
    );
  }

  /** Store a finished scan with all its outcomes and return the entity. */
  save(result: ScanResult, report: AggregatedReport, finishedAt: string): StoredScan {
    const id = crypto.randomUUID();
    const entries = Object.entries(result.probes);

    const insert = this.db.transaction(() => {
      this.insertScanStmt.run(id, result.target, result.scanTime, finishedAt, JSON.stringify(report.summary));
      entries.forEach(([probe, outcome], position) => {
        this.insertOutcomeStmt.run(
          id,
          probe,
          position,
          outcome.priority,
          outcome.status,
          outcomeDetail(outcome),
          outcome.status === 'success' ? JSON.stringify(outcome.data) : null,
          outcome.durationMs,
        );
      });
    });
    insert();

    return {
      id,
      target: result.target,
      scanTime: result.scanTime,
      finishedAt,
      summary: { ...report.summary },
      probeCount: entries.length,
    };
  }

  /** Find a stored scan by its UUID. Returns undefined if not found. */
  findById(id: string): StoredScan | undefined {
    const row = this.selectByIdStmt.get(id);
    if (row === undefined) {
      return undefined;
    }
    return rowToScan(row);
  }

  /** Return stored scans, newest first. */
  findAll(options: FindScansOptions = {}): StoredScan[] {
    const rows = this.selectAllStmt.all({ target: options.target ?? null, limit: options.limit ?? -1 });
    return rows.map(rowToScan);
  }

  /** Per-probe rows of a stored scan in registry order. */
  findOutcomes(scanId: string): StoredProbeOutcome[] {
    return this.selectOutcomesStmt.all(scanId).map(rowToStoredOutcome);
  }

  /** Rebuild the ScanResult of a stored scan (keys in original order). */
  loadResult(id: string): ScanResult | undefined {
    const scan = this.findById(id);
    if (scan === undefined) {
      return undefined;
    }
    const probes: Record<string, ProbeOutcome> = {};
    for (const row of this.selectOutcomesStmt.all(id)) {
      probes[row.probe] = rowToOutcome(row);
    }
    return { target: scan.target, scanTime: scan.scanTime, probes: Object.freeze(probes) };
  }
}
