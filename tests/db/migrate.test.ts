import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../src/db/migrate.js';
import { LATEST_VERSION, getSchemaVersion } from '../../src/db/migrations/index.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

/** sqlite_master から種類ごとの名前一覧を取得する */
function objectNames(db: InstanceType<typeof Database>, type: 'table' | 'index'): string[] {
  return db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = ? AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all(type)
    .map((row) => row.name);
}

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('migrateDatabase', () => {
  let db: InstanceType<typeof Database>;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('新規 DB にテーブルとインデックスを作る', () => {
    migrateDatabase(db);

    expect(objectNames(db, 'table')).toEqual(['probe_outcomes', 'scans']);
    expect(objectNames(db, 'index')).toEqual([
      'idx_probe_outcomes_scan',
      'idx_scans_scan_time',
      'idx_scans_target',
    ]);
  });

  it('user_version を最新にする', () => {
    expect(getSchemaVersion(db)).toBe(0);
    migrateDatabase(db);
    expect(getSchemaVersion(db)).toBe(LATEST_VERSION);
    expect(LATEST_VERSION).toBe(1);
  });

  it('2 回実行しても壊れない', () => {
    migrateDatabase(db);
    db.prepare('INSERT INTO scans (id, target, scan_time, finished_at, summary_json) VALUES (?, ?, ?, ?, ?)').run(
      'scan-1',
      'example.com',
      '2024-05-01T12:00:00.000Z',
      '2024-05-01T12:01:00.000Z',
      '{}',
    );

    migrateDatabase(db);

    const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM scans').get();
    expect(row?.count).toBe(1);
  });

  it('外部キー制約が有効', () => {
    migrateDatabase(db);

    expect(() =>
      db
        .prepare(
          `INSERT INTO probe_outcomes (scan_id, probe, position, priority, status, duration_ms)
           VALUES ('missing', 'dns', 0, 'critical', 'success', 1)`,
        )
        .run(),
    ).toThrow(/FOREIGN KEY/);
  });
});
