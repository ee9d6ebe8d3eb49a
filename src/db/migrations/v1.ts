/**
 * Migration v1: Create scan history tables
 *
 * scans / probe_outcomes テーブルを作成する。
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';
import { SCHEMA_SQL } from '../schema.js';

const migration: Migration = {
  version: 1,
  description: 'Create scans and probe_outcomes tables',
  up(db: Database.Database): void {
    db.exec(SCHEMA_SQL);
  },
};

export default migration;
