/**
 * Migration registry
 *
 * Migrations are forward-only and applied in version order.
 */

import type { Database } from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => void;
}

const migration001: Migration = {
  version: 1,
  name: 'initial_schema',
  up: (db) => {
    db.exec(`
      CREATE TABLE runpacks (
        fingerprint TEXT PRIMARY KEY,
        scenario_id TEXT NOT NULL,
        run_id TEXT NOT NULL,
        spec_hash TEXT NOT NULL,
        step_count INTEGER NOT NULL,
        body TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX idx_runpacks_scenario ON runpacks (scenario_id, created_at);
      CREATE INDEX idx_runpacks_run ON runpacks (run_id);
    `);
  },
};

export const migrations: Migration[] = [migration001];
