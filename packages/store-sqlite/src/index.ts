/**
 * SQLite runpack store
 *
 * Persists sealed runpacks in a single SQLite file (or `:memory:`) with a
 * forward-only migration system. Packs are verified on write and again on
 * read.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import {
  SpecError,
  StoreError,
  assertVerified,
  componentLogger,
  errorMessage,
  getStorePath,
  readVerified,
  runId,
  scenarioId,
  serializeRunpack,
  type Logger,
  type RunpackStore,
  type RunpackSummary,
  type SealedRunpack,
} from '@gatehouse/core';
import { migrations } from './migrations.ts';

export type { DatabaseType as Database };
export { migrations, type Migration } from './migrations.ts';

export interface RunpackStoreConfig {
  /** Path to the SQLite file; defaults to GATEHOUSE_STORE_PATH */
  path?: string;
  /** Log every statement at debug level */
  verbose?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface SchemaVersion {
  version: number;
  name: string;
  applied_at: string;
}

interface RunpackRow {
  fingerprint: string;
  scenario_id: string;
  run_id: string;
  spec_hash: string;
  step_count: number;
  body: string;
  created_at: string;
}

// =============================================================================
// Schema
// =============================================================================

function runMigrations(db: DatabaseType, log: Logger): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_versions (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedVersion = getSchemaVersion(db);

  for (const migration of migrations) {
    if (migration.version <= appliedVersion) continue;
    log.info({ version: migration.version, name: migration.name }, 'Applying migration');
    db.transaction(() => {
      migration.up(db);
      db.prepare<[number, string]>('INSERT INTO schema_versions (version, name) VALUES (?, ?)').run(
        migration.version,
        migration.name
      );
    })();
  }
}

export function getSchemaVersion(db: DatabaseType): number {
  const row = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_versions').get();
  return row?.version ?? 0;
}

export function getAppliedMigrations(db: DatabaseType): SchemaVersion[] {
  return db.prepare<[], SchemaVersion>('SELECT * FROM schema_versions ORDER BY version ASC').all();
}

// =============================================================================
// Store
// =============================================================================

/** Rows holding ids that fail validation are reported as StoreError('corrupt') */
function toSummary(row: Omit<RunpackRow, 'body'>): RunpackSummary {
  try {
    return {
      fingerprint: row.fingerprint,
      scenarioId: scenarioId(row.scenario_id),
      runId: runId(row.run_id),
      specHash: row.spec_hash,
      stepCount: row.step_count,
      createdAt: row.created_at,
    };
  } catch (err) {
    if (err instanceof SpecError) {
      throw new StoreError('corrupt', `Runpack ${row.fingerprint}: ${err.message}`);
    }
    throw err;
  }
}

export class SqliteRunpackStore implements RunpackStore {
  constructor(
    readonly db: DatabaseType,
    private readonly log: Logger = componentLogger('store'),
    private readonly now: () => Date = () => new Date()
  ) {}

  async putRunpack(pack: SealedRunpack): Promise<void> {
    assertVerified(pack, 'Refusing to store');
    const inserted = this.guard(() =>
      this.db
        .prepare<[string, string, string, string, number, string, string]>(
          `INSERT OR IGNORE INTO runpacks
             (fingerprint, scenario_id, run_id, spec_hash, step_count, body, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          pack.fingerprint,
          pack.scenarioId,
          pack.runId,
          pack.specHash,
          pack.steps.length,
          serializeRunpack(pack),
          this.now().toISOString()
        )
    );
    if (inserted.changes > 0) {
      this.log.debug({ fingerprint: pack.fingerprint, runId: pack.runId }, 'Runpack stored');
    }
  }

  async getRunpack(fingerprint: string): Promise<SealedRunpack> {
    const row = this.guard(() =>
      this.db.prepare<[string], { body: string }>('SELECT body FROM runpacks WHERE fingerprint = ?').get(fingerprint)
    );
    if (row === undefined) {
      throw new StoreError('not_found', `Runpack not found: ${fingerprint}`);
    }
    return readVerified(row.body, fingerprint);
  }

  async listRunpacks(scenario: string): Promise<RunpackSummary[]> {
    const rows = this.guard(() =>
      this.db
        .prepare<[string], Omit<RunpackRow, 'body'>>(
          `SELECT fingerprint, scenario_id, run_id, spec_hash, step_count, created_at
             FROM runpacks WHERE scenario_id = ?
            ORDER BY created_at ASC, fingerprint ASC`
        )
        .all(scenario)
    );
    return rows.map(toSummary);
  }

  /** Run a statement, reporting driver failures as StoreError('io') */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreError('io', `SQLite store failed: ${errorMessage(err)}`);
    }
  }
}

/**
 * Open (or create) a store and apply pending migrations.
 */
export function openRunpackStore(config: RunpackStoreConfig = {}): SqliteRunpackStore {
  const log = componentLogger('store', config.logger);
  const path = config.path ?? getStorePath();
  const db = new Database(path, {
    verbose: config.verbose === true ? (msg: unknown) => log.debug({ sql: msg }, 'SQL') : undefined,
  });

  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  runMigrations(db, log);
  log.info({ path, version: getSchemaVersion(db) }, 'Runpack store opened');
  return new SqliteRunpackStore(db, log, config.now);
}

export function closeRunpackStore(store: SqliteRunpackStore): void {
  store.db.close();
}
