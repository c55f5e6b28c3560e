/**
 * Runpack Store
 *
 * Persistence contract for sealed runpacks, keyed by fingerprint. Stores
 * refuse packs that fail verification and re-verify what they read back.
 */

import { StoreError } from '../errors/index.ts';
import type { RunId, ScenarioId } from '../identifiers/index.ts';
import { deserializeRunpack, serializeRunpack, verifyRunpack, type SealedRunpack } from '../runpack/index.ts';

// =============================================================================
// Types
// =============================================================================

export interface RunpackSummary {
  fingerprint: string;
  scenarioId: ScenarioId;
  runId: RunId;
  specHash: string;
  stepCount: number;
  /** ISO 8601 */
  createdAt: string;
}

export interface RunpackStore {
  /** Idempotent for a fingerprint already stored */
  putRunpack(pack: SealedRunpack): Promise<void>;
  getRunpack(fingerprint: string): Promise<SealedRunpack>;
  listRunpacks?(scenarioId: string): Promise<RunpackSummary[]>;
}

// =============================================================================
// Shared Checks
// =============================================================================

/**
 * Throw StoreError('corrupt') unless the pack's chain verifies.
 */
export function assertVerified(pack: SealedRunpack, context: string): void {
  const result = verifyRunpack(pack);
  if (!result.valid) {
    const at = result.brokenAtSeq !== undefined ? ` at step ${result.brokenAtSeq}` : '';
    throw new StoreError('corrupt', `${context}: runpack failed verification${at}: ${result.error ?? 'invalid'}`);
  }
}

/**
 * Decode a stored body and verify it.
 */
export function readVerified(body: string, fingerprint: string): SealedRunpack {
  const pack = deserializeRunpack(body);
  if (pack.fingerprint !== fingerprint) {
    throw new StoreError('corrupt', `Stored runpack ${fingerprint} carries fingerprint ${pack.fingerprint}`);
  }
  assertVerified(pack, `Runpack ${fingerprint}`);
  return pack;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export interface StoredRunpack {
  summary: RunpackSummary;
  body: string;
}

export class InMemoryRunpackStore implements RunpackStore {
  protected readonly rows = new Map<string, StoredRunpack>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async putRunpack(pack: SealedRunpack): Promise<void> {
    assertVerified(pack, 'Refusing to store');
    if (this.rows.has(pack.fingerprint)) return;
    this.rows.set(pack.fingerprint, {
      summary: {
        fingerprint: pack.fingerprint,
        scenarioId: pack.scenarioId,
        runId: pack.runId,
        specHash: pack.specHash,
        stepCount: pack.steps.length,
        createdAt: this.now().toISOString(),
      },
      body: serializeRunpack(pack),
    });
  }

  async getRunpack(fingerprint: string): Promise<SealedRunpack> {
    const row = this.rows.get(fingerprint);
    if (row === undefined) {
      throw new StoreError('not_found', `Runpack not found: ${fingerprint}`);
    }
    return readVerified(row.body, fingerprint);
  }

  async listRunpacks(scenarioId: string): Promise<RunpackSummary[]> {
    return [...this.rows.values()]
      .filter((row) => row.summary.scenarioId === scenarioId)
      .map((row) => ({ ...row.summary }));
  }
}
