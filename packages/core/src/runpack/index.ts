/**
 * Runpacks
 *
 * The tamper-evident record of one gate run: an append-only chain of
 * frozen steps where each step hashes its predecessor. The first step
 * chains from a hash of the pack header, so editing the header breaks the
 * chain as well. A sealed pack's fingerprint is its terminal step's hash.
 */

import { z } from 'zod';
import { LifecycleError, StoreError, errorMessage } from '../errors/index.ts';
import { canonicalJson, deepFreeze, hashCanonical } from '../hashing/index.ts';
import type { RunId, ScenarioId } from '../identifiers/index.ts';
import { identifierSchema } from '../spec/index.ts';

// =============================================================================
// Types
// =============================================================================

export const RUNPACK_FORMAT = 'gatehouse.runpack/v1' as const;

export const STEP_KINDS = [
  'spec_loaded',
  'evidence_fetched',
  'condition_evaluated',
  'decided',
  'blocked',
  'failed',
] as const;

export type StepKind = (typeof STEP_KINDS)[number];

export type RunpackPayload = Readonly<Record<string, unknown>>;

export interface RunpackStep {
  readonly seq: number;
  readonly kind: StepKind;
  readonly payload: RunpackPayload;
  readonly prevHash: string;
  readonly hash: string;
}

export interface RunpackHeader {
  readonly scenarioId: ScenarioId;
  readonly runId: RunId;
  readonly specHash: string;
}

export interface SealedRunpack extends RunpackHeader {
  readonly format: typeof RUNPACK_FORMAT;
  readonly steps: readonly RunpackStep[];
  /** Hash of the terminal step */
  readonly fingerprint: string;
}

export interface VerificationResult {
  valid: boolean;
  length: number;
  brokenAtSeq?: number;
  error?: string;
}

export type RecorderState = 'open' | 'sealed' | 'discarded';

// =============================================================================
// Hashing
// =============================================================================

export function genesisHash(header: RunpackHeader): string {
  return hashCanonical({
    format: RUNPACK_FORMAT,
    scenarioId: header.scenarioId,
    runId: header.runId,
    specHash: header.specHash,
  });
}

export function stepHash(step: Omit<RunpackStep, 'hash'>): string {
  return hashCanonical({ seq: step.seq, kind: step.kind, payload: step.payload, prevHash: step.prevHash });
}

// =============================================================================
// Recorder
// =============================================================================

export class RunpackRecorder {
  private readonly header: RunpackHeader;
  private readonly steps: RunpackStep[] = [];
  private status: RecorderState = 'open';

  constructor(header: RunpackHeader) {
    this.header = Object.freeze({ ...header });
  }

  get state(): RecorderState {
    return this.status;
  }

  get length(): number {
    return this.steps.length;
  }

  /**
   * Append a step. The payload must survive canonical JSON serialization
   * and is frozen in place.
   */
  append(kind: StepKind, payload: RunpackPayload): RunpackStep {
    if (this.status !== 'open') {
      throw new LifecycleError('post_seal_append', `Cannot append ${kind} to a ${this.status} runpack`);
    }
    const prev = this.steps[this.steps.length - 1];
    const body = {
      seq: this.steps.length,
      kind,
      payload: deepFreeze(payload),
      prevHash: prev === undefined ? genesisHash(this.header) : prev.hash,
    };
    const step: RunpackStep = Object.freeze({ ...body, hash: stepHash(body) });
    this.steps.push(step);
    return step;
  }

  seal(): SealedRunpack {
    if (this.status !== 'open') {
      throw new LifecycleError('invalid_transition', `Cannot seal a ${this.status} runpack`);
    }
    const last = this.steps[this.steps.length - 1];
    if (last === undefined) {
      throw new LifecycleError('invalid_transition', 'Cannot seal an empty runpack');
    }
    this.status = 'sealed';
    return Object.freeze({
      format: RUNPACK_FORMAT,
      ...this.header,
      steps: Object.freeze([...this.steps]),
      fingerprint: last.hash,
    });
  }

  /** Drop every step; the recorder accepts nothing afterwards */
  discard(): void {
    this.status = 'discarded';
    this.steps.length = 0;
  }
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Recompute the chain. Reports the first step whose seq, link or hash does
 * not match; a fingerprint mismatch is reported at the last step.
 */
export function verifyRunpack(pack: SealedRunpack): VerificationResult {
  const length = pack.steps.length;
  if (pack.format !== RUNPACK_FORMAT) {
    return { valid: false, length, error: `Unsupported runpack format: ${String(pack.format)}` };
  }
  if (length === 0) {
    return { valid: false, length, error: 'Runpack has no steps' };
  }

  let prevHash = genesisHash(pack);
  for (const [index, step] of pack.steps.entries()) {
    if (step.seq !== index) {
      return { valid: false, length, brokenAtSeq: index, error: `Step ${index} has seq ${step.seq}` };
    }
    if (step.prevHash !== prevHash) {
      return { valid: false, length, brokenAtSeq: index, error: `Step ${index} does not link to its predecessor` };
    }
    let expected: string;
    try {
      expected = stepHash(step);
    } catch (err) {
      return { valid: false, length, brokenAtSeq: index, error: `Step ${index} cannot be hashed: ${errorMessage(err)}` };
    }
    if (step.hash !== expected) {
      return { valid: false, length, brokenAtSeq: index, error: `Step ${index} hash mismatch` };
    }
    prevHash = step.hash;
  }

  if (pack.fingerprint !== prevHash) {
    return { valid: false, length, brokenAtSeq: length - 1, error: 'Fingerprint does not match the terminal step' };
  }
  return { valid: true, length };
}

// =============================================================================
// Serialization
// =============================================================================

const HASH_PATTERN = /^[0-9a-f]{64}$/;

const runpackSchema = z
  .object({
    format: z.literal(RUNPACK_FORMAT),
    scenarioId: identifierSchema('scenario'),
    runId: identifierSchema('run'),
    specHash: z.string().regex(HASH_PATTERN),
    steps: z.array(
      z
        .object({
          seq: z.number().int().min(0),
          kind: z.enum(STEP_KINDS),
          payload: z.record(z.unknown()),
          prevHash: z.string().regex(HASH_PATTERN),
          hash: z.string().regex(HASH_PATTERN),
        })
        .strict()
    ),
    fingerprint: z.string().regex(HASH_PATTERN),
  })
  .strict();

export function serializeRunpack(pack: SealedRunpack): string {
  return canonicalJson(pack);
}

/**
 * Parse a serialized runpack. Structure is checked; the hash chain is not,
 * so callers decide whether to run verifyRunpack.
 */
export function deserializeRunpack(text: string): SealedRunpack {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StoreError('corrupt', `Runpack is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = runpackSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new StoreError('corrupt', `Malformed runpack${where}: ${issue?.message ?? 'invalid'}`);
  }
  const pack: SealedRunpack = parsed.data;
  return deepFreeze(pack);
}
