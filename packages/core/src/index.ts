/**
 * @gatehouse/core
 *
 * Evidence-gated decisions: scenario specs, tri-state requirement logic,
 * evidence orchestration and hash-chained runpacks.
 */

// Errors
export * from './errors/index.ts';

// Logger
export * from './logger/index.ts';

// Config
export * from './config/index.ts';

// Identifiers and evidence values
export * from './identifiers/index.ts';
export * from './values/index.ts';

// Canonical hashing
export * from './hashing/index.ts';

// Requirement logic and comparison
export * from './ret-logic/index.ts';
export * from './comparator/index.ts';

// Scenario specs
export * from './spec/index.ts';

// Providers and orchestration
export * from './providers/index.ts';
export * from './orchestration/index.ts';
export * from './cancellation/index.ts';

// Runpacks and storage
export * from './runpack/index.ts';
export * from './store/index.ts';

// Engine
export * from './engine/index.ts';
