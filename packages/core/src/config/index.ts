/**
 * Configuration validation module
 *
 * Provides runtime validation for environment variables with
 * type safety, format validation, and helpful error messages, and loads
 * the engine-wide defaults and ceilings from `GATEHOUSE_*` variables.
 */

import { GateError } from '../errors/index.ts';
import { createLogger } from '../logger/index.ts';

const log = createLogger({ name: 'gatehouse:config' });

/** Environment variables as a plain string map */
export type Env = Readonly<Record<string, string | undefined>>;

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  value?: string;
  error?: string;
}

/** Configuration value types */
export type ConfigType = 'string' | 'number' | 'boolean' | 'path';

/** Configuration field definition */
export interface ConfigField {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: ConfigType;
  /** Whether the field is required */
  required: boolean;
  /** Default value if not provided */
  default?: string;
  /** Custom validation function */
  validate?: (value: string) => ValidationResult;
  /** Description for error messages */
  description?: string;
}

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Validate an integer
 */
export function validateNumber(
  value: string,
  options?: { min?: number; max?: number }
): ValidationResult {
  const trimmed = value.trim();
  const num = Number.parseInt(trimmed, 10);
  if (!INTEGER_PATTERN.test(trimmed) || !Number.isSafeInteger(num)) {
    return { valid: false, error: `Invalid number: ${value}` };
  }
  if (options?.min !== undefined && num < options.min) {
    return { valid: false, error: `Value ${num} is less than minimum ${options.min}` };
  }
  if (options?.max !== undefined && num > options.max) {
    return { valid: false, error: `Value ${num} is greater than maximum ${options.max}` };
  }
  return { valid: true, value: trimmed };
}

/**
 * Validate a boolean
 */
export function validateBoolean(value: string): ValidationResult {
  const lower = value.toLowerCase();
  if (!['true', 'false', '1', '0', 'yes', 'no'].includes(lower)) {
    return { valid: false, error: `Invalid boolean: ${value}` };
  }
  return { valid: true, value };
}

/**
 * Validate a file path (basic check)
 */
export function validatePath(value: string): ValidationResult {
  if (value.length === 0) {
    return { valid: false, error: 'Path cannot be empty' };
  }
  if (value.includes('\0')) {
    return { valid: false, error: 'Path cannot contain null bytes' };
  }
  return { valid: true, value };
}

/**
 * Get an environment variable with validation
 */
export function getEnv(field: ConfigField, env: Env = process.env): string {
  const value = env[field.name];

  if (value === undefined || value === '') {
    if (field.required && field.default === undefined) {
      throw new GateError(
        `Missing required environment variable: ${field.name}` +
          (field.description !== undefined ? ` (${field.description})` : ''),
        'invalid_config'
      );
    }
    if (field.default !== undefined) {
      log.debug({ name: field.name, default: field.default }, 'Using default config value');
      return field.default;
    }
    return '';
  }

  let result: ValidationResult = { valid: true, value };

  switch (field.type) {
    case 'number':
      result = validateNumber(value);
      break;
    case 'boolean':
      result = validateBoolean(value);
      break;
    case 'path':
      result = validatePath(value);
      break;
    case 'string':
      break;
  }

  if (result.valid && field.validate !== undefined) {
    result = field.validate(value);
  }

  if (!result.valid) {
    throw new GateError(
      `Invalid value for ${field.name}: ${result.error ?? 'validation failed'}` +
        (field.description !== undefined ? ` (${field.description})` : ''),
      'invalid_config'
    );
  }

  return value;
}

/**
 * Get an optional environment variable with type validation
 */
export function getOptionalEnv(
  name: string,
  defaultValue: string,
  type: ConfigType = 'string',
  env: Env = process.env
): string {
  return getEnv({ name, type, required: false, default: defaultValue }, env);
}

/**
 * Parse boolean from environment variable
 */
export function parseBoolean(value: string): boolean {
  const lower = value.toLowerCase();
  return ['true', '1', 'yes'].includes(lower);
}

/**
 * Parse integer from environment variable
 */
export function parseIntValue(value: string, fallback: number): number {
  const num = Number.parseInt(value, 10);
  return Number.isNaN(num) ? fallback : num;
}

/**
 * Validate all configuration at startup and log warnings
 */
export function validateConfig(fields: ConfigField[], env: Env = process.env): Map<string, string> {
  const config = new Map<string, string>();
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const field of fields) {
    try {
      const value = getEnv(field, env);
      config.set(field.name, value);

      if (value === '' && !field.required) {
        warnings.push(`${field.name} is empty (using default or blank)`);
      }
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      errors.push(err.message);
    }
  }

  for (const warning of warnings) {
    log.warn({ warning }, 'Config warning');
  }

  if (errors.length > 0) {
    throw new GateError(`Configuration errors:\n  - ${errors.join('\n  - ')}`, 'invalid_config');
  }

  return config;
}

// =============================================================================
// Engine Config
// =============================================================================

/** Engine-wide defaults; also the ceilings a scenario's own limits must respect */
export interface EngineConfig {
  maxParallelism: number;
  providerTimeoutMs: number;
  budgetMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxEvidence: number;
  maxTreeDepth: number;
  maxTreeNodes: number;
}

interface EngineField {
  key: keyof EngineConfig;
  name: string;
  min: number;
  max: number;
  description: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  maxParallelism: 8,
  providerTimeoutMs: 5000,
  budgetMs: 30000,
  maxRetries: 0,
  retryDelayMs: 100,
  maxEvidence: 64,
  maxTreeDepth: 32,
  maxTreeNodes: 1024,
});

const ENGINE_FIELDS: readonly EngineField[] = [
  { key: 'maxParallelism', name: 'GATEHOUSE_MAX_PARALLELISM', min: 1, max: 256, description: 'concurrent provider calls' },
  { key: 'providerTimeoutMs', name: 'GATEHOUSE_PROVIDER_TIMEOUT_MS', min: 1, max: 600_000, description: 'per-attempt provider timeout' },
  { key: 'budgetMs', name: 'GATEHOUSE_BUDGET_MS', min: 1, max: 3_600_000, description: 'evidence fan-out budget' },
  { key: 'maxRetries', name: 'GATEHOUSE_MAX_RETRIES', min: 0, max: 10, description: 'retries for transient provider errors' },
  { key: 'retryDelayMs', name: 'GATEHOUSE_RETRY_DELAY_MS', min: 0, max: 60_000, description: 'delay between retries' },
  { key: 'maxEvidence', name: 'GATEHOUSE_MAX_EVIDENCE', min: 1, max: 4096, description: 'evidence bindings per scenario' },
  { key: 'maxTreeDepth', name: 'GATEHOUSE_MAX_TREE_DEPTH', min: 1, max: 256, description: 'requirement tree depth' },
  { key: 'maxTreeNodes', name: 'GATEHOUSE_MAX_TREE_NODES', min: 1, max: 65_536, description: 'requirement tree nodes' },
];

/**
 * Load engine configuration from the environment. Every variable is
 * optional; all problems are reported together.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const fields = ENGINE_FIELDS.map((field): ConfigField => ({
    name: field.name,
    type: 'number',
    required: false,
    default: String(DEFAULT_ENGINE_CONFIG[field.key]),
    description: field.description,
    validate: (value: string) => validateNumber(value, { min: field.min, max: field.max }),
  }));
  const values = validateConfig(fields, env);

  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };
  for (const field of ENGINE_FIELDS) {
    config[field.key] = parseIntValue(values.get(field.name) ?? '', DEFAULT_ENGINE_CONFIG[field.key]);
  }
  return config;
}

/**
 * Apply programmatic overrides on top of a base configuration, enforcing
 * the same bounds as the environment variables.
 */
export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  base: EngineConfig = loadEngineConfig()
): EngineConfig {
  const config: EngineConfig = { ...base };
  const errors: string[] = [];

  for (const field of ENGINE_FIELDS) {
    const value = overrides[field.key];
    if (value === undefined) continue;
    if (!Number.isSafeInteger(value) || value < field.min || value > field.max) {
      errors.push(`${field.key} must be an integer in ${field.min}..${field.max}, got ${value}`);
      continue;
    }
    config[field.key] = value;
  }

  if (errors.length > 0) {
    throw new GateError(`Configuration errors:\n  - ${errors.join('\n  - ')}`, 'invalid_config');
  }
  return config;
}

/**
 * Path of the SQLite runpack store.
 */
export function getStorePath(env: Env = process.env): string {
  return getOptionalEnv('GATEHOUSE_STORE_PATH', 'gatehouse.db', 'path', env);
}
