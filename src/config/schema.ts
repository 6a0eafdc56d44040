/**
 * Config schema validation
 */

import type { Config } from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const STRING_FIELDS = ['org', 'clientId', 'clientSecret', 'domain', 'project'] as const;

export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const cfg: Record<string, unknown> = { ...config };

  if (cfg.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  for (const field of STRING_FIELDS) {
    if (cfg[field] !== undefined && typeof cfg[field] !== 'string') {
      errors.push({ path: field, message: `${field} must be a string` });
    }
  }

  if (typeof cfg.org === 'string' && !/^[a-zA-Z0-9_-]+$/.test(cfg.org)) {
    errors.push({ path: 'org', message: 'org must contain only alphanumeric characters, hyphens, and underscores' });
  }

  if (typeof cfg.domain === 'string' && cfg.domain.includes('/')) {
    errors.push({ path: 'domain', message: 'domain must be a host prefix, not a URL' });
  }

  if (cfg.timeoutMs !== undefined) {
    if (typeof cfg.timeoutMs !== 'number' || !Number.isInteger(cfg.timeoutMs) || cfg.timeoutMs <= 0) {
      errors.push({ path: 'timeoutMs', message: 'timeoutMs must be a positive integer' });
    }
  }

  return { valid: errors.length === 0, errors };
}

export function isConfig(value: unknown): value is Config {
  return validateConfig(value).valid;
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  if (!isConfig(parsed)) {
    return { config: null, errors: validateConfig(parsed).errors };
  }

  return { config: parsed, errors: [] };
}
