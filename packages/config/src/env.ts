/**
 * Environment loader for the provider's local tooling
 *
 * The Lambda runtime receives its settings from the function configuration;
 * the local invocation server and the diagnostics script load them from
 * <repo-root>/.env and <repo-root>/.env.local instead.
 * Nothing here ever logs a secret value.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>;
}

export interface EnvInitOptions {
  /** Directory to start the repo-root search from */
  cwd?: string;
}

const ROOT_PACKAGE_NAME = 's3-object-resource-provider';

const SENSITIVE_KEY_MARKERS = ['SECRET', 'TOKEN', 'PASSWORD', 'KEY'];

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  while (true) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (
          typeof pkg === 'object' &&
          pkg !== null &&
          ('workspaces' in pkg || ('name' in pkg && pkg.name === ROOT_PACKAGE_NAME))
        ) {
          return current;
        }
      } catch {
        // Unreadable package.json, keep walking
      }
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Mask a value for display: keeps 4 chars at each end of long values
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_MARKERS.some((marker) => key.includes(marker));
}

// CRLF and other control chars usually come from a .env saved on Windows
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

let cachedResult: EnvInitResult | null = null;

function loadFile(path: string, sourceName: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });

  if (result.parsed) {
    for (const [key, value] of Object.entries(result.parsed)) {
      if (value.trim().length === 0) continue;
      keySources[key] = sourceName;
      if (!keysLoaded.includes(key)) {
        keysLoaded.push(key);
      }
    }
  }

  if (result.error) {
    console.warn(`[env] Warning: Error loading ${sourceName}: ${result.error.message}`);
    return false;
  }
  return true;
}

/**
 * Load .env then .env.local (which wins) into process.env.
 *
 * A variable that is already set to a non-empty value is never replaced by an
 * empty one from a file. Subsequent calls return the first result.
 */
export function initEnv(options: EnvInitOptions = {}): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(options.cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };

  return cachedResult;
}

/**
 * Report presence of the given keys without exposing their values
 */
export function getEnvDiagnostics(keys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = cachedResult?.repoRoot ?? findRepoRoot(cwd);
  const envFilePath = cachedResult?.envFilePath ?? resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = process.env[key]?.trim();
    if (!value) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.length,
      maskedValue: isSensitiveKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of keys) {
    const value = process.env[key];
    if (!value) continue;
    if (isSensitiveKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    keys: statuses,
    warnings,
  };
}

/**
 * Check that every key is set to a non-empty value
 */
export function validateRequiredEnv(requiredKeys: readonly string[]): {
  valid: boolean;
  missing: string[];
} {
  const missing = requiredKeys.filter((key) => !process.env[key] || process.env[key]?.trim().length === 0);

  return {
    valid: missing.length === 0,
    missing,
  };
}
