/**
 * Shared environment variable loading utilities.
 * The backend reads every setting through these helpers so that defaults and
 * parsing rules stay identical across packages.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parseEnv } from 'node:util';

import { ConfigurationError } from '@avatar-studio/contracts';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
}

/**
 * Load environment variables from .env files.
 * Existing process values win unless `override` is set.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);

    let parsed: NodeJS.Dict<string>;
    try {
      parsed = parseEnv(readFileSync(file, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to parse env file ${file}`, { cause: error });
    }

    if (!assignToProcess) continue;
    for (const [key, value] of Object.entries(parsed)) {
      if (value === undefined) continue;
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
        assignedKeys.add(key);
      }
    }
  }

  return { loadedFiles, missingFiles, assignedKeys: [...assignedKeys] };
}

/**
 * Read boolean from environment with default
 */
export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
}

/**
 * Read integer from environment with default
 */
export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isInteger(n) ? n : def;
}

/**
 * Read float from environment with default
 */
export function readFloat(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

/**
 * Read string from environment with default
 */
export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * Read a comma-separated list; blank entries are dropped.
 */
export function readList(name: string, def: string[] = []): string[] {
  const v = process.env[name];
  if (v == null || v.trim() === '') return def;
  return v
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Read one of a fixed set of values. Unknown values are a configuration error,
 * not a silent fallback.
 */
export function readEnum<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = readString(name);
  if (v === undefined) return def;
  const normalized = v.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new ConfigurationError(`${name} must be one of: ${allowed.join(', ')} (got "${v}")`);
  }
  return match;
}
