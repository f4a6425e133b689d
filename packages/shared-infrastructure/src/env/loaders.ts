/**
 * Environment loading shared by the CLIs.
 * Values already present in process.env win unless `override` is set.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

import { parse } from 'dotenv';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

function resolveFiles(options: LoadEnvOptions): string[] {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = options.files && options.files.length > 0 ? options.files : ['.env'];
  return files.map((file) => (isAbsolute(file) ? file : resolve(cwd, file)));
}

/**
 * Load `.env` style files in order. Earlier files take precedence over later
 * ones unless `override` is set, mirroring how the CLIs layer a project `.env`
 * over a repository-wide one.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  for (const file of resolveFiles(options)) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);
    const parsed = parse(readFileSync(file, 'utf8'));

    for (const [key, value] of Object.entries(parsed)) {
      if (override || values[key] === undefined) {
        values[key] = value;
      }
      if (!assignToProcess) continue;

      const alreadySet = process.env[key] !== undefined;
      if (alreadySet && !override) continue;
      if (alreadySet) {
        overriddenKeys.add(key);
      } else {
        assignedKeys.add(key);
      }
      process.env[key] = value;
    }
  }

  return {
    values,
    loadedFiles,
    missingFiles,
    assignedKeys: [...assignedKeys],
    overriddenKeys: [...overriddenKeys],
  };
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isInteger(n) ? n : def;
}

export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/** Read one of a fixed set of values (case-insensitive); anything else yields the default. */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  def?: T,
): T | undefined {
  const v = process.env[name]?.trim().toLowerCase();
  if (!v) return def;
  return allowed.find((candidate) => candidate === v) ?? def;
}
