/**
 * Loader for the YAML tables under `data/` (keyword lists, lookups, templates).
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import type { z } from 'zod';
import { ValidationError } from './errors.js';

// `data/` sits at the package root: two levels up from src/utils, three from dist/src/utils
const DATA_CANDIDATES = ['../../data/', '../../../data/'].map((relative) => fileURLToPath(new URL(relative, import.meta.url)));
const DATA_DIR = DATA_CANDIDATES.find((dir) => existsSync(dir)) ?? DATA_CANDIDATES[0];

/**
 * Read, parse and validate `data/{name}`. Throws ValidationError when the
 * file does not match its schema.
 */
export function loadDataFile<S extends z.ZodTypeAny>(name: string, schema: S): z.output<S> {
  const raw: unknown = parse(readFileSync(`${DATA_DIR}${name}`, 'utf-8'));
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Memoize a loader so each table is read at most once per process.
 */
export function lazy<T>(load: () => T): () => T {
  let cache: { value: T } | undefined;
  return () => {
    cache ??= { value: load() };
    return cache.value;
  };
}
