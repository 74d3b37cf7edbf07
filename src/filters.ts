/**
 * Filter resolution: find a filter executable across an ordered list of
 * candidate locations and make sure it can be executed.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ValidationError } from './errors.js';
import { isExistingFile } from './files.js';
import type { Logger } from './logger.js';
import type { ResolvedFilter } from './types.js';

export interface FilterSearchOptions {
  /** Directory relative references are tried against first. */
  baseDir: string;
  /** Searched by basename after every other candidate. */
  filterDir: string;
  defaultsFile?: string;
  logger: Logger;
}

/** `~/.pandoc/filters` */
export function defaultFilterDir(): string {
  return path.join(os.homedir(), '.pandoc', 'filters');
}

/**
 * Candidate locations for a filter reference, in search order.
 * An absolute reference is its own only candidate.
 */
export function filterCandidates(
  reference: string,
  opts: Pick<FilterSearchOptions, 'baseDir' | 'filterDir' | 'defaultsFile'>,
): string[] {
  if (path.isAbsolute(reference)) {
    return [reference];
  }

  const candidates = [path.resolve(opts.baseDir, reference)];
  if (opts.defaultsFile) {
    const defaultsDir = path.dirname(path.resolve(opts.baseDir, opts.defaultsFile));
    candidates.push(path.join(defaultsDir, reference));
  }
  candidates.push(path.join(opts.filterDir, path.basename(reference)));
  return candidates;
}

/**
 * Grant execute permission if the file lacks it. Idempotent.
 * Returns false when the path is not a regular file or stays non-executable.
 */
export function ensureExecutable(filePath: string, logger: Logger): boolean {
  if (!isExistingFile(filePath)) {
    logger.warn(`Could not make filter executable: ${filePath} - not a regular file`);
    return false;
  }
  if (isExecutable(filePath)) return true;
  try {
    const { mode } = fs.statSync(filePath);
    fs.chmodSync(filePath, mode | 0o111);
    logger.info(`Made filter executable: ${filePath}`);
    return true;
  } catch (e) {
    logger.warn(
      `Could not make filter executable: ${filePath} - ${e instanceof Error ? e.message : String(e)}`,
    );
    return false;
  }
}

/**
 * Resolve one filter reference, or null when no candidate is usable.
 */
export function resolveFilterPath(reference: string, opts: FilterSearchOptions): string | null {
  for (const candidate of filterCandidates(reference, opts)) {
    if (!isExistingFile(candidate)) continue;
    if (!ensureExecutable(candidate, opts.logger)) continue;
    opts.logger.debug(`Using filter: ${candidate}`);
    return candidate;
  }
  return null;
}

/**
 * Resolve every reference in order. Stops at the first miss.
 */
export function resolveFilters(references: readonly string[], opts: FilterSearchOptions): ResolvedFilter[] {
  const resolved: ResolvedFilter[] = [];
  for (const reference of references) {
    const filterPath = resolveFilterPath(reference, opts);
    if (!filterPath) {
      throw new ValidationError(
        'FilterNotFound',
        `Filter not found in any of the searched locations: ${reference}`,
      );
    }
    resolved.push({ reference, path: filterPath });
  }
  return resolved;
}

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
