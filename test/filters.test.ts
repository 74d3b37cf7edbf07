import { describe, it, expect, beforeEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  defaultFilterDir,
  ensureExecutable,
  filterCandidates,
  resolveFilterPath,
  resolveFilters,
} from '../src/filters.js';
import { ValidationError } from '../src/errors.js';
import type { FilterSearchOptions } from '../src/filters.js';
import { makeTempDir, quietLogger, thrownBy, writeFile } from './helpers.js';

let baseDir: string;
let filterDir: string;
let opts: FilterSearchOptions;

function isExecutable(filePath: string): boolean {
  return (fs.statSync(filePath).mode & 0o111) !== 0;
}

beforeEach(() => {
  baseDir = makeTempDir();
  filterDir = makeTempDir('pandoc-filters-');
  opts = { baseDir, filterDir, logger: quietLogger() };
});

describe('filterCandidates', () => {
  it('lists base dir, defaults dir, then filter dir by basename', () => {
    const candidates = filterCandidates('filters/wordcount.py', {
      baseDir,
      filterDir,
      defaultsFile: 'config/defaults.yaml',
    });
    expect(candidates).toEqual([
      path.join(baseDir, 'filters', 'wordcount.py'),
      path.join(baseDir, 'config', 'filters', 'wordcount.py'),
      path.join(filterDir, 'wordcount.py'),
    ]);
  });

  it('skips the defaults dir when no defaults file is given', () => {
    expect(filterCandidates('wordcount.py', { baseDir, filterDir })).toEqual([
      path.join(baseDir, 'wordcount.py'),
      path.join(filterDir, 'wordcount.py'),
    ]);
  });

  it('checks only the exact path for absolute references', () => {
    const absolute = path.join(baseDir, 'abs', 'filter.lua');
    expect(filterCandidates(absolute, { baseDir, filterDir, defaultsFile: 'd.yaml' })).toEqual([
      absolute,
    ]);
  });

  it('defaults the filter dir to ~/.pandoc/filters', () => {
    expect(defaultFilterDir()).toBe(path.join(os.homedir(), '.pandoc', 'filters'));
  });
});

describe('resolveFilterPath', () => {
  it('prefers the working directory copy over the user filter directory', () => {
    const local = writeFile(baseDir, 'shared.py', '#!/bin/sh\n', 0o755);
    writeFile(filterDir, 'shared.py', '#!/bin/sh\n', 0o755);
    expect(resolveFilterPath('shared.py', opts)).toBe(local);
  });

  it('finds a filter next to the defaults file', () => {
    const defaultsFile = writeFile(baseDir, 'project/defaults.yaml', 'to: html\n');
    const filter = writeFile(baseDir, 'project/toc.py', '#!/bin/sh\n', 0o755);
    expect(resolveFilterPath('toc.py', { ...opts, defaultsFile })).toBe(filter);
  });

  it('falls back to the user filter directory by basename', () => {
    const filter = writeFile(filterDir, 'upper.py', '#!/bin/sh\n', 0o755);
    expect(resolveFilterPath('somewhere/else/upper.py', opts)).toBe(filter);
  });

  it('returns null when no candidate exists', () => {
    expect(resolveFilterPath('nowhere.py', opts)).toBeNull();
  });

  it('skips directories that share the filter name', () => {
    writeFile(baseDir, 'upper.py/inner.txt', '');
    const filter = writeFile(filterDir, 'upper.py', '#!/bin/sh\n', 0o755);
    expect(resolveFilterPath('upper.py', opts)).toBe(filter);
  });

  it('makes a non-executable filter executable', () => {
    const filter = writeFile(baseDir, 'plain.py', '#!/bin/sh\n', 0o644);
    const info = vi.spyOn(opts.logger, 'info');
    expect(resolveFilterPath('plain.py', opts)).toBe(filter);
    expect(isExecutable(filter)).toBe(true);
    expect(info).toHaveBeenCalledWith(`Made filter executable: ${filter}`);
  });
});

describe('ensureExecutable', () => {
  it('is a no-op for an executable file', () => {
    const filter = writeFile(baseDir, 'run.sh', '#!/bin/sh\n', 0o755);
    const info = vi.spyOn(opts.logger, 'info');
    expect(ensureExecutable(filter, opts.logger)).toBe(true);
    expect(info).not.toHaveBeenCalled();
  });

  it('refuses a directory', () => {
    const warn = vi.spyOn(opts.logger, 'warn');
    expect(ensureExecutable(baseDir, opts.logger)).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      `Could not make filter executable: ${baseDir} - not a regular file`,
    );
  });

  it('returns false and warns when the file cannot be changed', () => {
    const warn = vi.spyOn(opts.logger, 'warn');
    expect(ensureExecutable(path.join(baseDir, 'gone.py'), opts.logger)).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('resolveFilters', () => {
  it('resolves every filter in input order', () => {
    const a = writeFile(baseDir, 'a.py', '#!/bin/sh\n', 0o755);
    const b = writeFile(filterDir, 'b.py', '#!/bin/sh\n', 0o755);
    expect(resolveFilters(['b.py', 'a.py'], opts)).toEqual([
      { reference: 'b.py', path: b },
      { reference: 'a.py', path: a },
    ]);
  });

  it('fails on the first missing filter', () => {
    writeFile(baseDir, 'exists.py', '#!/bin/sh\n', 0o755);
    const err = thrownBy(() => resolveFilters(['exists.py', 'missing.py'], opts));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty('code', 'FilterNotFound');
    expect(err).toHaveProperty(
      'message',
      'Filter not found in any of the searched locations: missing.py',
    );
  });

  it('rejects an empty reference', () => {
    const err = thrownBy(() => resolveFilters([''], opts));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty('code', 'FilterNotFound');
    expect(err).toHaveProperty('message', 'Filter not found in any of the searched locations: ');
  });

  it('rejects a reference naming a directory', () => {
    writeFile(baseDir, 'filters/wordcount.lua', '', 0o755);
    const err = thrownBy(() => resolveFilters(['filters'], opts));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty('code', 'FilterNotFound');
    expect(err).toHaveProperty(
      'message',
      'Filter not found in any of the searched locations: filters',
    );
  });

  it('does not touch filters after the first miss', () => {
    const later = writeFile(baseDir, 'later.py', '#!/bin/sh\n', 0o644);
    expect(() => resolveFilters(['missing.py', 'later.py'], opts)).toThrow('missing.py');
    expect(isExecutable(later)).toBe(false);
  });
});
