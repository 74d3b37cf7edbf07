import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Logger } from '../src/logger.js';
import type { ConversionEngine, EngineRequest, ExecutableLocator, ToolContext } from '../src/types.js';

export interface MockEngine extends ConversionEngine {
  convert: Mock<(request: EngineRequest) => Promise<void>>;
  version: Mock<() => Promise<string>>;
}

export interface TestContext extends ToolContext {
  engine: MockEngine;
  sandboxDir: string;
  filterDir: string;
}

export function mockEngine(): MockEngine {
  return {
    executable: '/usr/bin/pandoc',
    convert: vi.fn<(request: EngineRequest) => Promise<void>>().mockResolvedValue(undefined),
    version: vi.fn<() => Promise<string>>().mockResolvedValue('pandoc 3.1.11'),
  };
}

/**
 * Locator that knows only the given executables.
 */
export function mockLocator(available: string[] = []): ExecutableLocator {
  return {
    find: vi.fn((name: string) => (available.includes(name) ? `/usr/bin/${name}` : null)),
  };
}

export function quietLogger(): Logger {
  return new Logger('error');
}

export function makeTempDir(prefix = 'pandoc-convert-test-'): string {
  return mkdtempSync(path.join(tmpdir(), prefix));
}

export function mockContext(opts: { pdfEngines?: string[] } = {}): TestContext {
  const sandboxDir = makeTempDir();
  const filterDir = makeTempDir('pandoc-filters-');
  return {
    engine: mockEngine(),
    locator: mockLocator(opts.pdfEngines ?? ['xelatex']),
    logger: quietLogger(),
    filterDir,
    sandboxDir,
  };
}

/**
 * Write a file inside `dir` (creating subdirectories) and return its absolute path.
 */
export function writeFile(
  dir: string,
  filename: string,
  content: string = '# dummy',
  mode?: number,
): string {
  const filePath = path.join(dir, filename);
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  if (mode !== undefined) chmodSync(filePath, mode);
  return filePath;
}

/**
 * The request passed to the last engine.convert() call.
 */
export function lastRequest(engine: MockEngine): EngineRequest {
  const call = engine.convert.mock.calls.at(-1);
  if (!call) throw new Error('engine.convert was not called');
  return call[0];
}

/**
 * Run `fn` and return what it threw.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected function to throw');
}
