/**
 * File path utilities: resolution (with optional sandbox), existence checks,
 * output directory preparation.
 */

import fs from 'node:fs';
import path from 'node:path';
import { FileError } from './errors.js';

/**
 * Resolve a file path for reading.
 *
 * When `sandboxDir` is set, paths are resolved relative to it and
 * traversal outside the sandbox is blocked (prevents `../../etc/passwd`).
 * When unset, paths resolve against CWD.
 */
export function resolveReadPath(filePath: string, sandboxDir?: string): string {
  if (sandboxDir) {
    const base = path.resolve(sandboxDir);
    const resolved = path.resolve(base, filePath);
    if (resolved !== base && !resolved.startsWith(base + path.sep)) {
      throw new FileError(`Path "${filePath}" escapes sandbox directory`);
    }
    return resolved;
  }
  return path.resolve(filePath);
}

/**
 * Resolve a file path for writing. Creates parent directories if needed.
 */
export function resolveWritePath(
  filePath: string,
  sandboxDir?: string,
): string {
  const resolved = resolveReadPath(filePath, sandboxDir);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  return resolved;
}

/**
 * Directory relative paths are resolved against: the sandbox when set, CWD otherwise.
 */
export function baseDirectory(sandboxDir?: string): string {
  return sandboxDir ? path.resolve(sandboxDir) : process.cwd();
}

export function isExistingFile(resolvedPath: string): boolean {
  try {
    return fs.statSync(resolvedPath).isFile();
  } catch {
    return false;
  }
}

/**
 * Guard: ensure the output path differs from the input path so the engine
 * never truncates the file it is reading.
 */
export function assertOutputDiffersFromInput(
  inputPath: string,
  outputPath: string,
  sandboxDir?: string,
): void {
  const resolvedInput = resolveReadPath(inputPath, sandboxDir);
  const resolvedOutput = resolveReadPath(outputPath, sandboxDir);
  if (resolvedInput === resolvedOutput) {
    throw new FileError(
      'Output path must be different from input path to prevent data corruption',
    );
  }
}
