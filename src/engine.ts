/**
 * Client for the Pandoc executable.
 *
 * Each conversion runs as its own child process, so the caller's event loop
 * keeps serving other requests while Pandoc works. Per-invocation values
 * (the output directory hint) travel in the child's environment only.
 */

import { spawn } from 'node:child_process';
import path from 'node:path';
import { EngineProcessError } from './errors.js';
import { readerFor, writerFor } from './formats.js';
import type { Logger } from './logger.js';
import type { ConversionEngine, EngineRequest } from './types.js';

interface RunOptions {
  input?: string;
  env?: Record<string, string>;
  logger?: Logger;
}

interface RunResult {
  stdout: string;
  stderr: string;
}

/**
 * Full argument vector for one conversion.
 *
 * `--from`/`--to`/`--output` come after the extra arguments so they win over
 * anything a `--defaults` file sets.
 */
export function buildCommandLine(request: EngineRequest): string[] {
  const argv = [
    ...request.args,
    '--from',
    readerFor(request.from),
    '--to',
    writerFor(request.to),
    '--output',
    request.outputPath,
  ];
  if (request.source.kind === 'file') {
    argv.push(request.source.path);
  }
  return argv;
}

/**
 * Create an engine client bound to a specific Pandoc executable.
 */
export function makeEngine(executable: string, logger?: Logger): ConversionEngine {
  return {
    executable,

    async convert(request: EngineRequest): Promise<void> {
      await run(executable, buildCommandLine(request), {
        input: request.source.kind === 'text' ? request.source.content : undefined,
        env: request.env,
        logger,
      });
    },

    async version(): Promise<string> {
      const { stdout } = await run(executable, ['--version']);
      return stdout.split(/\r?\n/)[0].trim();
    },
  };
}

function run(executable: string, argv: string[], opts: RunOptions = {}): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(executable, argv, {
      env: { ...process.env, ...opts.env },
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      reject(
        new EngineProcessError(
          `Failed to start ${executable}: ${err.message}`,
          null,
          stderr,
          err.code,
        ),
      );
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const name = path.basename(executable);
      const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      reject(new EngineProcessError(stderr.trim() || `${name} ${reason}`, code, stderr));
    });

    // The engine may exit before reading all of stdin; its exit status reports why.
    child.stdin.on('error', (err) => {
      opts.logger?.debug(`${path.basename(executable)} stdin closed early: ${err.message}`);
    });
    child.stdin.end(opts.input ?? '');
  });
}
