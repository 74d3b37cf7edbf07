/**
 * Runs a conversion and turns engine failures into classified errors.
 */

import path from 'node:path';
import { ConversionEngineError, EngineProcessError } from './errors.js';
import type { ConversionFailureKind } from './errors.js';
import type { ConversionEngine, EngineRequest, ResolvedFilter } from './types.js';

/** Pandoc exit codes for filter failures (PandocFilterError, PandocLuaError). */
const FILTER_EXIT_CODES = new Set([83, 84]);

const FAILURE_PREFIXES: Record<ConversionFailureKind, string> = {
  FilterError: 'Filter error during conversion',
  DefaultsFileError: 'Defaults file error during conversion',
  EngineNotFoundError: 'Pandoc executable not found',
  ConversionError: 'Error converting',
};

export interface AppliedOptions {
  filters: readonly ResolvedFilter[];
  defaultsFile?: string;
}

/**
 * Classify an engine failure. Structured facts from the process boundary
 * (spawn error code, exit code) decide first; the message text is only a
 * best-effort fallback and its wording is not a contract.
 */
export function classifyFailure(e: unknown, defaultsSupplied: boolean): ConversionFailureKind {
  if (e instanceof EngineProcessError) {
    if (e.spawnCode === 'ENOENT') return 'EngineNotFoundError';
    if (e.exitCode !== null && FILTER_EXIT_CODES.has(e.exitCode)) return 'FilterError';
  }

  const text = e instanceof Error ? e.message : String(e);
  const lower = text.toLowerCase();
  if (
    lower.includes('filter not found') ||
    lower.includes('filter is not executable') ||
    lower.includes('error running filter')
  ) {
    return 'FilterError';
  }
  if (defaultsSupplied && lower.includes('defaults')) {
    return 'DefaultsFileError';
  }
  if (lower.includes('pandoc') && lower.includes('not found')) {
    return 'EngineNotFoundError';
  }
  return 'ConversionError';
}

/**
 * Build the classified error for a failed conversion.
 */
export function describeFailure(
  e: unknown,
  request: Pick<EngineRequest, 'source' | 'from' | 'to'>,
  defaultsFile?: string,
): ConversionEngineError {
  const kind = classifyFailure(e, Boolean(defaultsFile));
  let detail = e instanceof Error ? e.message : String(e);

  if (kind === 'DefaultsFileError' && defaultsFile) {
    detail += ` (defaults file: ${path.basename(defaultsFile)})`;
  } else if (kind === 'EngineNotFoundError') {
    detail = 'Please ensure Pandoc is installed and available in your PATH';
  }

  const sourceKind = request.source.kind === 'file' ? 'file' : 'content';
  return new ConversionEngineError(
    kind,
    `${FAILURE_PREFIXES[kind]} ${sourceKind} from ${request.from} to ${request.to}: ${detail}`,
    { cause: e },
  );
}

/**
 * ` with filters: a, b` and ` using defaults file: d.yaml`, each empty when unused.
 */
export function formatResultInfo(applied: AppliedOptions): { filterInfo: string; defaultsInfo: string } {
  const filterInfo = applied.filters.length
    ? ` with filters: ${applied.filters.map((f) => path.basename(f.path)).join(', ')}`
    : '';
  const defaultsInfo = applied.defaultsFile
    ? ` using defaults file: ${path.basename(applied.defaultsFile)}`
    : '';
  return { filterInfo, defaultsInfo };
}

/**
 * Run the engine and return the success summary.
 */
export async function invokeConversion(
  engine: ConversionEngine,
  request: EngineRequest,
  applied: AppliedOptions,
): Promise<string> {
  try {
    await engine.convert(request);
  } catch (e) {
    throw describeFailure(e, request, applied.defaultsFile);
  }

  const { filterInfo, defaultsInfo } = formatResultInfo(applied);
  const verb = request.source.kind === 'file' ? 'converted' : 'created';
  return `File successfully ${verb}${filterInfo}${defaultsInfo} and saved to: ${request.outputPath}`;
}
