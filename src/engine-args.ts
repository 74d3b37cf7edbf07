/**
 * Builds the extra arguments handed to the conversion engine.
 *
 * Token order is fixed: defaults file, filters (input order), PDF engine and
 * margin, reference document.
 */

import path from 'node:path';
import { EngineNotFoundForFormatError } from './errors.js';
import type { FormatId } from './formats.js';
import type { EngineArgs, ExecutableLocator, ResolvedFilter } from './types.js';

/** Typesetting engines in priority order. */
export const PDF_ENGINES = ['xelatex', 'pdflatex', 'lualatex'] as const;
export type PdfEngine = (typeof PDF_ENGINES)[number];

export const PDF_MARGIN = 'geometry:margin=1in';

/** Environment variable filters read to find where output is written. */
export const OUTPUT_DIR_ENV = 'PANDOC_OUTPUT_DIR';

export interface EngineArgsInput {
  targetFormat: FormatId;
  /** Absolute output path. */
  outputPath?: string;
  /** Absolute reference document path. */
  referenceDoc?: string;
  filters: readonly ResolvedFilter[];
  /** Absolute defaults file path. */
  defaultsFile?: string;
}

export function detectPdfEngine(locator: ExecutableLocator): PdfEngine | null {
  for (const engine of PDF_ENGINES) {
    if (locator.find(engine)) return engine;
  }
  return null;
}

export function buildEngineArgs(input: EngineArgsInput, locator: ExecutableLocator): EngineArgs {
  const args: string[] = [];
  const env: Record<string, string> = {};

  if (input.defaultsFile) {
    args.push('--defaults', path.resolve(input.defaultsFile));
  }

  // Scoped to this invocation's child process, never process.env.
  if (input.outputPath) {
    env[OUTPUT_DIR_ENV] = path.dirname(path.resolve(input.outputPath));
  }

  for (const filter of input.filters) {
    args.push('--filter', filter.path);
  }

  if (input.targetFormat === 'pdf') {
    const engine = detectPdfEngine(locator);
    if (!engine) {
      throw new EngineNotFoundForFormatError('pdf', PDF_ENGINES);
    }
    args.push(`--pdf-engine=${engine}`, '-V', PDF_MARGIN);
  }

  if (input.referenceDoc && input.targetFormat === 'docx') {
    args.push('--reference-doc', path.resolve(input.referenceDoc));
  }

  return { args, env };
}
