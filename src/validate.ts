/**
 * Parameter validation shared by create_file and convert_file.
 *
 * Everything here runs before the engine is spawned. The first violated rule
 * throws a ValidationError; nothing is written to disk.
 */

import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ValidationError } from './errors.js';
import { resolveReadPath, isExistingFile } from './files.js';
import { SUPPORTED_OUTPUT_FORMATS, isSupportedOutputFormat } from './formats.js';
import type { FormatId } from './formats.js';
import type { Logger } from './logger.js';
import type { ToolArgs } from './types.js';

export interface ConversionParams {
  targetFormat: string;
  referenceDoc?: string;
  filters?: unknown;
  defaultsFile?: string;
}

export interface ValidatedParams {
  targetFormat: FormatId;
  referenceDoc?: string;
  filters: string[];
  defaultsFile?: string;
}

export interface ValidationContext {
  logger: Logger;
  sandboxDir?: string;
}

/** Keys a defaults file may use to name the output format. */
const DEFAULTS_OUTPUT_KEYS = ['to', 'writer'] as const;

export function validateConversionParams(
  params: ConversionParams,
  ctx: ValidationContext,
): ValidatedParams {
  const { targetFormat, referenceDoc, defaultsFile } = params;

  if (referenceDoc) {
    if (targetFormat !== 'docx') {
      throw new ValidationError(
        'InvalidOptionCombination',
        'reference_doc parameter is only supported for docx output format',
      );
    }
    if (!isExistingFile(resolveReadPath(referenceDoc, ctx.sandboxDir))) {
      throw new ValidationError(
        'ReferenceDocNotFound',
        `Reference document not found: ${referenceDoc}`,
      );
    }
  }

  if (defaultsFile) {
    const defaults = loadDefaultsFile(resolveReadPath(defaultsFile, ctx.sandboxDir), defaultsFile);
    for (const key of DEFAULTS_OUTPUT_KEYS) {
      const declared = defaults[key];
      if (declared !== undefined && declared !== targetFormat) {
        ctx.logger.warn(
          `Defaults file specifies output format '${String(declared)}' ` +
            `but requested format is '${targetFormat}'. Using requested format.`,
        );
      }
    }
  }

  if (!isSupportedOutputFormat(targetFormat)) {
    throw new ValidationError(
      'UnsupportedOutputFormat',
      `Unsupported output format: '${targetFormat}'. ` +
        `Supported formats are: ${SUPPORTED_OUTPUT_FORMATS.join(', ')}`,
    );
  }

  return {
    targetFormat,
    referenceDoc: referenceDoc || undefined,
    filters: readFilterList(params.filters),
    defaultsFile: defaultsFile || undefined,
  };
}

/**
 * Read and parse a defaults file. The root must be a YAML mapping.
 * `displayPath` is the path as the caller wrote it, used in messages.
 */
export function loadDefaultsFile(
  resolvedPath: string,
  displayPath: string = resolvedPath,
): Record<string, unknown> {
  if (!fs.existsSync(resolvedPath)) {
    throw new ValidationError('DefaultsFileNotFound', `Defaults file not found: ${displayPath}`);
  }

  let text: string;
  try {
    text = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (e) {
    if (isPermissionError(e)) {
      throw new ValidationError(
        'DefaultsFilePermissionError',
        `Permission denied when reading defaults file: ${displayPath}`,
      );
    }
    throw new ValidationError(
      'DefaultsFileParseError',
      `Error reading defaults file ${displayPath}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new ValidationError(
      'DefaultsFileParseError',
      `Error parsing defaults file ${displayPath}: ${detail}`,
    );
  }

  if (!isMapping(parsed)) {
    throw new ValidationError(
      'DefaultsFileParseError',
      `Invalid defaults file format: ${displayPath} - must be a YAML mapping`,
    );
  }
  return parsed;
}

function readFilterList(filters: unknown): string[] {
  if (filters === undefined || filters === null) return [];
  if (!Array.isArray(filters)) {
    throw new ValidationError('InvalidParameter', 'filters parameter must be a list of strings');
  }
  const result: string[] = [];
  for (const filter of filters) {
    if (typeof filter !== 'string') {
      throw new ValidationError('InvalidParameter', 'Each filter must be a string path');
    }
    result.push(filter);
  }
  return result;
}

/**
 * Read an optional string argument. Missing, null and empty values come back
 * as undefined; any other non-string is rejected.
 */
export function readString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError('InvalidParameter', `${key} must be a string`);
  }
  return value;
}

/**
 * Read a required string argument.
 */
export function requireString(args: ToolArgs, key: string, message?: string): string {
  const value = readString(args, key);
  if (value === undefined) {
    throw new ValidationError('MissingRequiredParameter', message ?? `${key} is required`);
  }
  return value;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPermissionError(e: unknown): boolean {
  if (!(e instanceof Error) || !('code' in e)) return false;
  return e.code === 'EACCES' || e.code === 'EPERM';
}

