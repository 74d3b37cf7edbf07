import type { FormatId } from './formats.js';
import type { ToolResponse } from './types.js';

export type ValidationCode =
  | 'UnsupportedExtension'
  | 'UnsupportedOutputFormat'
  | 'UnsupportedInputFormat'
  | 'InvalidOptionCombination'
  | 'MissingRequiredParameter'
  | 'InvalidParameter'
  | 'InputFileNotFound'
  | 'ReferenceDocNotFound'
  | 'DefaultsFileNotFound'
  | 'DefaultsFileParseError'
  | 'DefaultsFilePermissionError'
  | 'FilterNotFound';

/**
 * A request rejected before the engine was started.
 */
export class ValidationError extends Error {
  constructor(
    public code: ValidationCode,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * No typesetting engine is available for an output format that needs one.
 */
export class EngineNotFoundForFormatError extends Error {
  constructor(
    public format: FormatId,
    public candidates: readonly string[],
  ) {
    super(
      `PDF generation requires a LaTeX engine (${candidates.join(', ')}). ` +
        'Please install a TeX distribution (TeX Live, MacTeX or MiKTeX) and ensure it is on your PATH.',
    );
    this.name = 'EngineNotFoundForFormatError';
  }
}

/**
 * Raw failure of the engine process: spawn error or non-zero exit.
 */
export class EngineProcessError extends Error {
  constructor(
    message: string,
    public exitCode: number | null,
    public stderr: string,
    public spawnCode?: string,
  ) {
    super(message);
    this.name = 'EngineProcessError';
  }
}

export type ConversionFailureKind =
  | 'FilterError'
  | 'DefaultsFileError'
  | 'EngineNotFoundError'
  | 'ConversionError';

/**
 * Engine failure after classification.
 */
export class ConversionEngineError extends Error {
  constructor(
    public kind: ConversionFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConversionEngineError';
  }
}

export class FileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FileError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Convert any error into a standardized ToolResponse.
 * Every tool's execute() wraps its body in try/catch → formatError().
 */
export function formatError(e: unknown): ToolResponse {
  if (e instanceof ValidationError) {
    return { success: false, error: `Validation error: ${e.message}`, errorCode: e.code };
  }
  if (e instanceof EngineNotFoundForFormatError) {
    return { success: false, error: e.message, errorCode: 'EngineNotFoundForFormat' };
  }
  if (e instanceof ConversionEngineError) {
    return { success: false, error: e.message, errorCode: e.kind };
  }
  if (e instanceof FileError) {
    return { success: false, error: `File error: ${e.message}`, errorCode: 'FileError' };
  }
  if (e instanceof ConfigError) {
    return { success: false, error: `Configuration error: ${e.message}`, errorCode: 'ConfigError' };
  }
  return {
    success: false,
    error: `Unexpected error: ${e instanceof Error ? e.message : String(e)}`,
    errorCode: 'UnexpectedError',
  };
}
