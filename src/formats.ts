/**
 * Format identifiers and extension-based format inference.
 */

import path from 'node:path';
import { ValidationError } from './errors.js';

export type FormatId =
  | 'plain'
  | 'html'
  | 'markdown'
  | 'ipynb'
  | 'odt'
  | 'pdf'
  | 'docx'
  | 'rst'
  | 'latex'
  | 'epub';

const EXTENSION_FORMATS = new Map<string, FormatId>([
  ['.txt', 'plain'],
  ['.html', 'html'],
  ['.htm', 'html'],
  ['.md', 'markdown'],
  ['.markdown', 'markdown'],
  ['.ipynb', 'ipynb'],
  ['.odt', 'odt'],
  ['.pdf', 'pdf'],
  ['.docx', 'docx'],
  ['.doc', 'docx'],
  ['.rst', 'rst'],
  ['.tex', 'latex'],
  ['.latex', 'latex'],
  ['.epub', 'epub'],
]);

export const SUPPORTED_EXTENSIONS: readonly string[] = [...EXTENSION_FORMATS.keys()];

export const SUPPORTED_OUTPUT_FORMATS: readonly FormatId[] = [
  'plain',
  'html',
  'markdown',
  'ipynb',
  'odt',
  'pdf',
  'docx',
  'rst',
  'latex',
  'epub',
];

/** Formats create_file accepts as text content. */
export const CONTENT_INPUT_FORMATS = ['markdown', 'html'] as const;
export type ContentInputFormat = (typeof CONTENT_INPUT_FORMATS)[number];

/**
 * Infer a format from a path's extension (case-insensitive).
 */
export function inferFormat(filePath: string): FormatId {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS.get(ext);
  if (!format) {
    throw new ValidationError(
      'UnsupportedExtension',
      `Unsupported file extension: '${ext}'. ` +
        `Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    );
  }
  return format;
}

export function isSupportedOutputFormat(value: string): value is FormatId {
  return SUPPORTED_OUTPUT_FORMATS.some((format) => format === value);
}

export function isContentInputFormat(value: string): value is ContentInputFormat {
  return CONTENT_INPUT_FORMATS.some((format) => format === value);
}

/** Pandoc has no plain-text reader; plain text is read as markdown. */
export function readerFor(format: FormatId): string {
  return format === 'plain' ? 'markdown' : format;
}

/** PDF goes through the LaTeX writer; the .pdf output name triggers typesetting. */
export function writerFor(format: FormatId): string {
  return format === 'pdf' ? 'latex' : format;
}
