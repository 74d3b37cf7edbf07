/**
 * Tool: convert_file
 * Convert an existing document. Input and output formats come from the file extensions.
 */

import { z } from 'zod';
import type { ToolDefinition, ToolResponse } from '../types.js';
import { ValidationError, formatError } from '../errors.js';
import { assertOutputDiffersFromInput, isExistingFile, resolveReadPath } from '../files.js';
import { SUPPORTED_EXTENSIONS, inferFormat } from '../formats.js';
import { runConversion } from '../pipeline.js';
import { readString, requireString } from '../validate.js';

export const convertFileTool: ToolDefinition = {
  name: 'convert_file',
  description:
    'Convert an existing file from one format to another. ' +
    'Both input and output formats are determined from the file extensions.',
  parameters: {
    type: 'object',
    required: ['input_file', 'output_file'],
    properties: {
      input_file: {
        type: 'string',
        description: 'Complete path to the input file. Must be an existing file.',
      },
      output_file: {
        type: 'string',
        description:
          'Complete path where to save the converted file, including extension. ' +
          `Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      },
      reference_doc: {
        type: 'string',
        description: 'Path to a reference DOCX file for styling (docx output only)',
      },
      filters: {
        type: 'array',
        items: { type: 'string' },
        description: 'Pandoc filter paths, applied in order',
      },
      defaults_file: {
        type: 'string',
        description: 'Path to a Pandoc defaults YAML file with additional options',
      },
    },
  },
  inputShape: {
    input_file: z.string().describe('Complete path to the input file'),
    output_file: z.string().describe('Complete path where to save the converted file, including extension'),
    reference_doc: z.string().optional().describe('Reference DOCX file for styling (docx output only)'),
    filters: z.array(z.string()).optional().describe('Pandoc filter paths, applied in order'),
    defaults_file: z.string().optional().describe('Pandoc defaults YAML file'),
  },

  async execute(args, ctx): Promise<ToolResponse> {
    try {
      const inputFile = requireString(args, 'input_file');
      const outputFile = requireString(args, 'output_file');

      const inputPath = resolveReadPath(inputFile, ctx.sandboxDir);
      if (!isExistingFile(inputPath)) {
        throw new ValidationError('InputFileNotFound', `Input file not found: ${inputFile}`);
      }
      assertOutputDiffersFromInput(inputFile, outputFile, ctx.sandboxDir);

      const sourceFormat = inferFormat(inputFile);
      const targetFormat = inferFormat(outputFile);

      const output = await runConversion(
        {
          source: { kind: 'file', path: inputPath },
          from: sourceFormat,
          outputFile,
          params: {
            targetFormat,
            referenceDoc: readString(args, 'reference_doc'),
            filters: args.filters,
            defaultsFile: readString(args, 'defaults_file'),
          },
        },
        ctx,
      );

      return { success: true, output };
    } catch (e) {
      return formatError(e);
    }
  },
};
