/**
 * Tool: create_file
 * Create a document from markdown or HTML text. The output format comes from
 * the output file's extension.
 */

import { z } from 'zod';
import type { ToolDefinition, ToolResponse } from '../types.js';
import { ValidationError, formatError } from '../errors.js';
import { CONTENT_INPUT_FORMATS, SUPPORTED_EXTENSIONS, inferFormat, isContentInputFormat } from '../formats.js';
import { runConversion } from '../pipeline.js';
import { readString, requireString } from '../validate.js';

export const createFileTool: ToolDefinition = {
  name: 'create_file',
  description:
    'Create a new file from text content (markdown or HTML) and save it to disk. ' +
    'The output format is determined from the file extension. ' +
    'Supports: .pdf, .docx, .html, .md, .txt, .rst, .tex, .epub, .ipynb, .odt',
  parameters: {
    type: 'object',
    required: ['content', 'output_file', 'input_format'],
    properties: {
      content: {
        type: 'string',
        description: 'The text content to convert (markdown or HTML)',
      },
      output_file: {
        type: 'string',
        description:
          'Complete path where to save the file, including extension. ' +
          `Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      },
      input_format: {
        type: 'string',
        enum: [...CONTENT_INPUT_FORMATS],
        description: "Source format of the content: 'markdown' or 'html'",
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
    content: z.string().describe('The text content to convert (markdown or HTML)'),
    output_file: z.string().describe('Complete path where to save the file, including extension'),
    input_format: z.enum(CONTENT_INPUT_FORMATS).describe('Source format of the content'),
    reference_doc: z.string().optional().describe('Reference DOCX file for styling (docx output only)'),
    filters: z.array(z.string()).optional().describe('Pandoc filter paths, applied in order'),
    defaults_file: z.string().optional().describe('Pandoc defaults YAML file'),
  },

  async execute(args, ctx): Promise<ToolResponse> {
    try {
      const content = requireString(args, 'content', 'content cannot be empty');
      const outputFile = requireString(args, 'output_file', 'output_file path is required for create_file');
      const inputFormat = requireString(args, 'input_format', 'input_format is required');

      const targetFormat = inferFormat(outputFile);

      if (!isContentInputFormat(inputFormat)) {
        throw new ValidationError(
          'UnsupportedInputFormat',
          `Unsupported input format: '${inputFormat}'. ` +
            `Supported formats for create_file: ${CONTENT_INPUT_FORMATS.join(', ')}`,
        );
      }

      const output = await runConversion(
        {
          source: { kind: 'text', content },
          from: inputFormat,
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
