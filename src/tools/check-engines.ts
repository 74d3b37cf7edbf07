/**
 * Tool: check_engines
 * Report the Pandoc executable in use and which PDF engines are on PATH.
 */

import type { ToolDefinition, ToolResponse } from '../types.js';
import { formatError } from '../errors.js';
import { PDF_ENGINES, detectPdfEngine } from '../engine-args.js';

export const checkEnginesTool: ToolDefinition = {
  name: 'check_engines',
  description:
    'Check the conversion toolchain: the Pandoc executable and version, ' +
    'and which LaTeX engines are available for PDF output.',
  parameters: {
    type: 'object',
    properties: {},
  },
  inputShape: {},

  async execute(_args, ctx): Promise<ToolResponse> {
    try {
      let version: string | null = null;
      let versionError: string | undefined;
      try {
        version = await ctx.engine.version();
      } catch (e) {
        versionError = e instanceof Error ? e.message : String(e);
        ctx.logger.warn(`Could not determine Pandoc version: ${versionError}`);
      }

      const pdfEngines: Record<string, string | null> = {};
      for (const engine of PDF_ENGINES) {
        pdfEngines[engine] = ctx.locator.find(engine);
      }

      return {
        success: true,
        output: JSON.stringify(
          {
            pandoc: {
              executable: ctx.engine.executable,
              version,
              error: versionError,
            },
            pdfEngines,
            selectedPdfEngine: detectPdfEngine(ctx.locator),
          },
          null,
          2,
        ),
      };
    } catch (e) {
      return formatError(e);
    }
  },
};
