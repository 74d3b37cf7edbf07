/**
 * The conversion pipeline shared by create_file and convert_file:
 * validate → resolve filters → build engine args → invoke.
 */

import { buildEngineArgs } from './engine-args.js';
import { baseDirectory, resolveReadPath, resolveWritePath } from './files.js';
import { resolveFilters } from './filters.js';
import { invokeConversion } from './invoke.js';
import { validateConversionParams } from './validate.js';
import type { FormatId } from './formats.js';
import type { ConversionParams } from './validate.js';
import type { ConversionSource, ToolContext } from './types.js';

export interface ConversionJob {
  source: ConversionSource;
  from: FormatId;
  outputFile: string;
  params: ConversionParams;
}

/**
 * Run one conversion job and return the success summary.
 *
 * Validation, filter resolution and PDF engine detection all finish before
 * the output directory is created or the engine is started.
 */
export async function runConversion(job: ConversionJob, ctx: ToolContext): Promise<string> {
  const validated = validateConversionParams(job.params, ctx);

  const defaultsFile = validated.defaultsFile
    ? resolveReadPath(validated.defaultsFile, ctx.sandboxDir)
    : undefined;
  const referenceDoc = validated.referenceDoc
    ? resolveReadPath(validated.referenceDoc, ctx.sandboxDir)
    : undefined;

  const filters = resolveFilters(validated.filters, {
    baseDir: baseDirectory(ctx.sandboxDir),
    filterDir: ctx.filterDir,
    defaultsFile,
    logger: ctx.logger,
  });

  const outputPath = resolveReadPath(job.outputFile, ctx.sandboxDir);
  const { args, env } = buildEngineArgs(
    { targetFormat: validated.targetFormat, outputPath, referenceDoc, filters, defaultsFile },
    ctx.locator,
  );

  resolveWritePath(job.outputFile, ctx.sandboxDir);
  ctx.logger.debug(`Converting ${job.source.kind} from ${job.from} to ${validated.targetFormat}`);

  return invokeConversion(
    ctx.engine,
    { source: job.source, from: job.from, to: validated.targetFormat, outputPath, args, env },
    { filters, defaultsFile },
  );
}
