/**
 * Best-effort discovery of the Pandoc executable at startup.
 * Never downloads anything and never throws: when nothing is found the bare
 * command name is used and the first conversion reports the failure.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from './logger.js';
import type { ExecutableLocator } from './types.js';

const PANDOC_NAME = process.platform === 'win32' ? 'pandoc.exe' : 'pandoc';

/** Directory (relative to CWD) a bundled Pandoc binary is looked for in. */
export const BUNDLED_PANDOC_DIR = 'pandoc_bin';

export interface LocateOptions {
  pandocPath?: string;
  cwd?: string;
  locator: ExecutableLocator;
  logger: Logger;
}

export function locatePandoc(opts: LocateOptions): string {
  const { locator, logger } = opts;

  if (opts.pandocPath) {
    if (fs.existsSync(opts.pandocPath)) {
      logger.info(`Using configured Pandoc at: ${opts.pandocPath}`);
      return opts.pandocPath;
    }
    logger.warn(`Configured Pandoc not found at ${opts.pandocPath}; trying other locations`);
  }

  const bundled = path.resolve(opts.cwd ?? process.cwd(), BUNDLED_PANDOC_DIR, PANDOC_NAME);
  if (fs.existsSync(bundled)) {
    logger.info(`Using bundled Pandoc at: ${bundled}`);
    return bundled;
  }

  const onPath = locator.find('pandoc');
  if (onPath) {
    logger.info(`Using system Pandoc at: ${onPath}`);
    return onPath;
  }

  logger.warn('Pandoc not found on PATH; conversions will fail until it is installed');
  return 'pandoc';
}
