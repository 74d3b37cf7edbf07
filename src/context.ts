import { locatePandoc } from './bootstrap.js';
import { makeEngine } from './engine.js';
import { Logger } from './logger.js';
import { pathLocator } from './which.js';
import type { ResolvedConfig } from './config.js';
import type { ToolContext } from './types.js';

/**
 * Build the shared tool context from resolved configuration.
 */
export function createToolContext(config: ResolvedConfig, logger = new Logger(config.logLevel)): ToolContext {
  const locator = pathLocator();
  const executable = locatePandoc({ pandocPath: config.pandocPath, locator, logger });
  return {
    engine: makeEngine(executable, logger),
    locator,
    logger,
    filterDir: config.filterDir,
    sandboxDir: config.sandboxDir,
  };
}
