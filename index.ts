import { loadConfig } from './src/config.js';
import { createToolContext } from './src/context.js';
import { formatError } from './src/errors.js';
import { tools } from './src/tools/index.js';
import type { PluginApi, ToolContext } from './src/types.js';

export const PLUGIN_NAME = 'pandoc-convert';
export const PLUGIN_VERSION = '0.1.0';

/**
 * Pandoc document conversion plugin.
 *
 * Registers create_file, convert_file and check_engines.
 * Config: pandocPath, sandboxDir, filterDir, logLevel (all optional).
 */
export default function pandocConvertPlugin(api: PluginApi) {
  const config = api.getConfig();

  let ctx: ToolContext | undefined;
  let configFailure: unknown;
  try {
    ctx = createToolContext(loadConfig(config));
  } catch (e) {
    // Plugin loads fine; every tool call reports the configuration problem
    configFailure = e;
  }

  for (const tool of tools) {
    api.registerTool({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
      execute: async (args) => (ctx ? tool.execute(args, ctx) : formatError(configFailure)),
    });
  }

  return { name: PLUGIN_NAME, version: PLUGIN_VERSION };
}
