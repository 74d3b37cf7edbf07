import type { ZodRawShape } from 'zod';
import type { FormatId } from './formats.js';
import type { Logger } from './logger.js';

/**
 * Standard response returned by every tool's execute() function.
 */
export interface ToolResponse {
  success: boolean;
  output?: string;
  error?: string;
  errorCode?: string;
}

/**
 * Context object passed to every tool's execute() function.
 * Created once per host (plugin or MCP server) and shared across all tools.
 */
export interface ToolContext {
  engine: ConversionEngine;
  locator: ExecutableLocator;
  logger: Logger;
  /** Directory searched by basename as the last filter candidate. */
  filterDir: string;
  sandboxDir?: string;
}

/**
 * Finds executables on the search path. Injected so PDF engine detection can
 * be faked in tests.
 */
export interface ExecutableLocator {
  find(name: string): string | null;
}

export type ConversionSource =
  | { kind: 'text'; content: string }
  | { kind: 'file'; path: string };

/**
 * One call into the conversion engine.
 */
export interface EngineRequest {
  source: ConversionSource;
  from: FormatId;
  to: FormatId;
  outputPath: string;
  /** Extra engine arguments produced by buildEngineArgs(). */
  args: string[];
  /** Environment added to the engine process for this invocation only. */
  env: Record<string, string>;
}

/**
 * Client for the external conversion engine.
 */
export interface ConversionEngine {
  readonly executable: string;
  convert(request: EngineRequest): Promise<void>;
  version(): Promise<string>;
}

export interface ResolvedFilter {
  reference: string;
  path: string;
}

export interface EngineArgs {
  args: string[];
  env: Record<string, string>;
}

export type ToolArgs = Record<string, unknown>;

/**
 * Tool definition shape. Every tool module exports an object matching this interface.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;  // JSON Schema
  /** Same parameters as a zod shape, for hosts that validate with zod. */
  inputShape: ZodRawShape;
  execute: (args: ToolArgs, ctx: ToolContext) => Promise<ToolResponse>;
}

/**
 * Tool as handed to the plugin host.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  execute: (args: ToolArgs) => Promise<ToolResponse>;
}

/**
 * Subset of the plugin host API this plugin uses.
 */
export interface PluginApi {
  getConfig(): Record<string, unknown>;
  registerTool(tool: RegisteredTool): void;
}
