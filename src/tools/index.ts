import type { ToolDefinition } from '../types.js';
import { createFileTool } from './create-file.js';
import { convertFileTool } from './convert-file.js';
import { checkEnginesTool } from './check-engines.js';

export { createFileTool, convertFileTool, checkEnginesTool };

export const tools: ToolDefinition[] = [createFileTool, convertFileTool, checkEnginesTool];
