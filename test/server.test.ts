import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer, toCallToolResult } from '../src/server.js';
import { mockContext } from './helpers.js';
import type { TestContext } from './helpers.js';

describe('toCallToolResult', () => {
  it('maps success to text content', () => {
    expect(toCallToolResult({ success: true, output: 'done' })).toEqual({
      content: [{ type: 'text', text: 'done' }],
    });
  });

  it('flags failures with isError', () => {
    expect(toCallToolResult({ success: false, error: 'bad', errorCode: 'X' })).toEqual({
      content: [{ type: 'text', text: 'bad' }],
      isError: true,
    });
  });
});

describe('MCP server', () => {
  let ctx: TestContext;
  let client: Client;

  beforeEach(async () => {
    ctx = mockContext();
    const server = createServer(ctx);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('lists the conversion tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['check_engines', 'convert_file', 'create_file']);
  });

  it('creates a file through a tool call', async () => {
    const result = await client.callTool({
      name: 'create_file',
      arguments: { content: '# Hi', output_file: 'out.html', input_format: 'markdown' },
    });
    expect(result).toMatchObject({
      content: [
        {
          type: 'text',
          text: `File successfully created and saved to: ${path.join(ctx.sandboxDir, 'out.html')}`,
        },
      ],
    });
    expect(ctx.engine.convert).toHaveBeenCalledTimes(1);
  });

  it('returns tool failures as error results', async () => {
    const result = await client.callTool({
      name: 'convert_file',
      arguments: { input_file: 'missing.md', output_file: 'out.html' },
    });
    expect(result).toMatchObject({
      content: [{ type: 'text', text: 'Validation error: Input file not found: missing.md' }],
      isError: true,
    });
  });
});
