import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ToolSessionProvider } from './provider.js';

const { toolsByCommand, failingCommands } = vi.hoisted(() => ({
  toolsByCommand: new Map<string, string[]>(),
  failingCommands: new Set<string>(),
}));

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: vi.fn().mockImplementation((params: { command: string }) => ({
    params,
    close: vi.fn().mockResolvedValue(undefined),
  })),
  getDefaultEnvironment: vi.fn().mockReturnValue({}),
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: vi.fn().mockImplementation(() => {
    let command = '';
    return {
      connect: vi.fn(async (transport: { params: { command: string } }) => {
        if (failingCommands.has(transport.params.command)) {
          throw new Error('spawn ENOENT');
        }
        command = transport.params.command;
      }),
      listTools: vi.fn(async () => ({
        tools: (toolsByCommand.get(command) ?? []).map(name => ({
          name,
          inputSchema: { type: 'object', properties: { path: { type: 'string' } } },
        })),
      })),
      callTool: vi.fn(async ({ name }: { name: string }) => ({
        content: [{ type: 'text', text: `${command}:${name}` }],
      })),
      close: vi.fn().mockResolvedValue(undefined),
    };
  }),
}));

const CALL_OPTIONS = { toolCallId: 'call-1', messages: [] };

function makeProvider(): ToolSessionProvider {
  return ToolSessionProvider.fromServers([
    { name: 'files', command: 'files-server', tools: ['read_file', 'list_directory', 'write_file'] },
    { name: 'search', command: 'search-server' },
    { name: 'health', command: 'health-server', tools: ['query_health_data'] },
  ]);
}

beforeEach(() => {
  vi.clearAllMocks();
  toolsByCommand.clear();
  failingCommands.clear();
  toolsByCommand.set('files-server', ['read_file', 'list_directory', 'write_file']);
  toolsByCommand.set('search-server', ['search', 'summarize']);
  toolsByCommand.set('health-server', ['query_health_data']);
});

describe('ToolSessionProvider', () => {
  it('exposes the static role table', () => {
    const provider = makeProvider();
    expect(provider.toolsFor('report_writer')).toEqual(['write_file', 'create_issue']);
    expect(provider.toolsFor('nobody')).toEqual([]);
  });

  it('does not connect anything up front', () => {
    const provider = makeProvider();
    expect(provider.serverNames()).toEqual(['files', 'search', 'health']);
    expect(provider.openSessionCount).toBe(0);
  });

  it('resolves only the tools a role may use, skipping servers that cannot serve it', async () => {
    const provider = makeProvider();

    const tools = await provider.resolveTools('fact_extractor');

    expect(Object.keys(tools)).toEqual(['read_file', 'search']);
    expect(provider.openSessionCount).toBe(2);
  });

  it('gives root every tool from every server', async () => {
    const provider = makeProvider();

    const tools = await provider.resolveTools('root');

    expect(Object.keys(tools)).toEqual([
      'read_file', 'list_directory', 'write_file', 'search', 'summarize', 'query_health_data',
    ]);
    expect(provider.openSessionCount).toBe(3);
  });

  it('returns no tools and opens nothing for unknown roles', async () => {
    const provider = makeProvider();
    await expect(provider.resolveTools('janitor')).resolves.toEqual({});
    expect(provider.openSessionCount).toBe(0);
  });

  it('reports servers that fail to connect and keeps the rest', async () => {
    failingCommands.add('health-server');
    const onError = vi.fn();
    const provider = makeProvider();

    const tools = await provider.resolveTools('verification_specialist', onError);

    expect(Object.keys(tools)).toEqual(['search']);
    expect(onError).toHaveBeenCalledWith('health', new Error('spawn ENOENT'));
  });

  it('routes tool calls to the owning session', async () => {
    const provider = makeProvider();
    const tools = await provider.resolveTools('document_processor');

    const output = await tools.read_file.execute?.({ path: 'report.pdf' }, CALL_OPTIONS);

    expect(output).toBe('files-server:read_file');
  });

  it('returns undefined for an unconfigured server', async () => {
    const provider = makeProvider();
    await expect(provider.getSession('ghost')).resolves.toBeUndefined();
  });

  it('closes every session and tolerates repeated calls', async () => {
    const provider = makeProvider();
    await provider.resolveTools('root');

    await provider.closeAll();
    await provider.closeAll();

    expect(provider.openSessionCount).toBe(0);
  });
});
