import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { MCPSessionPool } from './sessions.js';
import { createStdioTransport } from './stdio.js';
import { createHttpTransport } from './http.js';
import type { MCPServerConfig } from './types.js';

const { mockConnect, mockListTools, mockCallTool, mockClientClose, mockTransportClose } = vi.hoisted(() => ({
  mockConnect: vi.fn(),
  mockListTools: vi.fn(),
  mockCallTool: vi.fn(),
  mockClientClose: vi.fn(),
  mockTransportClose: vi.fn(),
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: vi.fn().mockImplementation(() => ({
    connect: mockConnect,
    listTools: mockListTools,
    callTool: mockCallTool,
    close: mockClientClose,
  })),
}));

vi.mock('./stdio.js', () => ({
  createStdioTransport: vi.fn(() => ({ close: mockTransportClose })),
}));

vi.mock('./http.js', () => ({
  createHttpTransport: vi.fn(() => ({ close: mockTransportClose })),
}));

const servers: MCPServerConfig[] = [
  { name: 'files', command: 'files-server' },
  { name: 'search', url: 'http://localhost:3001/mcp' },
];

beforeEach(() => {
  vi.clearAllMocks();
  mockConnect.mockResolvedValue(undefined);
  mockListTools.mockResolvedValue({
    tools: [{ name: 'read_file', description: 'Read a file', inputSchema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] } }],
  });
  mockClientClose.mockResolvedValue(undefined);
  mockTransportClose.mockResolvedValue(undefined);
});

describe('MCPSessionPool', () => {
  it('does not connect until a session is requested', () => {
    const pool = new MCPSessionPool(servers);
    expect(pool.serverNames()).toEqual(['files', 'search']);
    expect(pool.openCount).toBe(0);
    expect(Client).not.toHaveBeenCalled();
  });

  it('opens a stdio session and lists its tools', async () => {
    const pool = new MCPSessionPool(servers);
    const session = await pool.getSession('files');

    expect(createStdioTransport).toHaveBeenCalledWith(servers[0]);
    expect(createHttpTransport).not.toHaveBeenCalled();
    expect(session?.transportKind).toBe('stdio');
    expect(session?.tools).toEqual([
      {
        name: 'read_file',
        description: 'Read a file',
        inputSchema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
      },
    ]);
    expect(pool.isOpen('files')).toBe(true);
    expect(pool.isOpen('search')).toBe(false);
  });

  it('uses the HTTP transport for servers with a URL', async () => {
    const pool = new MCPSessionPool(servers);
    const session = await pool.getSession('search');

    expect(createHttpTransport).toHaveBeenCalledWith(servers[1]);
    expect(session?.transportKind).toBe('http');
  });

  it('resolves to undefined for an unknown server', async () => {
    const pool = new MCPSessionPool(servers);
    await expect(pool.getSession('missing')).resolves.toBeUndefined();
    expect(Client).not.toHaveBeenCalled();
  });

  it('reuses an open session', async () => {
    const pool = new MCPSessionPool(servers);
    const a = await pool.getSession('files');
    const b = await pool.getSession('files');

    expect(a).toBe(b);
    expect(mockConnect).toHaveBeenCalledTimes(1);
  });

  it('shares one connection attempt between concurrent requests', async () => {
    const pool = new MCPSessionPool(servers);
    const [a, b] = await Promise.all([pool.getSession('files'), pool.getSession('files')]);

    expect(a).toBe(b);
    expect(Client).toHaveBeenCalledTimes(1);
    expect(pool.openCount).toBe(1);
  });

  it('retries after a failed connection attempt', async () => {
    mockConnect.mockRejectedValueOnce(new Error('spawn ENOENT'));
    const pool = new MCPSessionPool(servers);

    await expect(pool.getSession('files')).rejects.toThrow('spawn ENOENT');
    expect(pool.isOpen('files')).toBe(false);

    const session = await pool.getSession('files');
    expect(session?.serverName).toBe('files');
  });

  it('closes a connected client whose tool listing fails', async () => {
    mockListTools.mockRejectedValueOnce(new Error('method not found'));
    const pool = new MCPSessionPool(servers);

    await expect(pool.getSession('files')).rejects.toThrow('method not found');

    expect(mockClientClose).toHaveBeenCalledTimes(1);
    expect(mockTransportClose).toHaveBeenCalledTimes(1);
    expect(pool.openCount).toBe(0);
  });

  it('keeps the listing error when closing the half-open session also fails', async () => {
    mockListTools.mockRejectedValueOnce(new Error('method not found'));
    mockClientClose.mockRejectedValueOnce(new Error('broken pipe'));
    const onCloseError = vi.fn();
    const pool = new MCPSessionPool(servers, onCloseError);

    await expect(pool.getSession('files')).rejects.toThrow('method not found');

    expect(onCloseError).toHaveBeenCalledWith('files', new Error('broken pipe'));
    expect(mockTransportClose).toHaveBeenCalledTimes(1);
  });

  it('maps tool call results', async () => {
    mockCallTool.mockResolvedValue({ content: [{ type: 'text', text: 'hello' }], isError: false });
    const pool = new MCPSessionPool(servers);
    const session = await pool.getSession('files');

    const result = await session?.callTool('read_file', { path: 'a.txt' });

    expect(mockCallTool).toHaveBeenCalledWith({ name: 'read_file', arguments: { path: 'a.txt' } });
    expect(result).toEqual({ success: true, content: [{ type: 'text', text: 'hello' }], isError: false });
  });

  it('closes every session and can be called twice', async () => {
    const pool = new MCPSessionPool(servers);
    await pool.getSession('files');
    await pool.getSession('search');

    await pool.closeAll();
    await pool.closeAll();

    expect(pool.openCount).toBe(0);
    expect(mockClientClose).toHaveBeenCalledTimes(2);
    expect(mockTransportClose).toHaveBeenCalledTimes(2);
  });

  it('reports close failures to the handler without throwing', async () => {
    mockClientClose.mockRejectedValueOnce(new Error('broken pipe'));
    const onCloseError = vi.fn();
    const pool = new MCPSessionPool(servers, onCloseError);
    await pool.getSession('files');

    await expect(pool.closeAll()).resolves.toBeUndefined();

    expect(onCloseError).toHaveBeenCalledWith('files', new Error('broken pipe'));
    expect(mockTransportClose).toHaveBeenCalledTimes(1);
    expect(pool.openCount).toBe(0);
  });
});
