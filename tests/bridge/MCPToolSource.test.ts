import { jest } from '@jest/globals';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { ListToolsResult } from '@modelcontextprotocol/sdk/types.js';
import { MCPToolSource } from '../../src/bridge/MCPToolSource.js';
import { ConfigurationError } from '../../src/errors/ErrorHandling.js';

const mockConnect = jest.fn<() => Promise<void>>();
const mockListTools = jest.fn<() => Promise<ListToolsResult>>();
const mockClose = jest.fn<() => Promise<void>>();

// Mock the MCP SDK client side
jest.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: jest.fn().mockImplementation(() => ({
    connect: mockConnect,
    listTools: mockListTools,
    close: mockClose,
  })),
}));

jest.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: jest.fn(),
}));

const readTool = {
  name: 'read',
  description: 'Read a file',
  inputSchema: { type: 'object' as const, properties: { path: { type: 'string' } } },
};

const fetchTool = {
  name: 'fetch',
  inputSchema: { type: 'object' as const, properties: { url: { type: 'string' } } },
};

describe('MCPToolSource', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockListTools.mockReset();
    mockConnect.mockResolvedValue(undefined);
    mockClose.mockResolvedValue(undefined);
  });

  it('starts each server over stdio and qualifies tool names', async () => {
    mockListTools
      .mockResolvedValueOnce({ tools: [readTool] })
      .mockResolvedValueOnce({ tools: [fetchTool] });
    const source = new MCPToolSource([
      { name: 'files', command: 'node', args: ['files.js'], env: { ROOT: '/data' } },
      { name: 'web', command: 'web-server' },
    ]);

    await source.initialize();

    expect(StdioClientTransport).toHaveBeenCalledTimes(2);
    expect(StdioClientTransport).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({
        command: 'node',
        args: ['files.js'],
        env: expect.objectContaining({ ROOT: '/data' }),
      }),
    );
    expect(StdioClientTransport).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ command: 'web-server', args: [] }),
    );
    expect(source.listServers()).toEqual(['files', 'web']);
    expect(source.getRegisteredTools().map((tool) => tool.qualifiedName)).toEqual([
      'files__read',
      'web__fetch',
    ]);
    expect(source.getToolDescriptors()).toEqual([
      {
        name: 'files__read',
        description: 'Read a file',
        parameters: { type: 'object', properties: { path: { type: 'string' } } },
      },
      {
        name: 'web__fetch',
        description: '',
        parameters: { type: 'object', properties: { url: { type: 'string' } } },
      },
    ]);
  });

  it('keeps the listed names when qualification is off', async () => {
    mockListTools.mockResolvedValueOnce({ tools: [readTool, fetchTool] });
    const source = new MCPToolSource([{ name: 'files', command: 'node' }], {
      qualifyNames: false,
    });

    await source.initialize();

    expect(source.getRegisteredTools()).toEqual([
      { qualifiedName: 'read', server: 'files', toolName: 'read', tool: readTool },
      { qualifiedName: 'fetch', server: 'files', toolName: 'fetch', tool: fetchTool },
    ]);
  });

  it('rejects duplicate server names', async () => {
    mockListTools.mockResolvedValue({ tools: [] });
    const source = new MCPToolSource([
      { name: 'files', command: 'node' },
      { name: 'files', command: 'node' },
    ]);

    await expect(source.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fails when a server does not list its tools in time', async () => {
    mockListTools.mockReturnValueOnce(new Promise<ListToolsResult>(() => undefined));
    const source = new MCPToolSource([{ name: 'slow', command: 'node', timeoutMs: 10 }]);

    await expect(source.initialize()).rejects.toThrow('slow listTools timed out after 10ms');
  });

  it('closes every client and forgets the tools', async () => {
    mockListTools.mockResolvedValue({ tools: [readTool] });
    const source = new MCPToolSource([
      { name: 'a', command: 'node' },
      { name: 'b', command: 'node' },
    ]);
    await source.initialize();

    await source.close();

    expect(mockClose).toHaveBeenCalledTimes(2);
    expect(source.listServers()).toEqual([]);
    expect(source.getRegisteredTools()).toEqual([]);
  });
});
