import { describe, test, expect, jest, beforeEach } from '@jest/globals';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { TransportManager } from '../../../src/transport/manager';
import { mcpServer } from '../../../src/mcp/mcpServer';

// Mock the MCP server
jest.mock('../../../src/mcp/mcpServer', () => ({
  mcpServer: {
    connect: jest.fn(),
  },
}));

describe('Transport Manager', () => {
  let transportManager: TransportManager;
  const mockConnect = jest.mocked(mcpServer.connect);

  beforeEach(() => {
    transportManager = new TransportManager();
    jest.clearAllMocks();
  });

  test('should create TransportManager instance', () => {
    expect(transportManager).toBeInstanceOf(TransportManager);
  });

  test('should connect to STDIO transport by default', async () => {
    mockConnect.mockResolvedValue(undefined);

    await expect(transportManager.connectStdio()).resolves.toBeUndefined();

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledWith(expect.any(StdioServerTransport));
  });

  test('should connect with custom transport', async () => {
    mockConnect.mockResolvedValue(undefined);
    const customTransport = new StdioServerTransport();

    await expect(transportManager.connect(customTransport)).resolves.toBeUndefined();

    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledWith(customTransport);
  });

  test('should go through connectStdio when no transport is provided', async () => {
    mockConnect.mockResolvedValue(undefined);
    const connectStdio = jest.spyOn(transportManager, 'connectStdio');

    await expect(transportManager.connect()).resolves.toBeUndefined();

    expect(connectStdio).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledWith(expect.any(StdioServerTransport));
  });

  test('should handle connection errors', async () => {
    mockConnect.mockRejectedValue(new Error('Connection failed'));

    await expect(transportManager.connectStdio()).rejects.toThrow('Connection failed');
  });
});
