/**
 * MCP Server Tests
 * Protocol round trips through an in-memory transport pair
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SERVER_INFO, TflMcpServer } from '../src/server';
import {
  FIXED_NOW,
  FetchMock,
  TEST_CONFIG,
  TflMockHelper,
  installFetchMock,
  mockJsonSequence
} from './helpers/mockHelper';

describe('TflMcpServer', () => {
  describe('health and session', () => {
    it('should generate a session id per instance', () => {
      const first = new TflMcpServer({ config: TEST_CONFIG });
      const second = new TflMcpServer({ config: TEST_CONFIG });

      expect(first.getSessionId()).toMatch(/^pid-\d+-\d+-[a-z0-9]{9}$/);
      expect(first.getSessionId()).not.toBe(second.getSessionId());
      expect(first.getErrorHandler().getSessionId()).toBe(first.getSessionId());
    });

    it('should report healthy until shut down', async () => {
      const mcpServer = new TflMcpServer({ config: TEST_CONFIG });

      const health = mcpServer.getHealthStatus();
      expect(health.status).toBe('healthy');
      expect(health.version).toBe(SERVER_INFO.version);
      expect(health.sessionId).toBe(mcpServer.getSessionId());

      await mcpServer.shutdown('test');

      expect(mcpServer.getHealthStatus().status).toBe('shutting_down');
    });
  });

  describe('over MCP', () => {
    let mockFetch: FetchMock;
    let mcpServer: TflMcpServer;
    let server: Server;
    let client: Client;

    beforeEach(async () => {
      mockFetch = installFetchMock();
      mcpServer = new TflMcpServer({ config: TEST_CONFIG, clock: () => FIXED_NOW });
      server = mcpServer.createServer();
      client = new Client({ name: 'test-client', version: '1.0.0' });

      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await server.connect(serverTransport);
      await client.connect(clientTransport);
    });

    afterEach(async () => {
      await client.close();
      await server.close();
    });

    it('should advertise the server identity', () => {
      expect(client.getServerVersion()).toMatchObject({ name: 'tfl-mcp-server', version: '1.0.0' });
      expect(client.getServerCapabilities()).toMatchObject({ tools: {}, resources: {} });
    });

    it('should list the five tools', async () => {
      const { tools } = await client.listTools();

      expect(tools.map(tool => tool.name)).toEqual([
        'get-line-status',
        'get-arrivals',
        'search-bike-points',
        'get-station-info',
        'find-stops-by-radius'
      ]);
    });

    it('should call a tool and return its text', async () => {
      mockJsonSequence(mockFetch, [[TflMockHelper.line('Victoria', 'Good Service')]]);

      const result = await client.callTool({ name: 'get-line-status', arguments: { lines: 'victoria' } });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'Current Line Statuses:\n\nLine: Victoria\nStatus: Good Service\n---' }]
      });
    });

    it('should return upstream failures as normal content', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await client.callTool({ name: 'search-bike-points', arguments: { location: 'Soho' } });

      expect(result).toMatchObject({
        content: [{ type: 'text', text: 'Failed to search for bike points near Soho' }]
      });
    });

    it('should surface input errors as protocol errors', async () => {
      await expect(client.callTool({ name: 'get-line-status', arguments: {} })).rejects.toThrow(
        'Lines parameter is required'
      );
      await expect(client.callTool({ name: 'get-weather', arguments: {} })).rejects.toThrow(
        'Unknown tool: get-weather'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should refuse tool calls once shutting down', async () => {
      await mcpServer.shutdown('test');

      await expect(client.callTool({ name: 'get-line-status', arguments: { lines: 'victoria' } })).rejects.toThrow(
        'Server is shutting down'
      );
    });

    it('should list and read resources', async () => {
      mockJsonSequence(mockFetch, [[TflMockHelper.mode('dlr', true, true, 'Docklands Light Railway')]]);

      const { resources } = await client.listResources();
      const read = await client.readResource({ uri: 'tfl://modes' });

      expect(resources.map(resource => resource.uri)).toEqual(['tfl://lines', 'tfl://stations', 'tfl://modes']);
      expect(read.contents).toEqual([{
        uri: 'tfl://modes',
        mimeType: 'text/plain',
        text: 'TfL Transport Modes:\n\n' +
          'Name: dlr\nDescription: Docklands Light Railway\nIs TfL Service: Yes\nIs Scheduled Service: Yes\n---'
      }]);
    });

    it('should reject an unknown resource', async () => {
      await expect(client.readResource({ uri: 'tfl://ferries' })).rejects.toThrow('Unknown resource URI: tfl://ferries');
    });
  });
});
