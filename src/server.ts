
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ErrorHandler } from './core/error-handler.js';
import { TflClient } from './core/tfl-client.js';
import { loadTflConfig } from './core/config.js';
import { ToolService } from './services/tool-service.js';
import { ResourceService } from './services/resource-service.js';
import { HealthStatus, TflApiConfig } from './types/server.types.js';

interface TransportError extends Error {
  code?: string;
}

// Process exit codes
const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
} as const;

const SESSION_ID_LENGTH = 9;

export const SERVER_INFO = {
  name: 'tfl-mcp-server',
  version: '1.0.0',
} as const;

export interface TflMcpServerOptions {
  config?: TflApiConfig;
  clock?: () => Date;
}

export class TflMcpServer {
  private server: Server;
  private isShuttingDown = false;
  private isConnected = false;
  private readonly sessionId: string;
  private readonly errorHandler: ErrorHandler;
  private readonly toolService: ToolService;
  private readonly resourceService: ResourceService;

  constructor(options: TflMcpServerOptions = {}) {
    // Unique per process and instance, attached to every structured log entry
    this.sessionId = `pid-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2, 2 + SESSION_ID_LENGTH).padEnd(SESSION_ID_LENGTH, '0')}`;

    this.errorHandler = new ErrorHandler(this.sessionId);
    const client = new TflClient(options.config ?? loadTflConfig(), this.errorHandler);
    this.toolService = new ToolService(client, this.errorHandler, options.clock);
    this.resourceService = new ResourceService(client);

    this.server = this.createServer();
  }

  /**
   * Build an SDK server with every request handler registered.
   * STDIO mode uses one for its lifetime; HTTP mode builds one per request.
   */
  createServer(): Server {
    const server = new Server(
      {
        name: SERVER_INFO.name,
        version: SERVER_INFO.version,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.toolService.listTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      if (this.isShuttingDown) {
        throw new Error('Server is shutting down');
      }

      const { name, arguments: args } = request.params;
      return this.toolService.callTool(name, args);
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return { resources: this.resourceService.listResources() };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      const text = await this.resourceService.readResource(uri);

      return {
        contents: [{
          uri,
          mimeType: 'text/plain',
          text,
        }],
      };
    });

    return server;
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();

    transport.onclose = () => {
      this.isConnected = false;
      process.exit(EXIT_CODES.SUCCESS);
    };

    transport.onerror = (error: Error) => {
      this.isConnected = false;
      const transportError: TransportError = error;
      if (transportError.code === 'EPIPE') {
        // Client disconnected
        process.exit(EXIT_CODES.SUCCESS);
      } else {
        this.errorHandler.logError('Transport error', error);
      }
    };

    this.setupGracefulShutdown();

    await this.server.connect(transport);
    this.isConnected = true;
    console.error('TfL MCP Server started successfully');
  }

  private setupGracefulShutdown(): void {
    const shutdown = (signal: string) => {
      this.shutdown(signal).then(
        () => process.exit(EXIT_CODES.SUCCESS),
        (error: unknown) => {
          this.errorHandler.logError('Error during shutdown', error, { signal });
          process.exit(EXIT_CODES.ERROR);
        }
      );
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  }

  async shutdown(signal = 'manual'): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    console.error(`Received ${signal}, shutting down TfL MCP Server...`);
    if (this.isConnected) {
      await this.server.close();
      this.isConnected = false;
    }
  }

  getHealthStatus(): HealthStatus {
    return {
      status: this.isShuttingDown ? 'shutting_down' : 'healthy',
      timestamp: new Date().toISOString(),
      version: SERVER_INFO.version,
      sessionId: this.sessionId,
    };
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }
}
