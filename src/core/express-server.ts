import express, { Request, Response, NextFunction } from 'express';
import { Server as HttpServer } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SERVER_INFO, TflMcpServer } from '../server.js';
import { ServerConfig } from '../types/server.types.js';
import { TOOL_NAMES } from '../services/tool-service.js';
import { RESOURCE_URIS } from '../services/resource-service.js';

export class ExpressServer {
  private app: express.Application;
  private config: ServerConfig;
  private mcpServer: TflMcpServer;
  private httpServer: HttpServer | undefined;

  // Pre-compiled error patterns for categorizing transport failures
  private static readonly ERROR_PATTERNS = [
    { pattern: /stream is not readable/i, type: 'transport_stream', status: 400 },
    { pattern: /parse error/i, type: 'mcp_parse', status: 400 },
    { pattern: /invalid request/i, type: 'mcp_validation', status: 400 },
    { pattern: /timeout/i, type: 'transport_timeout', status: 504 },
  ] as const;

  private static readonly DEFAULT_ERROR = { type: 'server_internal', status: 500 } as const;

  constructor(config: ServerConfig, mcpServer: TflMcpServer = new TflMcpServer()) {
    this.app = express();
    this.config = config;
    this.mcpServer = mcpServer;

    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      const allowedOrigins = process.env.ALLOWED_ORIGINS;
      const origin = req.get('Origin');

      if (this.config.environment === 'development') {
        res.header('Access-Control-Allow-Origin', '*');
      } else if (allowedOrigins) {
        const origins = allowedOrigins.split(',').map(o => o.trim());
        if (origin && origins.includes(origin)) {
          res.header('Access-Control-Allow-Origin', origin);
        }
      } else if (origin) {
        // No allow-list configured in production: cross-origin requests are refused
        res.status(403).json({
          error: 'CORS policy violation',
          message: 'Origin not allowed. Configure ALLOWED_ORIGINS to permit it.',
          origin
        });
        return;
      }

      res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization, Mcp-Session-Id');
      res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');

      if (req.method === 'OPTIONS') {
        res.status(200).end();
        return;
      }

      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      const health = this.mcpServer.getHealthStatus();
      const statusCode = health.status === 'healthy' ? 200 : 503;

      res.status(statusCode).json({
        ...health,
        service: SERVER_INFO.name,
        environment: this.config.environment,
        checks: {
          tflCredentials: process.env.TFL_APP_KEY ? 'configured' : 'not_configured',
          uptime: process.uptime(),
          nodeVersion: process.version
        },
        transport: {
          mode: 'http',
          endpoints: {
            mcp: '/mcp',
            health: '/health'
          }
        }
      });
    });

    this.app.get('/', (req: Request, res: Response) => {
      res.json({
        name: 'TfL MCP Server',
        version: SERVER_INFO.version,
        description: 'Transport for London line status, arrivals, stations and bike points over MCP',
        transport: 'http',
        endpoints: {
          health: '/health',
          mcp: '/mcp'
        },
        tools: [...TOOL_NAMES],
        resources: [...RESOURCE_URIS]
      });
    });

    // Stateless Streamable HTTP: a fresh server and transport per request
    this.app.post('/mcp', async (req: Request, res: Response) => {
      const server = this.mcpServer.createServer();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          this.mcpServer.getErrorHandler().logError('Failed to close MCP transport', error);
        });
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        const { type: errorType, status: statusCode } = this.categorizeError(error);

        this.mcpServer.getErrorHandler().logError('MCP request failed', error, {
          method: req.method,
          url: req.url,
          errorType
        });

        if (!res.headersSent) {
          res.status(statusCode).json({
            error: `MCP ${errorType} error`,
            type: errorType,
            timestamp: new Date().toISOString(),
            message: this.config.environment === 'development' && error instanceof Error
              ? error.message
              : 'Internal server error'
          });
        }
      }
    });

    // Stateless mode has no SSE stream or session to delete
    this.app.all('/mcp', (req: Request, res: Response) => {
      res.status(405).json({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null
      });
    });

    this.app.use('*', (req: Request, res: Response) => {
      res.status(404).json({
        error: 'Endpoint not found',
        path: req.originalUrl,
        availableEndpoints: ['/', '/health', '/mcp'],
      });
    });

    // Express recognises error middleware by its four parameters
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      this.mcpServer.getErrorHandler().logError('Express server error', err, { path: req.path, method: req.method });
      res.status(500).json({
        error: 'Internal server error',
        details: this.config.environment === 'development' ? err.message : 'Something went wrong',
      });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const httpServer = this.app.listen(this.config.port, this.config.host, () => {
        console.error(`TfL MCP Server running on http://${this.config.host}:${this.config.port}`);
        console.error(`  Health check: http://${this.config.host}:${this.config.port}/health`);
        console.error(`  MCP endpoint: http://${this.config.host}:${this.config.port}/mcp`);
        resolve();
      });
      httpServer.once('error', reject);
      this.httpServer = httpServer;
    });

    this.setupGracefulShutdown();
  }

  private categorizeError(error: unknown): { type: string; status: number } {
    if (!(error instanceof Error)) {
      return ExpressServer.DEFAULT_ERROR;
    }

    for (const { pattern, type, status } of ExpressServer.ERROR_PATTERNS) {
      if (pattern.test(error.message)) {
        return { type, status };
      }
    }

    return ExpressServer.DEFAULT_ERROR;
  }

  private setupGracefulShutdown(): void {
    const shutdownHandler = () => {
      this.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          this.mcpServer.getErrorHandler().logError('Error during shutdown', error);
          process.exit(1);
        }
      );
    };

    process.once('SIGTERM', shutdownHandler);
    process.once('SIGINT', shutdownHandler);
  }

  /**
   * Close the HTTP listener; safe to call when it never started
   */
  async stop(): Promise<void> {
    console.error('Shutting down Express server gracefully...');
    await this.mcpServer.shutdown('http-stop');

    const httpServer = this.httpServer;
    this.httpServer = undefined;
    if (!httpServer) return;

    await new Promise<void>((resolve, reject) => {
      httpServer.close(error => (error ? reject(error) : resolve()));
    });
  }
}
