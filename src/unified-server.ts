#!/usr/bin/env node

/**
 * Unified TfL MCP Server
 * Supports multiple transport modes: STDIO, Streamable HTTP
 * Usage:
 *   node dist/src/unified-server.js --mode=stdio
 *   node dist/src/unified-server.js --mode=http --port=8080
 *   node dist/src/unified-server.js --mode=http --host=0.0.0.0 --port=8080
 */

import { TflMcpServer, SERVER_INFO } from './server.js';
import { ExpressServer } from './core/express-server.js';
import { API_CONFIG, loadEnvironmentVariables } from './core/config.js';
import { validationError } from './core/error-handler.js';
import { CLIArgs, ServerConfig } from './types/server.types.js';

export function parseArgs(argv: string[]): CLIArgs {
  const args: CLIArgs = {
    mode: 'stdio', // STDIO is what desktop MCP hosts launch
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('--mode=')) {
      const mode = arg.slice('--mode='.length);
      if (mode !== 'stdio' && mode !== 'http') {
        throw validationError(`Invalid mode specified: ${mode}`, { mode, validModes: ['stdio', 'http'] });
      }
      args.mode = mode;
    } else if (arg.startsWith('--port=')) {
      const port = parseInt(arg.slice('--port='.length), 10);
      if (isNaN(port) || port < 0 || port > 65535) {
        throw validationError(`Invalid port specified: ${arg.slice('--port='.length)}`);
      }
      args.port = port;
    } else if (arg.startsWith('--host=')) {
      args.host = arg.slice('--host='.length);
    }
  }

  return args;
}

function showHelp(): void {
  console.log(`
TfL MCP Server - Unified Transport

Usage:
  node dist/src/unified-server.js [options]

Options:
  --mode=<stdio|http>     Transport mode (default: stdio)
  --host=<host>          Host to bind (default: 0.0.0.0, HTTP mode only)
  --port=<port>          Port to listen (default: 8080, HTTP mode only)
  --help, -h             Show this help

Examples:
  # STDIO mode (for desktop MCP hosts)
  node dist/src/unified-server.js --mode=stdio

  # Streamable HTTP mode (for web clients)
  node dist/src/unified-server.js --mode=http --port=8080

Environment Variables:
  NODE_ENV               development|production
  PORT                   Override default port (8080)
  HOST                   Override default host (0.0.0.0)
  ALLOWED_ORIGINS        Comma-separated CORS origins (production)
  TFL_APP_ID             TfL API application id
  TFL_APP_KEY            TfL API application key
  TFL_API_BASE           Override the TfL API base URL
`);
}

async function startSTDIOServer(): Promise<void> {
  console.error('Starting TfL MCP Server in STDIO mode...');

  const mcpServer = new TflMcpServer();
  await mcpServer.start();
}

async function startHTTPServer(host: string, port: number): Promise<void> {
  const config: ServerConfig = {
    port,
    host,
    environment: process.env.NODE_ENV === 'production' ? 'production' : 'development',
  };

  console.error('Starting TfL MCP Server in HTTP mode');
  console.error(`Environment: ${config.environment}`);

  const expressServer = new ExpressServer(config);
  await expressServer.start();
}

async function main(): Promise<void> {
  loadEnvironmentVariables();
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    return;
  }

  console.error(`TfL MCP Server v${SERVER_INFO.version} - Mode: ${args.mode}`);

  if (args.mode === 'stdio') {
    await startSTDIOServer();
  } else {
    const host = args.host || process.env.HOST || API_CONFIG.DEFAULT_HTTP_HOST;
    const port = args.port ?? parseInt(process.env.PORT || String(API_CONFIG.DEFAULT_HTTP_PORT), 10);

    await startHTTPServer(host, port);
  }
}

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  main().catch((error: unknown) => {
    console.error('Failed to start server:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
