/**
 * Server configuration types for dual transport support
 */

export interface ServerConfig {
  port: number;
  host: string;
  environment: 'development' | 'production';
}

export interface CLIArgs {
  mode: 'stdio' | 'http';
  port?: number;
  host?: string;
  help?: boolean;
}

export interface TflApiConfig {
  baseUrl: string;
  appId: string;
  appKey: string;
  timeoutMs: number;
}

export interface HealthStatus {
  status: 'healthy' | 'shutting_down';
  timestamp: string;
  version: string;
  sessionId: string;
}
