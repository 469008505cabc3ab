/**
 * Error Handler
 * Provides standardized error categorization and structured logging
 */

export enum ErrorCategory {
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  API_ERROR = 'api_error',
  VALIDATION = 'validation',
  DATA = 'data',
  SYSTEM = 'system'
}

export interface CategorizedError {
  category: ErrorCategory;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
}

/**
 * Error raised to the MCP host for caller misuse (bad arguments, unknown tool or resource).
 * Upstream failures never use this class; they are reported as text.
 */
export class TflError extends Error {
  public readonly category: ErrorCategory;
  public readonly context?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(message);
    this.name = 'TflError';
    this.category = category;
    this.context = context;

    if (originalError && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}

export function validationError(message: string, context?: Record<string, unknown>): TflError {
  return new TflError(ErrorCategory.VALIDATION, message, context);
}

export class ErrorHandler {
  private sessionId: string;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Categorize an error based on its type and message
   */
  categorizeError(error: unknown, context?: Record<string, unknown>): CategorizedError {
    let category = ErrorCategory.SYSTEM;
    let message = 'An unexpected error occurred';

    if (error instanceof TflError) {
      return { category: error.category, message: error.message, originalError: error, context: { ...error.context, ...context } };
    }

    if (error instanceof Error) {
      message = error.message;

      // AbortSignal.timeout() rejects with a DOMException named TimeoutError
      if (error.name === 'TimeoutError' || error.name === 'AbortError' || message.includes('timeout')) {
        category = ErrorCategory.TIMEOUT;
      }
      else if (error instanceof SyntaxError || message.includes('JSON') || message.includes('parse')) {
        category = ErrorCategory.DATA;
      }
      else if (message.includes('fetch failed') || message.includes('network') ||
               message.includes('ENOTFOUND') || message.includes('ECONNREFUSED') || message.includes('ECONNRESET')) {
        category = ErrorCategory.NETWORK;
      }
      else if (/\b[45]\d\d\b/.test(message)) {
        category = ErrorCategory.API_ERROR;
      }
    }

    return {
      category,
      message,
      originalError: error instanceof Error ? error : undefined,
      context
    };
  }

  /**
   * Log error with structured format
   */
  logError(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      sessionId: this.sessionId,
      message,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : error,
      context
    };

    // stdout carries the STDIO transport, so every log line goes to stderr
    console.error(JSON.stringify(logEntry, null, 2));
  }
}
