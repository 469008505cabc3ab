/**
 * TfL Client
 * Issues credentialed GET requests to the TfL unified API.
 * Failures are returned as values: callers never see an exception from here.
 */

import { ErrorCategory, ErrorHandler } from './error-handler.js';
import { TflApiConfig } from '../types/server.types.js';

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue>;

export interface UpstreamFailure {
  category: ErrorCategory;
  message: string;
  status?: number;
}

export type UpstreamResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: UpstreamFailure };

export class TflClient {
  constructor(
    private config: TflApiConfig,
    private errorHandler: ErrorHandler
  ) {}

  /**
   * Build the request URL, credentials first so explicit params override them
   */
  buildUrl(endpoint: string, params: QueryParams = {}): string {
    const url = new URL(`${this.config.baseUrl}/${endpoint.replace(/^\/+/, '')}`);
    const merged: QueryParams = {
      app_key: this.config.appKey,
      app_id: this.config.appId,
      ...params
    };

    for (const [key, value] of Object.entries(merged)) {
      url.searchParams.set(key, String(value));
    }

    return url.toString();
  }

  /**
   * GET an endpoint and parse its JSON body
   */
  async request(endpoint: string, params: QueryParams = {}): Promise<UpstreamResult<unknown>> {
    const url = this.buildUrl(endpoint, params);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { 'Accept': 'application/json' },
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (error) {
      return this.fail(endpoint, this.errorHandler.categorizeError(error).category, error);
    }

    if (!response.ok) {
      try {
        await response.body?.cancel();
      } catch (error) {
        this.errorHandler.logError('Failed to release TfL response body', error, { endpoint });
      }

      return this.fail(
        endpoint,
        ErrorCategory.API_ERROR,
        new Error(`TfL API request failed: ${response.status} ${response.statusText}`),
        response.status
      );
    }

    try {
      const data: unknown = await response.json();
      return { ok: true, data };
    } catch (error) {
      const category = this.errorHandler.categorizeError(error).category;
      // a timeout can also fire while the body is still streaming
      return this.fail(endpoint, category === ErrorCategory.TIMEOUT ? category : ErrorCategory.DATA, error);
    }
  }

  private fail(endpoint: string, category: ErrorCategory, error: unknown, status?: number): UpstreamResult<never> {
    const message = error instanceof Error ? error.message : String(error);

    this.errorHandler.logError('Error making TfL request', error, { endpoint, category, status });

    return {
      ok: false,
      error: { category, message, status }
    };
  }
}
