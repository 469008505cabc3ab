/**
 * TfL Client Tests
 * Credential handling and failure-as-value behaviour of the upstream client
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { TflClient } from '../src/core/tfl-client';
import { ErrorCategory, ErrorHandler } from '../src/core/error-handler';
import {
  FetchMock,
  TEST_CONFIG,
  errorResponse,
  installFetchMock,
  jsonResponse,
  requestedUrls
} from './helpers/mockHelper';

describe('TflClient', () => {
  let mockFetch: FetchMock;
  let errorHandler: ErrorHandler;
  let client: TflClient;

  beforeEach(() => {
    mockFetch = installFetchMock();
    errorHandler = new ErrorHandler('test-session');
    jest.spyOn(errorHandler, 'logError').mockImplementation(() => undefined);
    client = new TflClient(TEST_CONFIG, errorHandler);
  });

  describe('buildUrl', () => {
    it('should attach both credentials to every request', () => {
      expect(client.buildUrl('Line/victoria/Status')).toBe(
        'https://api.tfl.gov.uk/Line/victoria/Status?app_key=test-app-key&app_id=test-app-id'
      );
    });

    it('should let caller params override credentials of the same name', () => {
      const url = new URL(client.buildUrl('StopPoint', { app_id: 'override-id', modes: 'tube' }));

      expect(url.searchParams.get('app_id')).toBe('override-id');
      expect(url.searchParams.get('app_key')).toBe('test-app-key');
      expect(url.searchParams.get('modes')).toBe('tube');
    });

    it('should still send credentials when they are not configured', () => {
      const anonymous = new TflClient({ ...TEST_CONFIG, appId: '', appKey: '' }, errorHandler);

      expect(anonymous.buildUrl('Mode')).toBe('https://api.tfl.gov.uk/Mode?app_key=&app_id=');
    });

    it('should stringify numeric params', () => {
      const url = new URL(client.buildUrl('StopPoint', { lat: 51.5, lon: -0.1, radius: 1000 }));

      expect(url.searchParams.get('lat')).toBe('51.5');
      expect(url.searchParams.get('lon')).toBe('-0.1');
      expect(url.searchParams.get('radius')).toBe('1000');
    });
  });

  describe('request', () => {
    it('should return parsed JSON on success', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([{ name: 'Victoria' }]));

      const result = await client.request('Line/victoria/Status');

      expect(result).toEqual({ ok: true, data: [{ name: 'Victoria' }] });
      expect(requestedUrls(mockFetch)[0].pathname).toBe('/Line/victoria/Status');
    });

    it('should send a GET with a timeout signal', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.request('Mode');

      const init = mockFetch.mock.calls[0][1];
      expect(init?.method).toBe('GET');
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should report a 500 status as a failure value', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(500, 'Internal Server Error'));

      const result = await client.request('Line/victoria/Status');

      expect(result).toEqual({
        ok: false,
        error: {
          category: ErrorCategory.API_ERROR,
          message: 'TfL API request failed: 500 Internal Server Error',
          status: 500
        }
      });
    });

    it('should release the body of an error response', async () => {
      const response = errorResponse(404, 'Not Found');
      const body = response.body;
      if (!body) throw new Error('Expected a response body');
      const cancel = jest.spyOn(body, 'cancel');
      mockFetch.mockResolvedValueOnce(response);

      const result = await client.request('StopPoint/unknown');

      expect(result.ok).toBe(false);
      expect(cancel).toHaveBeenCalledTimes(1);
    });

    it('should report a timeout as a failure value', async () => {
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      mockFetch.mockRejectedValueOnce(timeout);

      const result = await client.request('StopPoint/940GZZLUOXC/Arrivals');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.category).toBe(ErrorCategory.TIMEOUT);
      }
    });

    it('should report a network error as a failure value', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await client.request('Mode');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.category).toBe(ErrorCategory.NETWORK);
        expect(result.error.message).toBe('fetch failed');
      }
    });

    it('should report a malformed body as a failure value', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>not json</html>', { status: 200 }));

      const result = await client.request('Mode');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.category).toBe(ErrorCategory.DATA);
      }
    });

    it('should log failures by endpoint without the credentials', async () => {
      mockFetch.mockResolvedValueOnce(errorResponse(503, 'Service Unavailable'));

      await client.request('Line/victoria/Status');

      expect(errorHandler.logError).toHaveBeenCalledTimes(1);
      expect(errorHandler.logError).toHaveBeenCalledWith(
        'Error making TfL request',
        expect.any(Error),
        { endpoint: 'Line/victoria/Status', category: ErrorCategory.API_ERROR, status: 503 }
      );
    });
  });
});
