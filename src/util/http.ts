/**
 * HTTP Utility Module
 *
 * Thin axios wrappers used by the configuration service and adapter host
 * clients. Non-2xx responses are returned, not thrown; transport failures
 * (connection refused, timeout, abort) become ApiError.
 */

import axios from 'axios';
import { ApiError } from '../errors/index.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body (parsed)
}

export interface HttpOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Performs an HTTP GET request
 *
 * @param url - Full URL to request
 * @returns Promise resolving to HttpResponse with status and data
 *
 * @example
 * const res = await httpGet<unknown>('http://config:7071/api/interfaces?enabled=true');
 */
export async function httpGet<T>(url: string, options: HttpOptions = {}): Promise<HttpResponse<T>> {
  try {
    const res = await axios.get<T>(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      signal: options.signal,
      validateStatus: () => true
    });
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }
    return { status: res.status, data: res.data };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}

/**
 * Performs an HTTP POST request with a JSON body
 *
 * @param url - Full URL to request
 * @param body - Value serialized as the JSON request body
 */
export async function httpPost<T>(url: string, body: unknown, options: HttpOptions = {}): Promise<HttpResponse<T>> {
  try {
    const res = await axios.post<T>(url, body, {
      headers: { 'Content-Type': 'application/json', ...options.headers },
      timeout: options.timeoutMs,
      signal: options.signal,
      validateStatus: () => true
    });
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }
    return { status: res.status, data: res.data };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}
