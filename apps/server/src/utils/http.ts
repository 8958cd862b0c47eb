/**
 * HTTP Client Utilities
 *
 * Provides a consistent interface for making HTTP requests with:
 * - Typed errors carrying service, status and URL context
 * - Request timeout support, combined with caller cancellation
 * - Classification helpers for transport-level failures
 */

import { APPLIANCE_API } from '@dnspresence/shared';

/**
 * HTTP client error with service context
 */
export class HttpClientError extends Error {
  public readonly statusCode: number;
  public readonly statusText: string;
  public readonly service: string;
  public readonly url: string;
  public readonly responseBody?: string;

  constructor(options: {
    service: string;
    statusCode: number;
    statusText: string;
    url: string;
    message?: string;
    responseBody?: string;
  }) {
    const message =
      options.message ||
      `${options.service} request failed: ${options.statusCode} ${options.statusText}`;
    super(message);
    this.name = 'HttpClientError';
    this.service = options.service;
    this.statusCode = options.statusCode;
    this.statusText = options.statusText;
    this.url = options.url;
    this.responseBody = options.responseBody;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, HttpClientError.prototype);
  }
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions extends Omit<RequestInit, 'signal'> {
  /** Service name for error messages */
  service?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Caller cancellation (e.g. shutdown) */
  signal?: AbortSignal;
  /** Whether to include response body in errors */
  includeBodyInError?: boolean;
}

/**
 * Check if response is OK, throw HttpClientError if not
 */
async function assertResponseOk(
  response: Response,
  url: string,
  options: HttpRequestOptions
): Promise<void> {
  if (response.ok) return;

  let responseBody: string | undefined;
  if (options.includeBodyInError) {
    try {
      responseBody = await response.text();
    } catch {
      // Ignore - body might already be consumed or unavailable
    }
  }

  throw new HttpClientError({
    service: options.service || 'API',
    statusCode: response.status,
    statusText: response.statusText,
    url,
    responseBody,
  });
}

/**
 * Build the signal for a request from timeout and caller signal
 */
function buildSignal(timeoutMs?: number, signal?: AbortSignal): AbortSignal | undefined {
  const timeoutSignal = timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
  if (timeoutSignal && signal) {
    return AbortSignal.any([timeoutSignal, signal]);
  }
  return timeoutSignal ?? signal;
}

/**
 * Fetch JSON data from a URL
 *
 * @example
 * const data = await fetchJson<DevicesResponse>('http://pi.hole/api/network/devices', {
 *   service: 'appliance',
 *   headers: applianceHeaders(sid),
 * });
 */
export async function fetchJson<T>(url: string, options: HttpRequestOptions = {}): Promise<T> {
  const { timeout, signal, ...fetchOptions } = options;

  const response = await fetch(url, {
    ...fetchOptions,
    signal: buildSignal(timeout, signal),
  });

  await assertResponseOk(response, url, options);

  return response.json() as Promise<T>;
}

/**
 * Fetch with full response info (status, body)
 * Does NOT throw on non-2xx responses; the body is parsed as JSON when possible
 *
 * @example
 * const { ok, status, data } = await fetchWithStatus<AuthResponse>(url, { method: 'POST' });
 * if (status === 401) {
 *   // credentials rejected
 * }
 */
export async function fetchWithStatus<T>(
  url: string,
  options: HttpRequestOptions = {}
): Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  data: T | null;
}> {
  const { timeout, signal, ...fetchOptions } = options;

  const response = await fetch(url, {
    ...fetchOptions,
    signal: buildSignal(timeout, signal),
  });

  let data: T | null = null;
  try {
    data = (await response.json()) as T;
  } catch {
    // Response might not be JSON (empty body on 204, HTML error page)
  }

  return {
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    data,
  };
}

/**
 * True for errors raised by an aborted or timed-out request
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * True for transport failures (DNS, refused connection, reset, abort)
 * as opposed to HTTP-level or parse errors
 */
export function isNetworkError(error: unknown): boolean {
  if (isAbortError(error)) return true;
  // undici reports connection failures as TypeError('fetch failed')
  return error instanceof TypeError && error.message === 'fetch failed';
}

/**
 * Helper to create headers for the appliance API
 */
export function applianceHeaders(sid?: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'Content-Type': 'application/json',
  };

  if (sid) {
    headers[APPLIANCE_API.SID_HEADER] = sid;
  }

  return headers;
}
