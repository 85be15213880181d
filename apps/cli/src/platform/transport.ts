/**
 * HTTP transport to the remote Web API.
 * The engine only ever talks to the server through the Transport contract;
 * HttpTransport is the production implementation on top of fetch.
 */

import type { ApiErrorBody, HttpMethod, RequestParams, TransportResponse } from '@sqconf/types';
import {
  ApiError,
  AuthenticationError,
  ObjectNotFoundError,
  PermissionDeniedError,
  RateLimitedError,
  TransportError,
} from './errors';

export interface Transport {
  /**
   * Issue one request. Resolves only for 2xx statuses; every other outcome
   * is raised as a classified error.
   */
  request(
    method: HttpMethod,
    path: string,
    params?: RequestParams,
    signal?: AbortSignal
  ): Promise<TransportResponse>;
}

export interface HttpTransportOptions {
  url: string;
  token?: string;
  userAgent?: string;
}

/**
 * Encode parameters, dropping undefined values
 */
export function encodeParams(params: RequestParams = {}): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  return search;
}

/**
 * Extract the server error messages from a failed response body
 */
export function extractErrorMessage(body: string, fallback: string): string {
  try {
    const parsed = JSON.parse(body) as ApiErrorBody;
    if (parsed.errors && parsed.errors.length > 0) {
      return parsed.errors.map((e) => e.msg).join(', ');
    }
  } catch {
    // Not JSON, keep the fallback
  }
  return fallback;
}

export class HttpTransport implements Transport {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpTransportOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
  }

  private getAuthHeader(): string | undefined {
    if (!this.options.token) return undefined;
    // Tokens are passed as the basic auth user with an empty password
    return `Basic ${Buffer.from(`${this.options.token}:`).toString('base64')}`;
  }

  async request(
    method: HttpMethod,
    path: string,
    params: RequestParams = {},
    signal?: AbortSignal
  ): Promise<TransportResponse> {
    const query = encodeParams(params);
    let url = `${this.baseUrl}/api/${path.replace(/^\/+/, '')}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    const auth = this.getAuthHeader();
    if (auth) headers.Authorization = auth;
    if (this.options.userAgent) headers['User-Agent'] = this.options.userAgent;

    let body: string | undefined;
    if (method === 'GET') {
      const qs = query.toString();
      if (qs) url += `?${qs}`;
    } else {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = query.toString();
    }

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${method} ${url} failed: ${message}`, { cause: error });
    }

    const text = await response.text();
    if (response.ok) {
      return { status: response.status, body: text };
    }

    const message = extractErrorMessage(text, `${method} ${path}: HTTP ${response.status}`);
    switch (response.status) {
      case 401:
        throw new AuthenticationError(message);
      case 403:
        throw new PermissionDeniedError(message);
      case 404:
        throw new ObjectNotFoundError(path, message);
      case 429:
        throw new RateLimitedError(message);
      default:
        throw new ApiError(response.status, message);
    }
  }
}
