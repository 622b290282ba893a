import { ApiError, getComponentLogger, type Logger } from '@stratoform/reconciler';
import { type } from 'arktype';

import { ErrorResponse } from './models';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

export interface ManagementClientOptions {
  endpoint: string;
  accessToken: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface RequestOptions {
  apiVersion?: string;
  query?: Record<string, string>;
  body?: unknown;
  /** Aborts the request, e.g. when the caller's deadline passes */
  signal?: AbortSignal;
}

export interface ManagementResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON with `null` members removed, or undefined for an empty body */
  body: unknown;
}

/** JSON.parse reviver: returning undefined removes the member */
function dropNulls(_key: string, value: unknown): unknown {
  return value === null ? undefined : value;
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text, dropNulls);
  } catch {
    return text;
  }
}

/**
 * Retry-After is given in seconds or as an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds > 0 ? seconds * 1000 : undefined;

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return date > now ? date - now : undefined;
}

/**
 * Thin JSON client for the resource management API. Requests are never retried;
 * any non-2xx response rejects with an `ApiError`.
 */
export class ManagementClient {
  private readonly endpoint: string;
  private readonly accessToken: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: ManagementClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? getComponentLogger('management-client');
  }

  /**
   * @param target - a resource path (`/subscriptions/...`) or an absolute URL returned by the API
   */
  async send(method: HttpMethod, target: string, options: RequestOptions = {}): Promise<ManagementResponse> {
    const url = new URL(target.startsWith('/') ? `${this.endpoint}${target}` : target);
    if (options.apiVersion) url.searchParams.set('api-version', options.apiVersion);
    for (const [key, value] of Object.entries(options.query ?? {})) url.searchParams.set(key, value);

    const headers: Record<string, string> = { Authorization: `Bearer ${this.accessToken}` };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';

    this.logger.debug('Sending request', { method, url: url.toString() });
    const response = await this.fetchFn(url.toString(), {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: options.signal,
    });

    const body = parseBody(await response.text());
    this.logger.debug('Received response', { method, url: url.toString(), status: response.status });

    if (!response.ok) throw this.toApiError(response.status, body);

    return { status: response.status, headers: response.headers, body };
  }

  private toApiError(status: number, body: unknown): ApiError {
    const parsed = ErrorResponse(body);
    if (parsed instanceof type.errors) {
      const detail = typeof body === 'string' && body ? `: ${body.slice(0, 200)}` : '';
      return new ApiError(`unexpected status ${status}${detail}`, status);
    }

    const { code, message } = parsed.error;
    return new ApiError(`unexpected status ${status} (${code ?? 'Unknown'}): ${message ?? 'no error message'}`, status, code);
  }
}
