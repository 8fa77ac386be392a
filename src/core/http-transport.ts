/**
 * HTTP Transport
 *
 * The protocol layer only ever calls `send(request) -> response`. FetchTransport
 * is the default implementation over the global fetch: it authenticates the
 * client with its API key, encodes form or JSON bodies and applies a timeout.
 * It never retries; a network failure or timeout becomes a TransportError.
 */

import { TransportError } from '../utils/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  /** Sent as application/json */
  json?: unknown;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body, the raw text if it was not JSON, or null when empty */
  body: unknown;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  apiKey: { id: string; secret: string };
  timeoutMs?: number;
  userAgent?: string;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

export class FetchTransport implements HttpTransport {
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchTransportOptions) {
    const credentials = Buffer.from(`${options.apiKey.id}:${options.apiKey.secret}`, 'utf-8');
    this.authorization = `Basic ${credentials.toString('base64')}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? 'idsite-oauth-client';
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
      Authorization: this.authorization,
      ...request.headers,
    };

    let body: string | undefined;
    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(request.form).toString();
    } else if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return { status: response.status, body: parseBody(await response.text()) };
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const reason = timedOut
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : 'network error';
      console.error(`[FetchTransport] ${request.method} ${request.url} failed: ${reason}`);
      throw new TransportError(request.method, request.url, `Request failed: ${reason}`, timedOut, {
        cause: error,
      });
    }
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
