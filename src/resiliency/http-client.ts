/**
 * Minimal HTTP client with a hard timeout on every request.
 * Network failures surface as ConnectionError, timeouts as TimeoutError;
 * any HTTP status (including 5xx) is a successful response.
 */

import { ConnectionError, TimeoutError, errorMessage } from '../utils/errors.js';

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  get(url: string, timeoutMs: number): Promise<HttpResponse>;
  postJson(url: string, payload: unknown, timeoutMs: number): Promise<HttpResponse>;
}

export class FetchHttpClient implements HttpClient {
  async get(url: string, timeoutMs: number): Promise<HttpResponse> {
    return this.request(url, { method: 'GET' }, timeoutMs);
  }

  async postJson(url: string, payload: unknown, timeoutMs: number): Promise<HttpResponse> {
    return this.request(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      timeoutMs
    );
  }

  private async request(url: string, init: RequestInit, timeoutMs: number): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      const body = await response.text();
      return { status: response.status, body };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`${init.method ?? 'GET'} ${url}`, timeoutMs);
      }
      throw new ConnectionError(`${url}: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
