import type { z } from "zod";
import { BaseProviderAdapter } from "./baseProvider";

export interface HttpProviderConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string>;
  timeoutMs?: number;
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }
}

export class HttpTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export class HttpProviderAdapter extends BaseProviderAdapter {
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeout: number;

  constructor(provider: string, config: HttpProviderConfig) {
    super(provider);
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultTimeout = config.timeoutMs ?? 15000;
  }

  /**
   * GET a JSON document and validate it against `schema`.
   */
  async getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: HttpRequestOptions): Promise<T> {
    return this.request<T>('GET', path, async response => schema.parse(await response.json()), options);
  }

  protected async request<T>(method: string, path: string, parser: (response: Response) => Promise<T>, options?: HttpRequestOptions): Promise<T> {
    const url = this.resolveUrl(path, options?.query);
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeout;
    const headers = {
      ...this.defaultHeaders,
      ...(options?.headers ?? {}),
    };

    const operation = `${method.toUpperCase()} ${new URL(url).pathname}`;

    return this.run(operation, async () => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const response = await fetch(url, {
          method,
          headers,
          signal: controller.signal,
        });
        if (!response.ok) {
          throw new HttpStatusError(response.status, response.statusText, url);
        }
        return await parser(response);
      } catch (error) {
        if (controller.signal.aborted) {
          throw new HttpTimeoutError(url, timeoutMs);
        }
        throw error;
      } finally {
        clearTimeout(timeout);
      }
    });
  }

  private resolveUrl(path: string, query?: Record<string, string>): string {
    let resolved: string;
    if (/^https?:\/\//i.test(path)) {
      resolved = path;
    } else if (!path) {
      resolved = this.baseUrl;
    } else {
      resolved = `${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`;
    }

    if (!query) {
      return resolved;
    }
    const url = new URL(resolved);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }
}
