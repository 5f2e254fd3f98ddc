import type { LookupErrorCode } from '../types/lookup';
import { ExtensionLogger } from '../utils/logger';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class DictionaryProviderError extends Error {
  readonly code: LookupErrorCode;
  readonly status?: number;
  readonly server?: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: {
      code: LookupErrorCode;
      status?: number;
      server?: string;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DictionaryProviderError';
    this.code = options.code;
    this.status = options.status;
    this.server = options.server;
    this.retryable = options.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DictionaryProviderError);
    }
  }
}

export interface JsonRequest {
  path: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  validate?: (body: unknown) => boolean;
}

export type ServerAttempt =
  | {
      ok: true;
      server: string;
      body: unknown;
      headers: Headers;
      latencyMs: number;
    }
  | {
      ok: false;
      server: string;
      error: DictionaryProviderError;
    };

export class DictionaryHttpClient {
  constructor(
    private readonly logger: ExtensionLogger,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
  ) {}

  async getFirstAvailable(servers: readonly string[], request: JsonRequest): Promise<ServerAttempt> {
    let lastAttempt: ServerAttempt | undefined;

    for (const server of servers) {
      const attempt = await this.getJson(server, request);

      if (attempt.ok) {
        return attempt;
      }

      this.logger.warn(`Dictionary server ${server} failed: ${attempt.error.message}`);
      lastAttempt = attempt;
    }

    return (
      lastAttempt ?? {
        ok: false,
        server: '',
        error: new DictionaryProviderError('No dictionary servers are configured.', {
          code: 'configuration',
        }),
      }
    );
  }

  async getJson(server: string, request: JsonRequest): Promise<ServerAttempt> {
    const url = `${server.replace(/\/+$/, '')}${request.path}`;
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const started = Date.now();

    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(
          new DictionaryProviderError(`Request timed out after ${request.timeoutMs} ms.`, {
            code: 'timeout',
            server,
            retryable: true,
          }),
        );
      }, request.timeoutMs);
    });

    try {
      const { body, headers } = await Promise.race([
        this.fetchJson(url, server, request.headers ?? {}, controller.signal),
        timeout,
      ]);

      if (request.validate && !request.validate(body)) {
        return {
          ok: false,
          server,
          error: new DictionaryProviderError('Unexpected response structure.', {
            code: 'invalidResponse',
            server,
          }),
        };
      }

      return {
        ok: true,
        server,
        body,
        headers,
        latencyMs: Date.now() - started,
      };
    } catch (error) {
      return { ok: false, server, error: this.toProviderError(error, server) };
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private async fetchJson(
    url: string,
    server: string,
    headers: Record<string, string>,
    signal: AbortSignal,
  ): Promise<{ body: unknown; headers: Headers }> {
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        ...headers,
      },
      signal,
    });

    if (!response.ok) {
      const { code, retryable } = this.mapStatusToError(response.status);
      throw new DictionaryProviderError(
        `Incorrect response code ${response.status} from the server ${server}`,
        {
          code,
          status: response.status,
          server,
          retryable,
        },
      );
    }

    const text = await response.text();

    try {
      return { body: JSON.parse(text), headers: response.headers };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DictionaryProviderError(`JSON error: ${message}`, {
        code: 'invalidResponse',
        server,
        cause: error,
      });
    }
  }

  private toProviderError(error: unknown, server: string): DictionaryProviderError {
    if (error instanceof DictionaryProviderError) {
      return error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      return new DictionaryProviderError('Request was aborted.', {
        code: 'timeout',
        server,
        retryable: true,
        cause: error,
      });
    }

    if (error instanceof Error) {
      return this.normalizeError(error, server);
    }

    return new DictionaryProviderError('Lookup failed due to an unknown error.', {
      code: 'unknown',
      server,
      cause: error,
    });
  }

  private normalizeError(error: Error, server: string): DictionaryProviderError {
    const message = error.message || 'Lookup failed.';
    const normalized = message.toLowerCase();

    if (
      normalized.includes('etimedout') ||
      normalized.includes('timeout') ||
      normalized.includes('timed out')
    ) {
      return new DictionaryProviderError(message, {
        code: 'timeout',
        server,
        retryable: true,
        cause: error,
      });
    }

    if (
      normalized.includes('econnrefused') ||
      normalized.includes('econnreset') ||
      normalized.includes('enotfound') ||
      normalized.includes('network') ||
      normalized.includes('fetch failed') ||
      normalized.includes('socket hang up')
    ) {
      return new DictionaryProviderError(message, {
        code: 'network',
        server,
        retryable: true,
        cause: error,
      });
    }

    return new DictionaryProviderError(message, {
      code: 'unknown',
      server,
      cause: error,
    });
  }

  private mapStatusToError(status: number): { code: LookupErrorCode; retryable: boolean } {
    if (status === 401 || status === 403) {
      return { code: 'authentication', retryable: false };
    }

    if (status === 408) {
      return { code: 'timeout', retryable: true };
    }

    if (status === 429) {
      return { code: 'rateLimit', retryable: true };
    }

    if (status >= 500 && status < 600) {
      return { code: 'server', retryable: true };
    }

    return { code: 'unknown', retryable: false };
  }
}
