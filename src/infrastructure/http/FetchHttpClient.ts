import type { HttpClient } from '../../domain/ports/HttpClient.js';
import { FetchError } from '../../domain/errors/DatasetError.js';

export interface FetchHttpClientOptions {
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
}

/**
 * HTTP client backed by the global Fetch API.
 *
 * Plain unauthenticated GET with the runtime's default redirect handling. Works
 * over both `http:` and `https:`. Failures are reported once and never retried.
 */
export class FetchHttpClient implements HttpClient {
  private readonly timeout: number;

  constructor(options?: FetchHttpClientOptions) {
    this.timeout = options?.timeout ?? 30000;
  }

  async get(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(url, { signal: controller.signal });

      if (!response.ok) {
        // Release the connection; the error body is never read.
        await response.body?.cancel();
        throw new FetchError(
          url,
          `FetchHttpClient: HTTP ${String(response.status)} ${response.statusText} for ${url}`,
          { status: response.status },
        );
      }

      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (controller.signal.aborted) {
        throw new FetchError(url, `FetchHttpClient: request to ${url} timed out after ${String(this.timeout)}ms`, {
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(url, `FetchHttpClient: request to ${url} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
