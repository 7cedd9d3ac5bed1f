import { logger } from '../application-logger';
import { DEFAULT_CONTENT_TYPE, DEFAULT_REQUEST_TIMEOUT_MS } from '../constants';

import Transport, { DeliveryResult } from './transport';

export class TransportError extends Error {
  constructor(
    public message: string,
    public status: number,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
    if (cause) {
      this.cause = cause;
    }
  }
}

export type FetchTransportOptions = {
  // milliseconds before an in-flight request is aborted
  timeoutMs?: number;
  contentType?: string;
  headers?: Record<string, string>;
};

/**
 * Default {@link Transport}: POSTs each payload as the request body. The response body is never
 * read, only cancelled so the connection can be reused; any non-2xx status counts as a failed
 * delivery.
 */
export default class FetchTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      'Content-Type': options.contentType ?? DEFAULT_CONTENT_TYPE,
      ...options.headers,
    };
  }

  async send(destination: string, payload: string): Promise<DeliveryResult> {
    // Abort the request when it takes longer than the configured budget.
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(destination, {
        method: 'POST',
        headers: this.headers,
        body: payload,
        signal: controller.signal,
      });
      await this.discardBody(response);
      if (!response.ok) {
        return {
          success: false,
          error: new TransportError(
            `Collector responded with status ${response.status}`,
            response.status,
          ),
        };
      }
      return { success: true };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (cause.name === 'AbortError') {
        return {
          success: false,
          error: new TransportError(`Request timed out after ${this.timeoutMs}ms`, 408, cause),
        };
      }
      logger.debug({ err: cause }, `[FetchTransport] Request to ${destination} failed`);
      return { success: false, error: new TransportError('Request failed', 0, cause) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      logger.debug({ err }, '[FetchTransport] Failed to discard response body');
    }
  }
}
