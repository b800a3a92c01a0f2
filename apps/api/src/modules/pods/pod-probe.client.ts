import { err, ok, podInfoSchema, type HttpMethod, type PodInfo, type Result } from '@probe-monitor/common';

import { logger } from '../../core/logger/index.js';
import { FetchError, RelayError, describeError } from '../../shared/errors.js';

const INFO_PATH = '/api/info';

export interface PodProbeClientOptions {
  instancePort: number;
  timeoutMs: number;
}

export interface RelayResponse {
  status: number;
  contentType: string | null;
  body: Buffer;
}

/**
 * HTTP client for the endpoints every monitored pod serves on its instance port.
 * Each call is bounded by `timeoutMs`; nothing is retried here.
 */
export class PodProbeClient {
  constructor(private readonly options: PodProbeClientOptions) {}

  instanceUrl(ip: string, path = ''): string {
    const host = ip.includes(':') ? `[${ip}]` : ip;
    return `http://${host}:${this.options.instancePort}${path}`;
  }

  async fetchStatus(ip: string): Promise<Result<PodInfo, FetchError>> {
    const url = this.instanceUrl(ip, INFO_PATH);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      return err(new FetchError('connect', `failed to connect: ${this.describeFailure(error)}`, { cause: error }));
    }

    if (response.status !== 200) {
      await response.body?.cancel().catch((error: unknown) => {
        logger.debug({ err: error, url }, 'Failed to discard pod response body');
      });
      return err(new FetchError('status', `unexpected status code: ${response.status}`));
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return err(new FetchError('connect', `failed to read response: ${this.describeFailure(error)}`, { cause: error }));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      return err(new FetchError('decode', `failed to parse JSON: ${describeError(error)}`, { cause: error }));
    }

    const decoded = podInfoSchema.safeParse(payload);
    if (!decoded.success) {
      const issue = decoded.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return err(new FetchError('decode', `failed to parse JSON: ${where}${issue?.message ?? 'invalid body'}`));
    }

    return ok(decoded.data);
  }

  /** Sends `method` to `url` and hands back the response untouched. */
  async forward(url: string, method: HttpMethod): Promise<RelayResponse> {
    logger.debug({ url, method }, 'Relaying request to pod');

    try {
      const response = await fetch(url, {
        method,
        redirect: 'manual',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      return {
        status: response.status,
        contentType: response.headers.get('content-type'),
        body: Buffer.from(await response.arrayBuffer()),
      };
    } catch (error) {
      throw new RelayError(`Failed to call pod API: ${this.describeFailure(error)}`, { url, method });
    }
  }

  // undici reports socket failures as `TypeError: fetch failed` with the real reason in `cause`.
  private describeFailure(error: unknown): string {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return `request timed out after ${this.options.timeoutMs}ms`;
    }
    if (error instanceof Error && error.cause instanceof Error) {
      return error.cause.message;
    }
    return describeError(error);
  }
}
