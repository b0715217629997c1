import { createLogger } from '../../shared/logger';

const log = createLogger('fetcher');

// ================================================
// RESULT TYPES
// ================================================

export interface FetchFailure {
  kind: 'failure';
  reason: 'timeout' | 'network';
  message: string;
}

export interface PageResponse {
  kind: 'response';
  statusCode: number;
  body: string;
}

export interface HeadResponse {
  kind: 'response';
  statusCode: number;
  location: string | null;
}

export type GetResult = PageResponse | FetchFailure;
export type HeadResult = HeadResponse | FetchFailure;

/**
 * Plain HTTP collaborator. Transport errors come back as `FetchFailure`
 * values; nothing here throws.
 */
export interface StaticFetcher {
  get(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number
  ): Promise<GetResult>;
  /** HEAD request that never follows redirects */
  head(url: string, timeoutMs: number): Promise<HeadResult>;
}

function toFailure(
  url: string,
  error: unknown,
  timeoutMs: number
): FetchFailure {
  const isErrorLike = error instanceof Error || error instanceof DOMException;
  if (
    isErrorLike &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  ) {
    return {
      kind: 'failure',
      reason: 'timeout',
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
    };
  }

  const message = isErrorLike ? error.message : String(error);
  return { kind: 'failure', reason: 'network', message };
}

// ================================================
// FETCH IMPLEMENTATION
// ================================================

export class HttpFetcher implements StaticFetcher {
  async get(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number
  ): Promise<GetResult> {
    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await response.text();
      log.debug(`GET ${url} -> ${response.status}`);
      return { kind: 'response', statusCode: response.status, body };
    } catch (error) {
      return toFailure(url, error, timeoutMs);
    }
  }

  async head(url: string, timeoutMs: number): Promise<HeadResult> {
    try {
      const response = await fetch(url, {
        method: 'HEAD',
        redirect: 'manual',
        signal: AbortSignal.timeout(timeoutMs),
      });
      log.debug(`HEAD ${url} -> ${response.status}`);
      return {
        kind: 'response',
        statusCode: response.status,
        location: response.headers.get('location'),
      };
    } catch (error) {
      return toFailure(url, error, timeoutMs);
    }
  }
}
