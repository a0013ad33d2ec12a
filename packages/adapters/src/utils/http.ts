import http, { type IncomingHttpHeaders } from 'http';
import https from 'https';
import { setTimeout as delay } from 'timers/promises';

export interface HttpRequestOptions {
  url: string | URL;
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  maxRedirects?: number;
  maxBytes?: number;
}

export interface HttpResponse {
  url: URL;
  statusCode: number;
  statusMessage: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly statusMessage: string,
    message?: string,
    public readonly headers?: IncomingHttpHeaders,
  ) {
    super(message ?? `HTTP ${statusCode} ${statusMessage}`);
    this.name = 'HttpError';
  }
}

export class ResponseSizeLimitError extends Error {
  constructor(public readonly limit: number) {
    super(`Response exceeded the maximum allowed size of ${limit} bytes.`);
    this.name = 'ResponseSizeLimitError';
  }
}

export const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_MAX_REDIRECTS = 5;
const ERROR_PAYLOAD_LIMIT_BYTES = 4096;
const SENSITIVE_HEADERS = new Set(['authorization', 'circle-token', 'cookie']);

const toUrl = (target: string | URL): URL => {
  if (target instanceof URL) {
    return target;
  }
  try {
    return new URL(target);
  } catch (error) {
    throw new TypeError(`Invalid URL: ${target}`);
  }
};

const getHeaderValue = (headers: IncomingHttpHeaders | undefined, key: string): string | undefined => {
  if (!headers) {
    return undefined;
  }
  const value = headers[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  if (typeof value === 'string') {
    return value;
  }
  return undefined;
};

const stripSensitiveHeaders = (headers: Record<string, string>): Record<string, string> =>
  Object.fromEntries(Object.entries(headers).filter(([name]) => !SENSITIVE_HEADERS.has(name.toLowerCase())));

const sendOnce = async (url: URL, options: HttpRequestOptions): Promise<HttpResponse> =>
  await new Promise((resolve, reject) => {
    const client = url.protocol === 'https:' ? https : http;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const request = client.request(
      url,
      {
        method: 'GET',
        headers: options.headers ?? {},
        timeout: timeoutMs,
        signal: options.signal,
      },
      (response) => {
        const { statusCode = 0, statusMessage = '' } = response;
        const chunks: Buffer[] = [];
        let totalBytes = 0;
        let ended = false;
        const success = statusCode >= 200 && statusCode < 300;
        const maxBytes = success ? options.maxBytes ?? 0 : ERROR_PAYLOAD_LIMIT_BYTES;

        response.on('data', (chunk: Buffer | string) => {
          const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
          totalBytes += buffer.length;
          if (maxBytes > 0 && totalBytes > maxBytes) {
            if (success) {
              response.destroy(new ResponseSizeLimitError(maxBytes));
            }
            return;
          }
          chunks.push(buffer);
        });

        response.on('error', (error) => {
          reject(error);
        });

        response.on('close', () => {
          if (!ended) {
            reject(options.signal?.aborted ? options.signal.reason : new Error(`Response from ${url.toString()} closed early.`));
          }
        });

        response.on('end', () => {
          ended = true;
          resolve({
            url,
            statusCode,
            statusMessage,
            headers: response.headers,
            body: Buffer.concat(chunks),
          });
        });
      },
    );

    request.on('timeout', () => {
      request.destroy(new Error(`Request to ${url.toString()} timed out after ${timeoutMs}ms.`));
    });

    request.on('error', (error) => {
      reject(error);
    });

    request.end();
  });

/**
 * Issues a single GET and resolves with whatever status the server answered,
 * following redirects. Credentials are not forwarded to another origin.
 */
export const requestBuffer = async (options: HttpRequestOptions): Promise<HttpResponse> => {
  options.signal?.throwIfAborted();
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  let url = toUrl(options.url);
  let headers = options.headers ?? {};

  for (let redirects = 0; ; redirects += 1) {
    const response = await sendOnce(url, { ...options, headers });
    const location = getHeaderValue(response.headers, 'location');
    const isRedirect = response.statusCode >= 300 && response.statusCode < 400 && location !== undefined;
    if (!isRedirect || redirects >= maxRedirects) {
      return response;
    }
    const next = new URL(location, url);
    if (next.origin !== url.origin) {
      headers = stripSensitiveHeaders(headers);
    }
    url = next;
  }
};

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  retryableStatuses: ReadonlySet<number>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 250,
  retryableStatuses: new Set([429, 502, 503, 504]),
};

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (notice: RetryNotice) => void;
}

const parseRetryAfter = (headers: IncomingHttpHeaders | undefined): number | undefined => {
  const raw = getHeaderValue(headers, 'retry-after');
  if (!raw) {
    return undefined;
  }

  const numeric = Number(raw);
  if (Number.isFinite(numeric)) {
    return Math.max(0, numeric * 1000);
  }

  const parsedDate = Date.parse(raw);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - Date.now());
  }

  return undefined;
};

export const computeRetryDelay = (
  policy: RetryPolicy,
  attempt: number,
  headers: IncomingHttpHeaders | undefined,
): number => {
  const headerDelay = parseRetryAfter(headers);
  if (typeof headerDelay === 'number') {
    return headerDelay;
  }
  return policy.baseDelayMs * 2 ** attempt;
};

const isAbort = (error: unknown, signal: AbortSignal | undefined): boolean =>
  Boolean(signal?.aborted) || (error instanceof Error && error.name === 'AbortError');

const isRetryable = (error: unknown, policy: RetryPolicy): boolean => {
  if (error instanceof HttpError) {
    return policy.retryableStatuses.has(error.statusCode);
  }
  return !(error instanceof ResponseSizeLimitError || error instanceof TypeError);
};

export const executeWithRetries = async <T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> => {
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await operation();
    } catch (error) {
      const exhausted = attempt + 1 >= policy.attempts;
      if (exhausted || isAbort(error, hooks.signal) || !isRetryable(error, policy)) {
        throw error;
      }
      const headers = error instanceof HttpError ? error.headers : undefined;
      const delayMs = computeRetryDelay(policy, attempt, headers);
      hooks.onRetry?.({
        attempt: attempt + 1,
        delayMs,
        reason: error instanceof Error ? error.message : String(error),
      });
      attempt += 1;
      await delay(delayMs, undefined, { signal: hooks.signal });
    }
  }
};

/**
 * GET with the retry policy applied. Retryable statuses are retried; once the
 * attempts run out the last response is returned for the caller to classify.
 */
export const getWithRetries = async (
  options: HttpRequestOptions,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  onRetry?: (notice: RetryNotice) => void,
): Promise<HttpResponse> => {
  let last: HttpResponse | undefined;
  try {
    return await executeWithRetries(
      async () => {
        const response = await requestBuffer(options);
        if (policy.retryableStatuses.has(response.statusCode)) {
          last = response;
          throw new HttpError(
            response.statusCode,
            response.statusMessage,
            response.body.toString('utf8') || undefined,
            response.headers,
          );
        }
        return response;
      },
      policy,
      { signal: options.signal, onRetry },
    );
  } catch (error) {
    if (error instanceof HttpError && last && last.statusCode === error.statusCode) {
      return last;
    }
    throw error;
  }
};
