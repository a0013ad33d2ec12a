import pino from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  AuthError,
  CancelledError,
  DecodeError,
  ScanError,
  TransportError,
  buildDetailSchema,
  buildListSchema,
  projectListSchema,
  toScanError,
  type Action,
  type Build,
  type BuildStep,
  type Project,
} from '@logsweep/core';

import {
  DEFAULT_RETRY_POLICY,
  DEFAULT_TIMEOUT_MS,
  HttpError,
  ResponseSizeLimitError,
  getWithRetries,
  type HttpResponse,
  type RetryPolicy,
} from './utils/http';

type Logger = pino.Logger;

export const DEFAULT_CIRCLECI_BASE_URL = 'https://circleci.com/api/v1.1/';

/** The four calls a traversal needs from the CircleCI API. */
export interface CircleCiApi {
  listProjects(signal?: AbortSignal): Promise<Project[]>;
  listBuilds(project: Project, signal?: AbortSignal): Promise<Build[]>;
  listSteps(project: Project, build: Build, signal?: AbortSignal): Promise<BuildStep[]>;
  fetchLogBody(action: Action, signal?: AbortSignal): Promise<Buffer>;
}

export interface CircleCiClientOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  maxLogBytes?: number;
  logger?: Logger;
}

const encodeSegment = (segment: string | number): string => encodeURIComponent(String(segment));

const ensureTrailingSlash = (value: string): string => (value.endsWith('/') ? value : `${value}/`);

const describeCall = (url: URL): string => `${url.origin}${url.pathname}`;

export class CircleCiClient implements CircleCiApi {
  private readonly token: string;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly retry: RetryPolicy;

  private readonly maxLogBytes: number;

  private readonly logger: Logger;

  constructor(options: CircleCiClientOptions) {
    this.token = options.token;
    this.baseUrl = ensureTrailingSlash(options.baseUrl ?? DEFAULT_CIRCLECI_BASE_URL);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...(options.retry ?? {}) };
    this.maxLogBytes = options.maxLogBytes ?? 0;
    this.logger = options.logger ?? pino({ enabled: false });
  }

  async listProjects(signal?: AbortSignal): Promise<Project[]> {
    const url = this.resolve('projects');
    return this.decode(url, await this.get(url, signal), projectListSchema);
  }

  async listBuilds(project: Project, signal?: AbortSignal): Promise<Build[]> {
    const url = this.resolve(this.projectPath(project));
    return this.decode(url, await this.get(url, signal), buildListSchema);
  }

  async listSteps(project: Project, build: Build, signal?: AbortSignal): Promise<BuildStep[]> {
    const url = this.resolve(`${this.projectPath(project)}/${encodeSegment(build.buildNum)}`);
    const detail = this.decode(url, await this.get(url, signal), buildDetailSchema);
    return detail.steps ?? [];
  }

  async fetchLogBody(action: Action, signal?: AbortSignal): Promise<Buffer> {
    if (!action.outputUrl) {
      throw new TransportError(`Action ${action.index} has no output URL.`);
    }
    let url: URL;
    try {
      url = new URL(action.outputUrl);
    } catch (error) {
      throw new TransportError(`Action ${action.index} has an invalid output URL.`, { cause: error });
    }
    const response = await this.get(url, signal, this.maxLogBytes);
    return response.body;
  }

  private projectPath(project: Project): string {
    return ['project', project.vcsType, project.username, project.reponame].map(encodeSegment).join('/');
  }

  private resolve(path: string): URL {
    return new URL(path, this.baseUrl);
  }

  private async get(url: URL, signal: AbortSignal | undefined, maxBytes = 0): Promise<HttpResponse> {
    let response: HttpResponse;
    try {
      response = await getWithRetries(
        {
          url,
          headers: {
            'Circle-Token': this.token,
            Accept: 'application/json',
          },
          timeoutMs: this.timeoutMs,
          signal,
          maxBytes,
        },
        this.retry,
        (notice) => {
          this.logger.warn(
            { url: describeCall(url), attempt: notice.attempt, delayMs: notice.delayMs, reason: notice.reason },
            'CircleCI request failed; retrying.',
          );
        },
      );
    } catch (error) {
      throw this.toRequestError(url, error, signal);
    }

    const { statusCode, statusMessage } = response;
    if (statusCode >= 400 && statusCode < 500) {
      throw new AuthError(statusCode);
    }
    if (statusCode < 200 || statusCode >= 300) {
      throw new TransportError(
        `CircleCI request to ${describeCall(url)} returned ${statusCode} ${statusMessage}`.trim(),
        { statusCode },
      );
    }
    return response;
  }

  private toRequestError(url: URL, error: unknown, signal: AbortSignal | undefined): ScanError {
    if (signal?.aborted) {
      return new CancelledError(undefined, { cause: error });
    }
    if (error instanceof HttpError) {
      return new TransportError(`CircleCI request to ${describeCall(url)} returned ${error.statusCode}.`, {
        cause: error,
        statusCode: error.statusCode,
      });
    }
    if (error instanceof ResponseSizeLimitError) {
      return new TransportError(`CircleCI response from ${describeCall(url)} exceeded ${error.limit} bytes.`, {
        cause: error,
      });
    }
    return toScanError(error);
  }

  private decode<T>(url: URL, response: HttpResponse, schema: ZodType<T, ZodTypeDef, unknown>): T {
    let payload: unknown;
    try {
      payload = JSON.parse(response.body.toString('utf8'));
    } catch (error) {
      throw new DecodeError(
        `Unable to parse JSON response from ${describeCall(url)}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new DecodeError(
        `Unexpected response shape from ${describeCall(url)}${where}: ${issue?.message ?? 'invalid payload'}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }
}
