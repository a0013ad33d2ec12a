import type { Action, Build, Project } from './model';
import { projectKey } from './model';

export type ScanErrorCode =
  | 'AUTH_FAILED'
  | 'TRANSPORT_FAILED'
  | 'DECODE_FAILED'
  | 'WRITE_FAILED'
  | 'CANCELLED'
  | 'INVALID_CONFIG'
  | 'BRANCH_FAILED';

export class ScanError extends Error {
  public readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.name = 'ScanError';
  }
}

/** The remote API rejected the credentials (any 4xx answer). */
export class AuthError extends ScanError {
  constructor(
    public readonly statusCode: number,
    message = `invalid credentials, status ${statusCode}`,
  ) {
    super('AUTH_FAILED', message);
    this.name = 'AuthError';
  }
}

export class TransportError extends ScanError {
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { cause?: unknown; statusCode?: number } = {},
  ) {
    super('TRANSPORT_FAILED', message, { cause: options.cause });
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
  }
}

export class DecodeError extends ScanError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('DECODE_FAILED', message, options);
    this.name = 'DecodeError';
  }
}

// Sends block rather than fail; this only surfaces when the consumer closes the channel under a pending send.
export class WriteError extends ScanError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('WRITE_FAILED', message, options);
    this.name = 'WriteError';
  }
}

export class CancelledError extends ScanError {
  constructor(message = 'Scan was cancelled.', options: { cause?: unknown } = {}) {
    super('CANCELLED', message, options);
    this.name = 'CancelledError';
  }
}

export class ConfigError extends ScanError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}

export interface BranchContext {
  project: Project;
  build?: Build;
  step?: string;
  action?: Action;
}

const describeBranch = (context: BranchContext): string => {
  const segments = [`project ${projectKey(context.project)}`];
  if (context.build) {
    segments.push(`build ${context.build.buildNum}`);
  }
  if (context.step !== undefined) {
    segments.push(`step "${context.step}"`);
  }
  if (context.action) {
    segments.push(`action ${context.action.index}`);
  }
  return segments.join(', ');
};

/** A failure that abandoned one project branch of a scan. */
export class BranchFailure extends ScanError {
  public readonly context: BranchContext;

  public readonly reason: ScanError;

  constructor(stage: string, context: BranchContext, reason: ScanError) {
    super('BRANCH_FAILED', `error ${stage} (${describeBranch(context)}): ${reason.message}`, {
      cause: reason,
    });
    this.name = 'BranchFailure';
    this.context = context;
    this.reason = reason;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.reason.code,
      message: this.message,
      project: projectKey(this.context.project),
      ...(this.context.build ? { build: this.context.build.buildNum } : {}),
      ...(this.context.step !== undefined ? { step: this.context.step } : {}),
      ...(this.context.action ? { action: this.context.action.index } : {}),
    };
  }
}

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || ('code' in error && error.code === 'ABORT_ERR'));

export const toScanError = (error: unknown): ScanError => {
  if (error instanceof ScanError) {
    return error;
  }
  if (isAbortError(error)) {
    return new CancelledError(undefined, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message || 'Unexpected transport failure.', { cause: error });
};
