/**
 * Custom error classes for typed error handling.
 * Use instanceof checks instead of fragile string matching.
 */

import type { ErrorDetail, ErrorKind, TaskStatus } from './types.js';

/**
 * Base class for stage failures. Each subclass maps to exactly one terminal status.
 */
export class TaskError extends Error {
  readonly status: TaskStatus;
  readonly kind: ErrorKind;

  constructor(status: TaskStatus, kind: ErrorKind, message: string) {
    super(message);
    this.name = 'TaskError';
    this.status = status;
    this.kind = kind;
  }

  toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message };
  }
}

export class DownloadError extends TaskError {
  constructor(message: string, kind: ErrorKind = 'network') {
    super('download_error', kind, message);
    this.name = 'DownloadError';
  }
}

export class UnzipError extends TaskError {
  constructor(message: string, kind: ErrorKind = 'archive') {
    super('unzip_error', kind, message);
    this.name = 'UnzipError';
  }
}

export class BuildError extends TaskError {
  readonly logTail: string;

  constructor(message: string, kind: ErrorKind, logTail = '') {
    super('build_failed', kind, logTail ? `${message}\n${logTail}` : message);
    this.name = 'BuildError';
    this.logTail = logTail;
  }
}

/**
 * Provisioning or agent invocation failure.
 */
export class RunError extends TaskError {
  constructor(message: string, kind: ErrorKind = 'runtime') {
    super('run_failed', kind, message);
    this.name = 'RunError';
  }
}

/**
 * A container operation exceeded its bound and was forcibly ended.
 */
export class OperationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class InterruptedError extends Error {
  readonly signal: string;

  constructor(signal = 'SIGINT') {
    super(`Interrupted by ${signal}`);
    this.name = 'InterruptedError';
    this.signal = signal;
  }
}

/**
 * Throws the abort reason when it is an InterruptedError, or a fresh one otherwise.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw interruption(signal);
  }
}

export function interruption(signal: AbortSignal): InterruptedError {
  return signal.reason instanceof InterruptedError ? signal.reason : new InterruptedError();
}

/**
 * Extract error message safely without exposing internal details
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
