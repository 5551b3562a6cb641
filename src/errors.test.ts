import { describe, it, expect } from 'vitest';
import {
  BuildError,
  DownloadError,
  InterruptedError,
  RunError,
  TaskError,
  UnzipError,
  getErrorMessage,
  interruption,
  throwIfAborted,
} from './errors.js';

describe('TaskError subclasses', () => {
  it('map each stage failure to its own status', () => {
    expect(new DownloadError('x').status).toBe('download_error');
    expect(new UnzipError('x').status).toBe('unzip_error');
    expect(new BuildError('x', 'exit').status).toBe('build_failed');
    expect(new RunError('x').status).toBe('run_failed');
  });

  it('use the documented default kinds', () => {
    expect(new DownloadError('x').kind).toBe('network');
    expect(new UnzipError('x').kind).toBe('archive');
    expect(new RunError('x').kind).toBe('runtime');
  });

  it('appends the log tail to a build error message', () => {
    const error = new BuildError('Build failed: exit 1', 'exit', 'step 1\nstep 2');
    expect(error.message).toBe('Build failed: exit 1\nstep 1\nstep 2');
    expect(error.toDetail()).toEqual({ kind: 'exit', message: 'Build failed: exit 1\nstep 1\nstep 2' });
    expect(error).toBeInstanceOf(TaskError);
  });
});

describe('cancellation helpers', () => {
  it('throwIfAborted is a no-op without an aborted signal', () => {
    expect(() => throwIfAborted()).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });

  it('rethrows the InterruptedError used as the abort reason', () => {
    const controller = new AbortController();
    const reason = new InterruptedError('SIGTERM');
    controller.abort(reason);
    expect(() => throwIfAborted(controller.signal)).toThrow(reason);
  });

  it('wraps any other abort reason in a fresh InterruptedError', () => {
    const controller = new AbortController();
    controller.abort();
    const error = interruption(controller.signal);
    expect(error).toBeInstanceOf(InterruptedError);
    expect(error.message).toBe('Interrupted by SIGINT');
  });

  it('getErrorMessage hides non-Error values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('boom')).toBe('Unknown error');
  });
});
