import pino from 'pino';
import { ArtifactLog } from './artifacts.js';
import { RuntimeResources } from './resources.js';
import { InterruptedError, OperationTimeoutError, getErrorMessage } from '../errors.js';
import { TaskStatus, VerificationOutcome } from '../types.js';

export interface VerificationRequest {
  command: string;
  timeoutMs: number;
  logPath: string;
  signal?: AbortSignal;
}

export function outcomeStatus(outcome: VerificationOutcome): TaskStatus {
  switch (outcome.kind) {
    case 'passed':
      return 'tests_passed';
    case 'failed':
      return 'tests_failed';
    case 'timeout':
      return 'tests_timeout';
    case 'exec_error':
      return 'tests_error';
  }
}

/**
 * Runs the task's test command in the task container and classifies the result.
 * Output (including partial output on timeout) always goes to the test log.
 */
export class VerificationRunner {
  private log: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.log = logger ?? pino({ level: 'silent' });
  }

  /**
   * @throws InterruptedError when the run is cancelled; every other failure is an outcome
   */
  async run(resources: RuntimeResources, request: VerificationRequest): Promise<VerificationOutcome> {
    const logFile = new ArtifactLog(request.logPath, this.log);
    logFile.write(`$ bash -lc ${JSON.stringify(request.command)}\n`);
    const startTime = Date.now();

    try {
      const result = await resources.exec(['bash', '-lc', request.command], {
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        onOutput: text => logFile.write(text),
      });
      const duration = Date.now() - startTime;
      logFile.write(`\n# exit code: ${result.exitCode} (${duration}ms)\n`);
      this.log.info({ exitCode: result.exitCode, duration }, 'Verification finished');
      return result.exitCode === 0 ? { kind: 'passed' } : { kind: 'failed', exitCode: result.exitCode };
    } catch (error) {
      if (error instanceof InterruptedError) {
        logFile.write('\n# interrupted\n');
        throw error;
      }
      if (error instanceof OperationTimeoutError) {
        logFile.write(`\n# timed out after ${request.timeoutMs}ms\n`);
        this.log.warn({ timeoutMs: request.timeoutMs }, 'Verification timed out');
        return { kind: 'timeout' };
      }
      const message = getErrorMessage(error);
      logFile.write(`\n# could not execute: ${message}\n`);
      this.log.error({ err: message }, 'Verification could not be executed');
      return { kind: 'exec_error', message };
    } finally {
      await logFile.close();
    }
  }
}
