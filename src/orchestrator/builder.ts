import pino from 'pino';
import { ArtifactLog } from './artifacts.js';
import { ContainerRuntime } from './container.js';
import { BuildContext } from './context.js';
import {
  BuildError,
  InterruptedError,
  OperationTimeoutError,
  getErrorMessage,
} from '../errors.js';

const LOG_TAIL_LINES = 20;

export interface BuildRequest {
  imageTag: string;
  useCache: boolean;
  timeoutMs: number;
  logPath: string;
  signal?: AbortSignal;
}

/**
 * Keeps the last N complete lines of a chunked stream.
 */
export class LineTail {
  private lines: string[] = [];
  private partial = '';

  constructor(private readonly size: number = LOG_TAIL_LINES) {}

  push(chunk: string): void {
    const parts = (this.partial + chunk).split('\n');
    this.partial = parts.pop() ?? '';
    for (const line of parts) {
      if (line.trim() === '') continue;
      this.lines.push(line);
    }
    if (this.lines.length > this.size) {
      this.lines = this.lines.slice(-this.size);
    }
  }

  toString(): string {
    const all = this.partial.trim() ? [...this.lines, this.partial] : this.lines;
    return all.slice(-this.size).join('\n');
  }
}

/**
 * Builds the task image. Output always lands in the build log, whatever the outcome.
 */
export class ImageBuilder {
  private log: pino.Logger;

  constructor(private readonly runtime: ContainerRuntime, logger?: pino.Logger) {
    this.log = logger ?? pino({ level: 'silent' });
  }

  /**
   * @throws BuildError with kind 'timeout' or 'exit' and the log tail
   * @throws InterruptedError when the run is cancelled mid-build
   */
  async build(context: BuildContext, request: BuildRequest): Promise<void> {
    const logFile = new ArtifactLog(request.logPath, this.log);
    const tail = new LineTail();
    const write = (text: string) => {
      logFile.write(text);
      tail.push(text);
    };

    write(`# docker build -t ${request.imageTag}${request.useCache ? '' : ' --no-cache'} ${context.dir}\n`);
    const startTime = Date.now();

    try {
      await this.runtime.buildImage(context.dir, {
        tag: request.imageTag,
        noCache: !request.useCache,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        onOutput: write,
      });
      write(`# build finished in ${Date.now() - startTime}ms\n`);
      this.log.info({ imageTag: request.imageTag, durationMs: Date.now() - startTime }, 'Build succeeded');
    } catch (error) {
      write(`# build failed: ${getErrorMessage(error)}\n`);
      if (error instanceof InterruptedError) {
        throw error;
      }
      if (error instanceof OperationTimeoutError) {
        this.log.error({ imageTag: request.imageTag, timeoutMs: request.timeoutMs }, 'Build timed out');
        throw new BuildError(`Build timed out after ${request.timeoutMs}ms`, 'timeout', tail.toString());
      }
      this.log.error({ imageTag: request.imageTag, err: getErrorMessage(error) }, 'Build failed');
      throw new BuildError(`Build failed: ${getErrorMessage(error)}`, 'exit', tail.toString());
    } finally {
      await logFile.close();
    }
  }
}
