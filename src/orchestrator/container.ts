import Docker from 'dockerode';
import { Writable } from 'stream';
import type { Duplex } from 'stream';
import pino from 'pino';
import tarFs from 'tar-fs';
import {
  BuildImageOptions,
  ContainerConfig,
  ExecOptions,
  ExecResult,
} from '../types.js';
import {
  InterruptedError,
  OperationTimeoutError,
  getErrorMessage,
  interruption,
  throwIfAborted,
} from '../errors.js';

/**
 * The handful of container runtime primitives the pipeline relies on.
 * Every operation addresses containers and volumes by name.
 */
export interface ContainerRuntime {
  ping(): Promise<void>;
  ensureImage(image: string, signal?: AbortSignal): Promise<void>;
  buildImage(contextDir: string, options: BuildImageOptions): Promise<void>;
  createVolume(name: string): Promise<void>;
  /** Resolves false when the volume was already gone. */
  removeVolume(name: string): Promise<boolean>;
  volumeExists(name: string): Promise<boolean>;
  createContainer(config: ContainerConfig): Promise<void>;
  startContainer(name: string): Promise<void>;
  /** Waits for the container to exit and resolves its exit code. */
  waitContainer(name: string, timeoutMs: number, signal?: AbortSignal): Promise<number>;
  putArchive(name: string, archive: NodeJS.ReadableStream, targetPath: string, signal?: AbortSignal): Promise<void>;
  exec(name: string, command: string[], options: ExecOptions): Promise<ExecResult>;
  stopContainer(name: string, timeoutSeconds?: number): Promise<void>;
  /** Resolves false when the container was already gone. */
  removeContainer(name: string): Promise<boolean>;
  containerExists(name: string): Promise<boolean>;
  listContainersUsingVolume(volume: string): Promise<string[]>;
}

/**
 * Type guard for Docker API errors which have a statusCode property
 */
export function isDockerError(error: unknown): error is { statusCode: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof (error as Record<string, unknown>).statusCode === 'number'
  );
}

function isNotFound(error: unknown): boolean {
  return isDockerError(error) && error.statusCode === 404;
}

interface BuildEvent {
  stream?: string;
  status?: string;
  error?: string;
}

function isBuildEvent(value: unknown): value is BuildEvent {
  return typeof value === 'object' && value !== null;
}

// Node and streamx streams both have destroy(); NodeJS.ReadableStream does not declare it
function destroyStream(stream: unknown): void {
  if (typeof stream === 'object' && stream !== null && 'destroy' in stream && typeof stream.destroy === 'function') {
    stream.destroy();
  }
}

export interface DockerRuntimeOptions {
  pullTimeoutMs?: number;      // default: 600000
  archiveTimeoutMs?: number;   // default: 300000
}

// Docker may report an exec as still running just after its stream ends
const EXIT_CODE_CHECKS = 10;
const EXIT_CODE_INTERVAL_MS = 100;

/**
 * ContainerRuntime backed by the Docker Engine API (via dockerode).
 */
export class DockerRuntime implements ContainerRuntime {
  private docker: Docker;
  private log: pino.Logger;
  private pullTimeoutMs: number;
  private archiveTimeoutMs: number;

  constructor(socketPath = '/var/run/docker.sock', logger?: pino.Logger, options: DockerRuntimeOptions = {}) {
    this.docker = new Docker({ socketPath });
    this.log = logger ?? pino({ level: 'silent' });
    this.pullTimeoutMs = options.pullTimeoutMs ?? 600000;
    this.archiveTimeoutMs = options.archiveTimeoutMs ?? 300000;
  }

  /**
   * Verify Docker daemon is running and accessible.
   *
   * @throws Error with actionable message if Docker is not available
   */
  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (error) {
      throw new Error(
        'Docker daemon is not running or not accessible. ' +
        'Please ensure Docker is installed and running. ' +
        `Try: docker ps (${getErrorMessage(error)})`
      );
    }
  }

  async ensureImage(image: string, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (error) {
      if (!isNotFound(error)) {
        throw new Error(`Failed to inspect image ${image}: ${getErrorMessage(error)}`);
      }
    }

    this.log.info({ image }, 'Pulling image');
    const progress: { stream?: NodeJS.ReadableStream; ended: boolean } = { ended: false };
    const work = (async () => {
      const stream: NodeJS.ReadableStream = await this.docker.pull(image);
      progress.stream = stream;
      if (progress.ended) {
        destroyStream(stream);
        return;
      }
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (err: unknown) => (err ? reject(err) : resolve()));
      });
    })();

    await this.bounded(`Pull of ${image}`, work, this.pullTimeoutMs, signal, async () => {
      progress.ended = true;
      destroyStream(progress.stream);
    });
    this.log.info({ image }, 'Image pulled');
  }

  /**
   * Build an image from a directory. The context is sent as a tar stream;
   * on timeout or abort the request is aborted, whether it is still
   * uploading the context or already streaming progress, which cancels the
   * build on the daemon side.
   */
  async buildImage(contextDir: string, options: BuildImageOptions): Promise<void> {
    throwIfAborted(options.signal);

    const request = new AbortController();
    const progress: { response?: NodeJS.ReadableStream } = {};
    const failure: { message?: string } = {};

    const work = (async () => {
      const stream: NodeJS.ReadableStream = await this.docker.buildImage(tarFs.pack(contextDir), {
        t: options.tag,
        nocache: options.noCache,
        abortSignal: request.signal,
      });
      progress.response = stream;
      if (request.signal.aborted) {
        destroyStream(stream);
        return;
      }
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: unknown) => (err ? reject(err) : resolve()),
          (event: unknown) => {
            if (!isBuildEvent(event)) return;
            if (event.stream) options.onOutput?.(event.stream);
            else if (event.status) options.onOutput?.(`${event.status}\n`);
            if (event.error) {
              failure.message = event.error;
              options.onOutput?.(`ERROR: ${event.error}\n`);
            }
          }
        );
      });
    })();

    await this.bounded(`Build of ${options.tag}`, work, options.timeoutMs, options.signal, async () => {
      request.abort();
      destroyStream(progress.response);
    });

    if (failure.message) {
      throw new Error(failure.message);
    }
    this.log.info({ tag: options.tag }, 'Image built');
  }

  async createVolume(name: string): Promise<void> {
    await this.docker.createVolume({ Name: name });
    this.log.info({ volume: name }, 'Volume created');
  }

  async removeVolume(name: string): Promise<boolean> {
    try {
      await this.docker.getVolume(name).remove();
      this.log.info({ volume: name }, 'Volume removed');
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        this.log.info({ volume: name }, 'Volume already removed');
        return false;
      }
      throw new Error(`Failed to remove volume ${name}: ${getErrorMessage(error)}`);
    }
  }

  async volumeExists(name: string): Promise<boolean> {
    try {
      await this.docker.getVolume(name).inspect();
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async createContainer(config: ContainerConfig): Promise<void> {
    try {
      const container = await this.docker.createContainer({
        name: config.name,
        Image: config.image,
        Cmd: config.cmd,
        User: config.user,
        WorkingDir: config.workingDir,
        HostConfig: {
          Binds: config.binds,
          AutoRemove: false,
        },
      });
      this.log.info({ containerId: container.id, name: config.name }, 'Container created');
    } catch (error) {
      throw new Error(`Failed to create container ${config.name}: ${getErrorMessage(error)}`);
    }
  }

  async startContainer(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).start();
      this.log.info({ name }, 'Container started');
    } catch (error: unknown) {
      if (isDockerError(error) && error.statusCode === 304) {
        this.log.info({ name }, 'Container already running');
        return;
      }
      throw new Error(`Failed to start container ${name}: ${getErrorMessage(error)}`);
    }
  }

  async waitContainer(name: string, timeoutMs: number, signal?: AbortSignal): Promise<number> {
    throwIfAborted(signal);
    const container = this.docker.getContainer(name);
    const work = container.wait().then((outcome: { StatusCode: number }) => outcome.StatusCode);
    return this.bounded(`Container ${name}`, work, timeoutMs, signal, () => this.kill(name));
  }

  async putArchive(
    name: string,
    archive: NodeJS.ReadableStream,
    targetPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    throwIfAborted(signal);
    const work = this.docker.getContainer(name).putArchive(archive, { path: targetPath });
    try {
      await this.bounded(`Copy into ${name}:${targetPath}`, work, this.archiveTimeoutMs, signal, async () => {
        destroyStream(archive);
      });
    } catch (error) {
      if (error instanceof OperationTimeoutError || error instanceof InterruptedError) throw error;
      throw new Error(`Failed to copy archive into ${name}:${targetPath}: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Execute a command in the container with timeout protection.
   *
   * The Engine API cannot signal an exec'd process on its own, so a timeout
   * or abort kills the whole container. Callers tear it down afterwards.
   */
  async exec(name: string, command: string[], options: ExecOptions): Promise<ExecResult> {
    throwIfAborted(options.signal);
    const container = this.docker.getContainer(name);

    let exec: Docker.Exec;
    let stream: Duplex;
    try {
      exec = await container.exec({
        Cmd: command,
        AttachStdout: true,
        AttachStderr: true,
        Env: options.env,
        WorkingDir: options.workingDir,
        User: options.user,
      });
      stream = await exec.start({ hijack: true, stdin: false });
    } catch (error) {
      throw new Error(`Failed to execute command: ${getErrorMessage(error)}`);
    }

    let stdout = '';
    let stderr = '';
    const onOutput = options.onOutput;

    const stdoutStream = new Writable({
      write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
        const text = chunk.toString();
        stdout += text;
        onOutput?.(text, 'stdout');
        callback();
      }
    });

    const stderrStream = new Writable({
      write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
        const text = chunk.toString();
        stderr += text;
        onOutput?.(text, 'stderr');
        callback();
      }
    });

    const work = new Promise<void>((resolve, reject) => {
      this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);
      stream.on('end', resolve);
      stream.on('error', reject);
    });

    await this.bounded(`Command ${command[0]}`, work, options.timeoutMs, options.signal, async () => {
      stream.destroy();
      await this.kill(name);
    });

    return {
      stdout,
      stderr,
      exitCode: await this.exitCodeOf(exec),
    };
  }

  /**
   * Poll the exec until Docker reports it finished with an exit code.
   *
   * @throws Error when no exit code is reported within the allowed checks
   */
  private async exitCodeOf(exec: Docker.Exec): Promise<number> {
    for (let check = 1; check <= EXIT_CODE_CHECKS; check++) {
      const inspection = await exec.inspect();
      if (!inspection.Running && typeof inspection.ExitCode === 'number') {
        return inspection.ExitCode;
      }
      if (check < EXIT_CODE_CHECKS) {
        await new Promise(resolve => setTimeout(resolve, EXIT_CODE_INTERVAL_MS));
      }
    }
    throw new Error(`Exit code unavailable after ${EXIT_CODE_CHECKS} checks`);
  }

  async stopContainer(name: string, timeoutSeconds: number = 10): Promise<void> {
    const container = this.docker.getContainer(name);
    try {
      await container.stop({ t: timeoutSeconds });
      this.log.info({ name }, 'Container stopped gracefully');
    } catch (error: unknown) {
      if (isDockerError(error) && error.statusCode === 304) {
        this.log.info({ name }, 'Container already stopped');
      } else if (isNotFound(error)) {
        this.log.info({ name }, 'Container already removed');
      } else {
        this.log.warn({ name, err: getErrorMessage(error) }, 'Failed to stop container gracefully, forcing kill');
        await this.kill(name);
      }
    }
  }

  async removeContainer(name: string): Promise<boolean> {
    try {
      await this.docker.getContainer(name).remove({ force: true });
      this.log.info({ name }, 'Container removed');
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        this.log.info({ name }, 'Container already removed');
        return false;
      }
      throw new Error(`Failed to remove container ${name}: ${getErrorMessage(error)}`);
    }
  }

  async containerExists(name: string): Promise<boolean> {
    try {
      await this.docker.getContainer(name).inspect();
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async listContainersUsingVolume(volume: string): Promise<string[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { volume: [volume] },
    });
    return containers.map(c => c.Id);
  }

  private async kill(name: string): Promise<void> {
    try {
      await this.docker.getContainer(name).kill({ signal: 'SIGKILL' });
      this.log.warn({ name }, 'Container killed forcefully');
    } catch (error: unknown) {
      // 404: gone, 409: not running
      if (isDockerError(error) && (error.statusCode === 404 || error.statusCode === 409)) {
        return;
      }
      throw new Error(`Failed to kill container ${name}: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Race an operation against its timeout and the cancellation signal.
   * When either fires, `terminate` forcibly ends the underlying operation.
   */
  private async bounded<T>(
    operation: string,
    work: Promise<T>,
    timeoutMs: number,
    signal: AbortSignal | undefined,
    terminate: () => Promise<void>
  ): Promise<T> {
    let timeoutId: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const expiry = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new OperationTimeoutError(operation, timeoutMs)), timeoutMs);
      if (signal) {
        onAbort = () => reject(interruption(signal));
        if (signal.aborted) onAbort();
        else signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      return await Promise.race([work, expiry]);
    } catch (error) {
      if (error instanceof OperationTimeoutError || error instanceof InterruptedError) {
        work.catch((late: unknown) => {
          this.log.debug({ operation, err: getErrorMessage(late) }, 'Abandoned operation settled with error');
        });
        this.log.warn({ operation, reason: error.name }, 'Terminating operation');
        try {
          await terminate();
        } catch (terminateError) {
          this.log.warn({ operation, err: getErrorMessage(terminateError) }, 'Failed to terminate operation');
        }
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }
}
