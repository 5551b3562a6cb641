import tarStream from 'tar-stream';
import type { ContainerRuntime } from '../orchestrator/container.js';
import type { BuildImageOptions, ContainerConfig, ExecOptions, ExecResult } from '../types.js';

export interface FakeContainer {
  image: string;
  binds: string[];
  user?: string;
  running: boolean;
}

export interface ArchiveEntry {
  name: string;
  type: string;
  content: string;
}

export interface ArchiveUpload {
  container: string;
  targetPath: string;
  entries: ArchiveEntry[];
}

export interface ExecCall {
  container: string;
  command: string[];
  options: ExecOptions;
}

export interface FakeRuntimeOptions {
  build?: (contextDir: string, options: BuildImageOptions) => Promise<void>;
  exec?: (call: ExecCall) => Promise<ExecResult>;
  waitExitCode?: number;
  pingError?: Error;
}

/**
 * In-process ContainerRuntime. Keeps images, volumes and containers in maps
 * and records every call in order.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly images = new Set<string>();
  readonly volumes = new Set<string>();
  readonly containers = new Map<string, FakeContainer>();
  readonly calls: string[] = [];
  readonly archives: ArchiveUpload[] = [];
  readonly execs: ExecCall[] = [];

  constructor(private readonly options: FakeRuntimeOptions = {}) {}

  async ping(): Promise<void> {
    if (this.options.pingError) throw this.options.pingError;
  }

  async ensureImage(image: string): Promise<void> {
    this.calls.push(`ensureImage:${image}`);
    this.images.add(image);
  }

  async buildImage(contextDir: string, options: BuildImageOptions): Promise<void> {
    this.calls.push(`buildImage:${options.tag}`);
    if (this.options.build) {
      await this.options.build(contextDir, options);
    } else {
      options.onOutput?.('Step 1/1 : FROM busybox\n');
      options.onOutput?.('Successfully built 0123456789ab\n');
    }
    this.images.add(options.tag);
  }

  async createVolume(name: string): Promise<void> {
    this.calls.push(`createVolume:${name}`);
    if (this.volumes.has(name)) throw new Error(`volume ${name} already exists`);
    this.volumes.add(name);
  }

  async removeVolume(name: string): Promise<boolean> {
    this.calls.push(`removeVolume:${name}`);
    if (!this.volumes.has(name)) return false;
    if ((await this.listContainersUsingVolume(name)).length > 0) {
      throw new Error(`volume ${name} is in use`);
    }
    this.volumes.delete(name);
    return true;
  }

  async volumeExists(name: string): Promise<boolean> {
    return this.volumes.has(name);
  }

  async createContainer(config: ContainerConfig): Promise<void> {
    this.calls.push(`createContainer:${config.name}`);
    if (this.containers.has(config.name)) throw new Error(`container ${config.name} already exists`);
    if (!this.images.has(config.image)) throw new Error(`no such image: ${config.image}`);
    for (const bind of config.binds) {
      const volume = bind.split(':')[0];
      this.volumes.add(volume);
    }
    this.containers.set(config.name, { image: config.image, binds: config.binds, user: config.user, running: false });
  }

  async startContainer(name: string): Promise<void> {
    this.calls.push(`startContainer:${name}`);
    this.require(name).running = true;
  }

  async waitContainer(name: string): Promise<number> {
    this.calls.push(`waitContainer:${name}`);
    this.require(name).running = false;
    return this.options.waitExitCode ?? 0;
  }

  async putArchive(name: string, archive: NodeJS.ReadableStream, targetPath: string): Promise<void> {
    this.calls.push(`putArchive:${name}`);
    this.require(name);
    const entries: ArchiveEntry[] = [];
    const extract = tarStream.extract();
    extract.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        entries.push({ name: header.name, type: header.type ?? 'file', content: Buffer.concat(chunks).toString() });
        next();
      });
    });
    await new Promise<void>((resolve, reject) => {
      extract.on('finish', resolve);
      extract.on('error', reject);
      archive.pipe(extract);
    });
    this.archives.push({ container: name, targetPath, entries });
  }

  async exec(name: string, command: string[], options: ExecOptions): Promise<ExecResult> {
    this.calls.push(`exec:${name}:${command[0]}`);
    if (!this.require(name).running) throw new Error(`container ${name} is not running`);
    const call = { container: name, command, options };
    this.execs.push(call);
    const result = this.options.exec
      ? await this.options.exec(call)
      : { stdout: '', stderr: '', exitCode: 0 };
    if (result.stdout) options.onOutput?.(result.stdout, 'stdout');
    if (result.stderr) options.onOutput?.(result.stderr, 'stderr');
    return result;
  }

  async stopContainer(name: string): Promise<void> {
    this.calls.push(`stopContainer:${name}`);
    const container = this.containers.get(name);
    if (container) container.running = false;
  }

  async removeContainer(name: string): Promise<boolean> {
    this.calls.push(`removeContainer:${name}`);
    return this.containers.delete(name);
  }

  async containerExists(name: string): Promise<boolean> {
    return this.containers.has(name);
  }

  async listContainersUsingVolume(volume: string): Promise<string[]> {
    return [...this.containers.entries()]
      .filter(([, container]) => container.binds.some(bind => bind.startsWith(`${volume}:`)))
      .map(([name]) => name);
  }

  private require(name: string): FakeContainer {
    const container = this.containers.get(name);
    if (!container) throw new Error(`no such container: ${name}`);
    return container;
  }
}

/** Last argument of an exec call: the script or test command. */
export function commandText(call: ExecCall): string {
  return call.command[call.command.length - 1] ?? '';
}
