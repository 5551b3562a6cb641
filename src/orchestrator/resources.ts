import pino from 'pino';
import tarFs from 'tar-fs';
import tarStream from 'tar-stream';
import { ContainerRuntime } from './container.js';
import { BuildContext, VCS_DIR } from './context.js';
import {
  InterruptedError,
  OperationTimeoutError,
  RunError,
  getErrorMessage,
} from '../errors.js';
import { ExecOptions, ExecResult, RuntimeHandle } from '../types.js';

export const HELPER_IMAGE = 'busybox:latest';
const HELPER_MOUNT = '/mnt/vol';

/**
 * Lower-case a value and replace anything Docker rejects in names and tags.
 */
export function dockerSafeName(value: string): string {
  const cleaned = value
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, '-')
    .replace(/^[-_.]+|[-_.]+$/g, '');
  return cleaned || 'unnamed';
}

/**
 * Deterministic resource names for a task; a run id namespaces them.
 */
export function deriveHandle(taskId: string, runId?: string): RuntimeHandle {
  const id = dockerSafeName(runId ? `${runId}-${taskId}` : taskId);
  return {
    volumeName: `task-${id}`,
    containerName: `tx-task-${id}`,
    helperName: `tx-task-${id}-copy`,
    imageTag: `task-${id}`,
  };
}

export interface ResourceOptions {
  repoPath: string;
  keep: boolean;
  helperImage?: string;
  copyTimeoutMs?: number;   // default: 600000 (10 minutes)
  logger?: pino.Logger;
}

export interface TeardownReport {
  skipped: boolean;
  removed: string[];
  failures: string[];
}

export interface ResourceState {
  container: boolean;
  helper: boolean;
  volume: boolean;
}

export interface ArchiveFile {
  name: string;
  content: string;
  mode?: number;
}

/**
 * Owns one task's volume and containers.
 *
 * Lifecycle:
 * 1. provision(): named volume → detached task container → repository copy
 *    through a root helper container (sidesteps UID mismatches between host,
 *    build image and task image)
 * 2. exec() / putFiles() while the task runs
 * 3. teardown(): always, unless keep is set; never throws
 */
export class RuntimeResources {
  readonly handle: RuntimeHandle;
  private runtime: ContainerRuntime;
  private options: ResourceOptions;
  private log: pino.Logger;

  constructor(runtime: ContainerRuntime, handle: RuntimeHandle, options: ResourceOptions) {
    this.runtime = runtime;
    this.handle = handle;
    this.options = options;
    this.log = options.logger ?? pino({ level: 'silent' });
  }

  get repoPath(): string {
    return this.options.repoPath;
  }

  /**
   * @throws RunError when any provisioning step fails
   * @throws InterruptedError when the run is cancelled
   */
  async provision(context: BuildContext, signal?: AbortSignal): Promise<void> {
    const { volumeName, containerName, imageTag } = this.handle;

    await this.step('create volume', async () => {
      await this.purgeStale();
      await this.runtime.createVolume(volumeName);
    });

    await this.step('start container', async () => {
      await this.runtime.createContainer({
        name: containerName,
        image: imageTag,
        cmd: ['sleep', 'infinity'],
        binds: [`${volumeName}:${this.options.repoPath}`],
      });
      await this.runtime.startContainer(containerName);
    });

    await this.step('copy repository into volume', () => this.copyRepository(context, signal));
    this.log.info({ volumeName, containerName }, 'Runtime resources provisioned');
  }

  exec(command: string[], options: ExecOptions): Promise<ExecResult> {
    return this.runtime.exec(this.handle.containerName, command, {
      workingDir: this.options.repoPath,
      ...options,
    });
  }

  /**
   * Ship generated files into the running task container as a tar archive.
   */
  async putFiles(files: ArchiveFile[], targetDir: string, signal?: AbortSignal): Promise<void> {
    const pack = tarStream.pack();
    const dirs = new Set<string>();
    for (const file of files) {
      const parts = file.name.split('/').slice(0, -1);
      for (let i = 1; i <= parts.length; i++) {
        const dir = parts.slice(0, i).join('/');
        if (!dirs.has(dir)) {
          dirs.add(dir);
          pack.entry({ name: dir, type: 'directory', mode: 0o777 });
        }
      }
      pack.entry({ name: file.name, mode: file.mode ?? 0o644 }, file.content);
    }
    pack.finalize();
    await this.runtime.putArchive(this.handle.containerName, pack, targetDir, signal);
  }

  /**
   * Remove the task container, the helper, anything else holding the volume,
   * then the volume. Already-removed resources count as success.
   */
  async teardown(): Promise<TeardownReport> {
    const { volumeName, containerName, helperName } = this.handle;

    if (this.options.keep) {
      this.log.info({ volumeName, containerName }, 'Keeping runtime resources');
      return { skipped: true, removed: [], failures: [] };
    }

    const report: TeardownReport = { skipped: false, removed: [], failures: [] };

    await this.attempt(report, containerName, async () => {
      await this.runtime.stopContainer(containerName);
      return this.runtime.removeContainer(containerName);
    });
    await this.attempt(report, helperName, () => this.runtime.removeContainer(helperName));

    let holders: string[] = [];
    try {
      holders = await this.runtime.listContainersUsingVolume(volumeName);
    } catch (error) {
      report.failures.push(`${volumeName}: ${getErrorMessage(error)}`);
      this.log.warn({ volumeName, err: getErrorMessage(error) }, 'Failed to list containers using volume');
    }
    for (const id of holders) {
      await this.attempt(report, id, () => this.runtime.removeContainer(id));
    }

    await this.attempt(report, volumeName, () => this.runtime.removeVolume(volumeName));

    this.log.info({ removed: report.removed, failures: report.failures.length }, 'Runtime resources released');
    return report;
  }

  async state(): Promise<ResourceState> {
    const { volumeName, containerName, helperName } = this.handle;
    const [container, helper, volume] = await Promise.all([
      this.runtime.containerExists(containerName),
      this.runtime.containerExists(helperName),
      this.runtime.volumeExists(volumeName),
    ]);
    return { container, helper, volume };
  }

  private async purgeStale(): Promise<void> {
    const { volumeName, containerName, helperName } = this.handle;
    await this.runtime.removeContainer(containerName);
    await this.runtime.removeContainer(helperName);
    for (const id of await this.runtime.listContainersUsingVolume(volumeName)) {
      await this.runtime.removeContainer(id);
    }
    if (await this.runtime.removeVolume(volumeName)) {
      this.log.warn({ volumeName }, 'Removed stale volume from a previous run');
    }
  }

  private async copyRepository(context: BuildContext, signal?: AbortSignal): Promise<void> {
    const { volumeName, helperName } = this.handle;
    const helperImage = this.options.helperImage ?? HELPER_IMAGE;

    await this.runtime.ensureImage(helperImage, signal);
    await this.runtime.createContainer({
      name: helperName,
      image: helperImage,
      user: '0:0',
      cmd: ['sh', '-c', `chmod -R a+rwX ${HELPER_MOUNT}`],
      binds: [`${volumeName}:${HELPER_MOUNT}`],
    });

    try {
      await this.runtime.putArchive(
        helperName,
        tarFs.pack(context.dir, { entries: [VCS_DIR] }),
        HELPER_MOUNT,
        signal
      );
      await this.runtime.startContainer(helperName);
      const exitCode = await this.runtime.waitContainer(helperName, this.options.copyTimeoutMs ?? 600000, signal);
      if (exitCode !== 0) {
        throw new Error(`copy helper exited with code ${exitCode}`);
      }
    } finally {
      try {
        await this.runtime.removeContainer(helperName);
      } catch (error) {
        this.log.warn({ helperName, err: getErrorMessage(error) }, 'Failed to remove copy helper');
      }
    }
  }

  private async step(label: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      if (error instanceof InterruptedError) throw error;
      const kind = error instanceof OperationTimeoutError ? 'timeout' : 'runtime';
      this.log.error({ step: label, err: getErrorMessage(error) }, 'Provisioning step failed');
      throw new RunError(`Failed to ${label}: ${getErrorMessage(error)}`, kind);
    }
  }

  private async attempt(report: TeardownReport, name: string, fn: () => Promise<boolean>): Promise<void> {
    try {
      if (await fn()) {
        report.removed.push(name);
      }
    } catch (error) {
      report.failures.push(`${name}: ${getErrorMessage(error)}`);
      this.log.warn({ name, err: getErrorMessage(error) }, 'Teardown step failed');
    }
  }
}
