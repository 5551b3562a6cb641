import * as fs from 'fs/promises';
import * as path from 'path';
import pino from 'pino';
import { AgentInvoker, AgentSettings, resolveAgentConfig } from './agent.js';
import { ARCHIVE_FILE, CONTEXT_DIR, artifactPaths } from './artifacts.js';
import { ImageBuilder } from './builder.js';
import { ContainerRuntime } from './container.js';
import { BuildContextPreparer, DESCRIPTOR_NAME } from './context.js';
import { ResourceFetcher } from './fetcher.js';
import { MetricsCollector } from './metrics.js';
import { RuntimeResources, deriveHandle } from './resources.js';
import { ResultStore, buildSummary } from './results.js';
import { VerificationRunner, outcomeStatus } from './verifier.js';
import { InterruptedError, TaskError, getErrorMessage, throwIfAborted } from '../errors.js';
import {
  ErrorDetail,
  RunSummary,
  SkippedRow,
  TaskResult,
  TaskSpec,
  TaskStage,
  TaskStatus,
} from '../types.js';

export type ActiveStage = Exclude<TaskStage, 'DONE'>;

/** Status a stage reports when it fails with something other than its own TaskError */
export const STAGE_FAILURE_STATUS: Record<ActiveStage, TaskStatus> = {
  START: 'run_failed',
  FETCHING: 'download_error',
  PREPARING: 'unzip_error',
  BUILDING: 'build_failed',
  PROVISIONING: 'run_failed',
  AGENT_RUNNING: 'run_failed',
  TESTING: 'tests_error',
};

export interface OrchestratorConfig {
  outDir: string;
  repoPath: string;
  useCache: boolean;
  keep: boolean;
  buildTimeoutMs: number;
  agentTimeoutMs: number;
  testTimeoutMs: number;
  runId?: string;
  helperImage?: string;
  agent: AgentSettings;
}

export interface OrchestratorDeps {
  runtime: ContainerRuntime;
  fetcher: ResourceFetcher;
  logger?: pino.Logger;
  results?: ResultStore;
  metrics?: MetricsCollector;
}

/**
 * Map any stage failure onto exactly one terminal status.
 */
export function classifyFailure(stage: ActiveStage, error: unknown): { status: TaskStatus; error: ErrorDetail } {
  if (error instanceof TaskError) {
    return { status: error.status, error: error.toDetail() };
  }
  if (error instanceof InterruptedError) {
    return { status: STAGE_FAILURE_STATUS[stage], error: { kind: 'interrupted', message: error.message } };
  }
  return { status: STAGE_FAILURE_STATUS[stage], error: { kind: 'runtime', message: getErrorMessage(error) } };
}

/**
 * Task directory name; keeps ids readable while staying filesystem-safe.
 */
export function taskDirName(taskId: string): string {
  return `task_${taskId.replace(/[^A-Za-z0-9_.-]/g, '_')}`;
}

/**
 * TaskOrchestrator drives each task through
 * START → FETCHING → PREPARING → BUILDING → PROVISIONING → AGENT_RUNNING → TESTING → DONE.
 *
 * Key behaviors:
 * - One task at a time; a failure ends that task, never the batch
 * - Teardown is attached before the first resource is created and runs on
 *   every exit path (success, failure, interrupt) unless keep is set
 * - result.json is written as soon as the status is known
 * - An interrupt finishes the in-flight task (with teardown) and stops the batch
 */
export class TaskOrchestrator {
  private config: OrchestratorConfig;
  private runtime: ContainerRuntime;
  private fetcher: ResourceFetcher;
  private log: pino.Logger;
  private results: ResultStore;
  private metrics: MetricsCollector;

  constructor(config: OrchestratorConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.runtime = deps.runtime;
    this.fetcher = deps.fetcher;
    this.log = deps.logger ?? pino({ level: 'silent' });
    this.results = deps.results ?? new ResultStore(config.outDir, this.log);
    this.metrics = deps.metrics ?? new MetricsCollector();
  }

  taskDir(taskId: string): string {
    return path.join(this.config.outDir, taskDirName(taskId));
  }

  /**
   * Run every task in order, then write the run summary.
   */
  async runAll(tasks: TaskSpec[], skipped: SkippedRow[] = [], signal?: AbortSignal): Promise<RunSummary> {
    this.metrics.recordSkipped(skipped.length);
    for (const skip of skipped) {
      this.log.warn({ row: skip.row, taskId: skip.taskId, reason: skip.reason }, 'Row skipped');
    }

    const results: TaskResult[] = [];
    let interrupted = false;

    for (const [index, task] of tasks.entries()) {
      if (signal?.aborted) {
        interrupted = true;
        break;
      }
      this.log.info({ taskId: task.taskId, task: index + 1, total: tasks.length }, 'Starting task');
      results.push(await this.runTask(task, signal));
      if (signal?.aborted) {
        interrupted = true;
        break;
      }
    }

    if (interrupted) {
      this.log.warn({ completed: results.length, remaining: tasks.length - results.length }, 'Run interrupted');
    }

    const summary = buildSummary(results, skipped, interrupted);
    await this.results.writeSummary(summary);
    this.log.info({ metrics: this.metrics.getMetrics() }, 'Run completed');
    return summary;
  }

  /**
   * Run one task to a terminal status. Never throws.
   */
  async runTask(task: TaskSpec, signal?: AbortSignal): Promise<TaskResult> {
    const log = this.log.child({ taskId: task.taskId });
    const startTime = Date.now();
    const handle = deriveHandle(task.taskId, this.config.runId);
    const taskDir = this.taskDir(task.taskId);
    const artifacts = artifactPaths(taskDir);

    let stage: ActiveStage = 'START';
    let finalStage: TaskStage;
    let status: TaskStatus;
    let error: ErrorDetail | undefined;
    let model: string | undefined;
    let testExitCode: number | undefined;
    let resources: RuntimeResources | null = null;
    let result: TaskResult;

    try {
      try {
        await fs.rm(taskDir, { recursive: true, force: true });
        await fs.mkdir(path.join(taskDir, CONTEXT_DIR), { recursive: true });
        await Promise.all([artifacts.buildLog, artifacts.agentLog, artifacts.testLog].map(file => fs.writeFile(file, '')));

        const agentConfig = resolveAgentConfig(this.config.agent);
        model = agentConfig.model;

        stage = 'FETCHING';
        this.enter(log, stage, signal);
        const descriptorPath = await this.fetcher.fetch(
          task.buildDescriptorRef,
          path.join(taskDir, CONTEXT_DIR, DESCRIPTOR_NAME),
          signal
        );
        const archivePath = await this.fetcher.fetch(task.gitSnapshotRef, path.join(taskDir, ARCHIVE_FILE), signal);

        stage = 'PREPARING';
        this.enter(log, stage, signal);
        const context = await new BuildContextPreparer(log).prepare({
          descriptorPath,
          archivePath,
          request: { taskId: task.taskId, issueDescription: task.issueText },
          requestPath: artifacts.request,
        });

        stage = 'BUILDING';
        this.enter(log, stage, signal);
        await new ImageBuilder(this.runtime, log).build(context, {
          imageTag: handle.imageTag,
          useCache: this.config.useCache,
          timeoutMs: this.config.buildTimeoutMs,
          logPath: artifacts.buildLog,
          signal,
        });

        stage = 'PROVISIONING';
        this.enter(log, stage, signal);
        // Assigned before provisioning starts so a half-created volume is still torn down
        resources = new RuntimeResources(this.runtime, handle, {
          repoPath: this.config.repoPath,
          keep: this.config.keep,
          helperImage: this.config.helperImage,
          logger: log,
        });
        await resources.provision(context, signal);

        stage = 'AGENT_RUNNING';
        this.enter(log, stage, signal);
        await new AgentInvoker(log).invoke(resources, agentConfig, {
          repoPath: this.config.repoPath,
          request: { taskId: task.taskId, issueDescription: task.issueText },
          logPath: artifacts.agentLog,
          timeoutMs: this.config.agentTimeoutMs,
          signal,
        });

        stage = 'TESTING';
        this.enter(log, stage, signal);
        const outcome = await new VerificationRunner(log).run(resources, {
          command: task.testCommand,
          timeoutMs: this.config.testTimeoutMs,
          logPath: artifacts.testLog,
          signal,
        });
        status = outcomeStatus(outcome);
        if (outcome.kind === 'passed') {
          testExitCode = 0;
        } else if (outcome.kind === 'failed') {
          testExitCode = outcome.exitCode;
        } else if (outcome.kind === 'timeout') {
          error = { kind: 'timeout', message: `Verification exceeded ${this.config.testTimeoutMs}ms` };
        } else {
          error = { kind: 'exec', message: outcome.message };
        }
        finalStage = 'DONE';
      } catch (err) {
        const failure = classifyFailure(stage, err);
        status = failure.status;
        error = failure.error;
        finalStage = stage;
        log.error({ stage, status, kind: error.kind, err: error.message }, 'Task failed');
      }

      const finishedAt = Date.now();
      result = {
        taskId: task.taskId,
        status,
        ...(error ? { error } : {}),
        stage: finalStage,
        ...(model ? { model } : {}),
        ...(testExitCode === undefined ? {} : { testExitCode }),
        artifacts,
        startedAt: new Date(startTime).toISOString(),
        finishedAt: new Date(finishedAt).toISOString(),
        durationMs: finishedAt - startTime,
      };
      this.metrics.recordTask(status, result.durationMs);
      log.info({ status, durationMs: result.durationMs }, 'Task finished');

      try {
        await this.results.writeTaskResult(taskDir, result);
      } catch (writeError) {
        log.error({ err: getErrorMessage(writeError) }, 'Failed to write task result');
      }
    } finally {
      if (resources) {
        await resources.teardown();
      }
    }

    return result;
  }

  private enter(log: pino.Logger, stage: ActiveStage, signal?: AbortSignal): void {
    throwIfAborted(signal);
    log.info({ stage }, 'Entering stage');
  }
}
