import * as fs from 'fs/promises';
import * as path from 'path';
import dotenv from 'dotenv';
import pc from 'picocolors';
import { ContainerRuntime, DockerRuntime } from '../../orchestrator/container.js';
import { DefaultResourceFetcher, ResourceFetcher } from '../../orchestrator/fetcher.js';
import { TaskOrchestrator } from '../../orchestrator/pipeline.js';
import { InterruptedError, getErrorMessage } from '../../errors.js';
import { RunSummary, TaskStatus } from '../../types.js';
import { createLogger, Logger } from '../utils/logger.js';
import { parseTaskRows, readRowsText } from '../utils/rows.js';

export interface RunOptions {
  csv?: string;
  sheet?: string;
  out: string;
  repoPath: string;
  useCache: boolean;
  keep: boolean;
  buildTimeout: number;   // seconds, already parsed and validated
  agentTimeout: number;   // seconds
  testTimeout: number;    // seconds
  modelName?: string;
  agentBranch?: string;
  agentCommand?: string;
  envFile?: string;
  runId?: string;
  allowFailures: boolean;
}

/**
 * Collaborators a caller can swap out (tests inject in-process fakes).
 */
export interface RunDeps {
  runtime?: ContainerRuntime;
  fetcher?: ResourceFetcher;
  logger?: Logger;
  env?: Readonly<Record<string, string | undefined>>;
}

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_TASK_FAILURES = 1;
export const EXIT_USAGE = 2;
export const EXIT_SIGINT = 130;
export const EXIT_SIGTERM = 143;

/**
 * 0 when every processed task passed its tests (or failures are allowed), 1 otherwise.
 */
export function exitCodeFor(summary: RunSummary, allowFailures: boolean): number {
  if (allowFailures) return EXIT_OK;
  return summary.results.every(result => result.status === 'tests_passed') ? EXIT_OK : EXIT_TASK_FAILURES;
}

const STATUS_COLOR: Record<TaskStatus, (text: string) => string> = {
  tests_passed: pc.green,
  tests_failed: pc.red,
  tests_timeout: pc.yellow,
  tests_error: pc.red,
  run_failed: pc.red,
  build_failed: pc.red,
  unzip_error: pc.magenta,
  download_error: pc.magenta,
};

export function formatSummary(summary: RunSummary): string[] {
  const lines = summary.results.map(result => {
    const detail = result.error ? pc.dim(` (${result.error.kind}: ${result.error.message.split('\n')[0]})`) : '';
    return `- ${result.taskId}: ${STATUS_COLOR[result.status](result.status)}${detail}`;
  });
  for (const skip of summary.skipped) {
    lines.push(pc.dim(`- row ${skip.row}${skip.taskId ? ` (${skip.taskId})` : ''}: skipped, ${skip.reason}`));
  }
  lines.push(
    `${pc.bold(`${summary.passed}/${summary.total}`)} passed, ${summary.skipped.length} skipped` +
    (summary.interrupted ? pc.yellow(', interrupted') : '')
  );
  return lines;
}

/**
 * Run every task from the input rows.
 *
 * 1. Check Docker, read and validate the rows, load the optional env file
 * 2. Register signal handlers that cancel the in-flight task (its teardown still runs)
 * 3. Run the batch and print the summary
 *
 * @returns Exit code (0=all passed, 1=task failures, 2=usage/environment, 130=SIGINT, 143=SIGTERM)
 */
export async function runTasks(options: RunOptions, deps: RunDeps = {}): Promise<number> {
  const logger = deps.logger ?? createLogger();
  const runtime = deps.runtime ?? new DockerRuntime(undefined, logger.child({ component: 'docker' }));

  try {
    await runtime.ping();
  } catch (error) {
    logger.error({ err: getErrorMessage(error) }, 'Docker not available');
    console.error(pc.red(`Error: ${getErrorMessage(error)}`));
    return EXIT_USAGE;
  }

  let rowsText: string;
  try {
    rowsText = await readRowsText({ csv: options.csv, sheet: options.sheet });
  } catch (error) {
    console.error(pc.red(`Error: cannot read task rows: ${getErrorMessage(error)}`));
    return EXIT_USAGE;
  }

  const { tasks, skipped, missingColumns } = parseTaskRows(rowsText);
  if (missingColumns.length > 0) {
    console.error(pc.red(`Error: missing columns: ${missingColumns.join(', ')}`));
    return EXIT_USAGE;
  }

  let extraEnv: Record<string, string> | undefined;
  if (options.envFile) {
    try {
      extraEnv = dotenv.parse(await fs.readFile(options.envFile));
    } catch (error) {
      console.error(pc.red(`Error: cannot read env file ${options.envFile}: ${getErrorMessage(error)}`));
      return EXIT_USAGE;
    }
  }

  const fetcher = deps.fetcher ?? new DefaultResourceFetcher({
    baseDir: options.csv ? path.dirname(path.resolve(options.csv)) : process.cwd(),
    logger: logger.child({ component: 'fetcher' }),
  });

  const orchestrator = new TaskOrchestrator(
    {
      outDir: path.resolve(options.out),
      repoPath: options.repoPath,
      useCache: options.useCache,
      keep: options.keep,
      buildTimeoutMs: options.buildTimeout * 1000,
      agentTimeoutMs: options.agentTimeout * 1000,
      testTimeoutMs: options.testTimeout * 1000,
      runId: options.runId,
      agent: {
        env: { ...(deps.env ?? process.env) },
        extraEnv,
        modelName: options.modelName,
        command: options.agentCommand,
        branch: options.agentBranch,
      },
    },
    { runtime, fetcher, logger }
  );

  logger.info({ tasks: tasks.length, skipped: skipped.length, out: options.out }, 'Starting run');

  // The first signal cancels the in-flight task and lets its teardown finish;
  // a second one exits immediately.
  const controller = new AbortController();
  const received: { signal?: NodeJS.Signals } = {};
  const onSignal = (signal: NodeJS.Signals) => {
    if (received.signal) {
      logger.warn({ signal }, 'Second signal received, exiting without cleanup');
      process.exit(signal === 'SIGINT' ? EXIT_SIGINT : EXIT_SIGTERM);
    }
    received.signal = signal;
    logger.info({ signal }, `Received ${signal}, cleaning up...`);
    controller.abort(new InterruptedError(signal));
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await orchestrator.runAll(tasks, skipped, controller.signal);
    for (const line of formatSummary(summary)) {
      console.log(line);
    }
    console.log(pc.dim(`Logs directory: ${path.resolve(options.out)}`));

    if (received.signal) {
      return received.signal === 'SIGINT' ? EXIT_SIGINT : EXIT_SIGTERM;
    }
    return exitCodeFor(summary, options.allowFailures);
  } catch (error) {
    logger.error({ err: error }, 'Run failed');
    return EXIT_TASK_FAILURES;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
