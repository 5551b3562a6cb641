import * as fs from 'fs/promises';
import * as path from 'path';
import pino from 'pino';
import writeFileAtomic from 'write-file-atomic';
import { stringify } from 'csv-stringify/sync';
import { RESULT_FILE } from './artifacts.js';
import { emptyCounts } from './metrics.js';
import { RunSummary, SkippedRow, TaskResult } from '../types.js';

export const SUMMARY_JSON = 'summary.json';
export const SUMMARY_CSV = 'summary.csv';

export const SUMMARY_COLUMNS = [
  'task_id',
  'status',
  'error_kind',
  'error_detail',
  'test_exit_code',
  'duration_ms',
] as const;

export function buildSummary(results: TaskResult[], skipped: SkippedRow[], interrupted: boolean): RunSummary {
  const counts = emptyCounts();
  for (const result of results) {
    counts[result.status]++;
  }
  return {
    results,
    skipped,
    counts,
    total: results.length,
    passed: counts.tests_passed,
    interrupted,
    generatedAt: new Date().toISOString(),
  };
}

/**
 * Flatten a summary into CSV rows. Skipped rows appear with status "skipped".
 */
export function summaryRows(summary: RunSummary): string[][] {
  const rows = summary.results.map(result => [
    result.taskId,
    result.status,
    result.error?.kind ?? '',
    result.error?.message ?? '',
    result.testExitCode === undefined ? '' : String(result.testExitCode),
    String(result.durationMs),
  ]);
  for (const skip of summary.skipped) {
    rows.push([skip.taskId ?? '', 'skipped', '', `row ${skip.row}: ${skip.reason}`, '', '']);
  }
  return rows;
}

/**
 * Durable record of a run: one result.json per task, written the moment the
 * task reaches its terminal status, plus summary.json/summary.csv at the end.
 */
export class ResultStore {
  private written = new Set<string>();
  private log: pino.Logger;

  constructor(private readonly outDir: string, logger?: pino.Logger) {
    this.log = logger ?? pino({ level: 'silent' });
  }

  /**
   * @throws Error when a result for the same task was already written by this store
   */
  async writeTaskResult(taskDir: string, result: TaskResult): Promise<string> {
    if (this.written.has(result.taskId)) {
      throw new Error(`Result for task ${result.taskId} was already written`);
    }
    const resultPath = path.join(taskDir, RESULT_FILE);
    await writeFileAtomic(resultPath, JSON.stringify(result, null, 2) + '\n', { encoding: 'utf-8' });
    this.written.add(result.taskId);
    this.log.info({ taskId: result.taskId, status: result.status }, 'Task result written');
    return resultPath;
  }

  async writeSummary(summary: RunSummary): Promise<{ jsonPath: string; csvPath: string }> {
    await fs.mkdir(this.outDir, { recursive: true });
    const jsonPath = path.join(this.outDir, SUMMARY_JSON);
    const csvPath = path.join(this.outDir, SUMMARY_CSV);

    await writeFileAtomic(jsonPath, JSON.stringify(summary, null, 2) + '\n', { encoding: 'utf-8' });
    await writeFileAtomic(csvPath, stringify([[...SUMMARY_COLUMNS], ...summaryRows(summary)]), { encoding: 'utf-8' });

    this.log.info({ jsonPath, csvPath, total: summary.total, passed: summary.passed }, 'Run summary written');
    return { jsonPath, csvPath };
  }
}
