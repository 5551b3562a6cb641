/**
 * Run metrics collection for tracking batch outcomes
 *
 * In-memory per-status counters and durations for one process run.
 */

import { TaskStatus } from '../types.js';

export interface RunMetrics {
  totalTasks: number;
  skippedRows: number;
  counts: Record<TaskStatus, number>;
  totalDurationMs: number;
}

export interface ComputedMetrics extends RunMetrics {
  passRate: number;       // tests_passed / totalTasks (0-1)
  failureRate: number;    // everything else / totalTasks (0-1)
  avgDurationMs: number;
}

export function emptyCounts(): Record<TaskStatus, number> {
  return {
    download_error: 0,
    unzip_error: 0,
    build_failed: 0,
    run_failed: 0,
    tests_timeout: 0,
    tests_error: 0,
    tests_failed: 0,
    tests_passed: 0,
  };
}

/**
 * In-memory metrics collector for task runs
 *
 * No persistence: the summary file is the durable record; these numbers are
 * for the end-of-run log line.
 */
export class MetricsCollector {
  private metrics: RunMetrics;

  constructor() {
    this.metrics = this.initial();
  }

  recordTask(status: TaskStatus, durationMs: number): void {
    this.metrics.totalTasks++;
    this.metrics.totalDurationMs += durationMs;
    this.metrics.counts[status]++;
  }

  recordSkipped(count = 1): void {
    this.metrics.skippedRows += count;
  }

  /**
   * All computed values return 0 if no tasks recorded.
   */
  getMetrics(): ComputedMetrics {
    const { totalTasks } = this.metrics;
    const passed = this.metrics.counts.tests_passed;

    return {
      ...this.metrics,
      counts: { ...this.metrics.counts },
      passRate: totalTasks > 0 ? passed / totalTasks : 0,
      failureRate: totalTasks > 0 ? (totalTasks - passed) / totalTasks : 0,
      avgDurationMs: totalTasks > 0 ? this.metrics.totalDurationMs / totalTasks : 0,
    };
  }

  reset(): void {
    this.metrics = this.initial();
  }

  private initial(): RunMetrics {
    return {
      totalTasks: 0,
      skippedRows: 0,
      counts: emptyCounts(),
      totalDurationMs: 0,
    };
  }
}
