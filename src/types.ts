/**
 * Terminal outcome of a task. Exactly one is assigned per task.
 */
export type TaskStatus =
  | 'download_error'
  | 'unzip_error'
  | 'build_failed'
  | 'run_failed'
  | 'tests_timeout'
  | 'tests_error'
  | 'tests_failed'
  | 'tests_passed';

/**
 * Pipeline stages, in the order a task moves through them.
 */
export type TaskStage =
  | 'START'
  | 'FETCHING'
  | 'PREPARING'
  | 'BUILDING'
  | 'PROVISIONING'
  | 'AGENT_RUNNING'
  | 'TESTING'
  | 'DONE';

export type ErrorKind =
  | 'network'
  | 'archive'
  | 'timeout'
  | 'exit'
  | 'config'
  | 'runtime'
  | 'exec'
  | 'interrupted';

export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
}

/**
 * One eligible input row. Immutable once loaded.
 */
export interface TaskSpec {
  readonly taskId: string;
  readonly gitSnapshotRef: string;
  readonly issueText: string;
  readonly buildDescriptorRef: string;
  readonly testCommand: string;
}

/**
 * Input row that never entered the pipeline.
 */
export interface SkippedRow {
  row: number;           // 1-based data row index (header excluded)
  taskId?: string;
  reason: string;
}

/**
 * Names of the per-task Docker resources, all derived from the task id.
 */
export interface RuntimeHandle {
  volumeName: string;
  containerName: string;
  helperName: string;
  imageTag: string;
}

export interface TaskArtifacts {
  buildLog: string;
  agentLog: string;
  testLog: string;
  request: string;
}

export interface TaskResult {
  taskId: string;
  status: TaskStatus;
  error?: ErrorDetail;
  stage: TaskStage;      // last stage entered
  model?: string;
  testExitCode?: number;
  artifacts: TaskArtifacts;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface RunSummary {
  results: TaskResult[];
  skipped: SkippedRow[];
  counts: Record<TaskStatus, number>;
  total: number;
  passed: number;
  interrupted: boolean;
  generatedAt: string;
}

/**
 * Captured output of a command run inside a container.
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type OutputSource = 'stdout' | 'stderr';

export interface ExecOptions {
  timeoutMs: number;
  env?: string[];          // KEY=value pairs, scoped to this exec only
  workingDir?: string;
  user?: string;
  signal?: AbortSignal;
  onOutput?: (chunk: string, source: OutputSource) => void;
}

export interface ContainerConfig {
  name: string;
  image: string;
  cmd: string[];
  binds: string[];
  user?: string;
  workingDir?: string;
}

export interface BuildImageOptions {
  tag: string;
  noCache: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
  onOutput?: (chunk: string) => void;
}

/**
 * Request handed to the modification agent.
 */
export interface AgentRequest {
  taskId: string;
  issueDescription: string;
}

/**
 * Agent settings resolved once per task from the injected environment.
 */
export interface AgentConfig {
  readonly model: string;
  readonly provider: string;
  readonly credentials: Readonly<Record<string, string>>;
  readonly command: string;
  readonly branch?: string;
}

export type VerificationOutcome =
  | { kind: 'passed' }
  | { kind: 'failed'; exitCode: number }
  | { kind: 'timeout' }
  | { kind: 'exec_error'; message: string };
