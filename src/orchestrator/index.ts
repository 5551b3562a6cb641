/**
 * Orchestrator module exports
 *
 * The orchestrator runs on the host and manages, per task:
 * - Input retrieval and build context preparation
 * - Image build and Docker volume/container lifecycle (via dockerode)
 * - Agent invocation and verification inside the task container
 * - Result persistence and the run summary
 */

export { DockerRuntime, isDockerError } from './container.js';
export { DefaultResourceFetcher, resolveReference, driveFileId } from './fetcher.js';
export { BuildContextPreparer } from './context.js';
export { ImageBuilder, LineTail } from './builder.js';
export { RuntimeResources, deriveHandle, dockerSafeName, HELPER_IMAGE } from './resources.js';
export {
  AgentInvoker,
  resolveAgentConfig,
  CREDENTIAL_PROVIDERS,
  CREDENTIAL_ENV_VARS,
  DEFAULT_AGENT_COMMAND,
} from './agent.js';
export { VerificationRunner, outcomeStatus } from './verifier.js';
export { TaskOrchestrator, classifyFailure, taskDirName } from './pipeline.js';
export { ResultStore, buildSummary, summaryRows } from './results.js';
export { MetricsCollector } from './metrics.js';
export type { ContainerRuntime } from './container.js';
export type { ResourceFetcher, FetcherOptions } from './fetcher.js';
export type { BuildContext } from './context.js';
export type { ResourceOptions, TeardownReport, ResourceState } from './resources.js';
export type { AgentSettings, CredentialProvider } from './agent.js';
export type { OrchestratorConfig, OrchestratorDeps } from './pipeline.js';
export type { RunMetrics, ComputedMetrics } from './metrics.js';
export type {
  TaskSpec,
  TaskResult,
  TaskStatus,
  TaskStage,
  RunSummary,
  SkippedRow,
  AgentConfig,
  VerificationOutcome,
} from '../types.js';
