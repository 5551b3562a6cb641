import pino from 'pino';
import YAML from 'yaml';
import { ArtifactLog } from './artifacts.js';
import { RuntimeResources } from './resources.js';
import {
  InterruptedError,
  OperationTimeoutError,
  RunError,
  getErrorMessage,
} from '../errors.js';
import { AgentConfig, AgentRequest, ExecResult } from '../types.js';

/**
 * Provider families in probing order. The first family with a credential
 * present picks its default model.
 */
export interface CredentialProvider {
  provider: string;
  envVars: readonly string[];
  model: string;
}

export const CREDENTIAL_PROVIDERS: readonly CredentialProvider[] = [
  { provider: 'google', envVars: ['GOOGLE_API_KEY', 'GOOGLE_AI_API_KEY', 'GEMINI_API_KEY'], model: 'gemini-1.5-pro-latest' },
  { provider: 'openai', envVars: ['OPENAI_API_KEY'], model: 'gpt-4o' },
  { provider: 'anthropic', envVars: ['ANTHROPIC_API_KEY'], model: 'claude-3-5-sonnet-20241022' },
];

export const CREDENTIAL_ENV_VARS: readonly string[] = CREDENTIAL_PROVIDERS.flatMap(p => p.envVars);

/** In-container location of the files the agent reads */
export const AGENT_DIR = '/tmp/agent';
export const REQUEST_FILE = `${AGENT_DIR}/issue.txt`;
export const AGENT_CONFIG_FILE = `${AGENT_DIR}/config.yaml`;

export const DEFAULT_AGENT_COMMAND =
  'sweagent run --config={config} --agent.model.name={model} --agent.tools.parse_function.type=thought_action';

const SYSTEM_TEMPLATE = `You are an autonomous software engineer working in a constrained terminal.
Always reason step-by-step. Start by searching the codebase to understand the current state of the project, then evaluate, propose and implement the changes needed.
Avoid interactive programs. Prefer small, targeted edits.
When the Definition of Done is satisfied:
- First run: submit
- If the tool asks to confirm or shows a review stage, then run: submit -f
Do not pass any message to submit. Stop after submission.`;

const INSTANCE_TEMPLATE = `You are working in this repository to address the following issue.
<ISSUE>
{{ problem_statement }}
</ISSUE>
Definition of Done:
- The code change addresses the issue.
If these conditions are met, run \`submit\`. If asked to confirm, run \`submit -f\`. Then stop.`;

export interface AgentSettings {
  env: Readonly<Record<string, string | undefined>>;
  extraEnv?: Readonly<Record<string, string>>;   // from --env-file, forwarded as-is
  modelName?: string;
  command?: string;
  branch?: string;
}

/**
 * Resolve model and credentials once, from an injected environment snapshot.
 *
 * @throws RunError (kind 'config') when no model is given and no credential is present
 */
export function resolveAgentConfig(settings: AgentSettings): AgentConfig {
  const merged: Record<string, string | undefined> = { ...settings.env, ...settings.extraEnv };

  const credentials: Record<string, string> = { ...settings.extraEnv };
  for (const name of CREDENTIAL_ENV_VARS) {
    const value = merged[name];
    if (value) credentials[name] = value;
  }

  let provider: string;
  let model: string;
  const explicit = settings.modelName?.trim();
  if (explicit) {
    provider = 'explicit';
    model = explicit;
  } else {
    const match = CREDENTIAL_PROVIDERS.find(p => p.envVars.some(name => Boolean(merged[name])));
    if (!match) {
      throw new RunError(
        `No model specified and none of ${CREDENTIAL_ENV_VARS.join(', ')} is set`,
        'config'
      );
    }
    provider = match.provider;
    model = match.model;
  }

  return Object.freeze({
    model,
    provider,
    credentials: Object.freeze(credentials),
    command: settings.command?.trim() || DEFAULT_AGENT_COMMAND,
    branch: settings.branch,
  });
}

/**
 * Quote a value for a POSIX shell when it contains anything beyond a safe set.
 */
export function shellQuote(value: string): string {
  if (value !== '' && /^[A-Za-z0-9_/.:=@%+,-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export interface CommandVariables {
  model: string;
  config: string;
  issue: string;
  repo: string;
}

/**
 * Fill {model}, {config}, {issue} and {repo} placeholders with quoted values.
 */
export function renderAgentCommand(template: string, vars: CommandVariables): string {
  return template.replace(/\{(model|config|issue|repo)\}/g, (_, key: keyof CommandVariables) => shellQuote(vars[key]));
}

export function renderAgentConfig(repoPath: string): string {
  return YAML.stringify({
    agent: {
      templates: {
        system_template: SYSTEM_TEMPLATE,
        instance_template: INSTANCE_TEMPLATE,
      },
      tools: {
        enable_bash_tool: true,
        submit_command: 'submit',
        parse_function: { type: 'thought_action' },
        bundles: [{ path: 'tools/registry' }, { path: 'tools/review_on_submit_m' }],
      },
    },
    env: {
      repo: { path: repoPath },
      deployment: { type: 'local' },
    },
    problem_statement: {
      type: 'text_file',
      path: REQUEST_FILE,
    },
  });
}

/**
 * Shell wrapper run inside the task container: marks the repo safe for git,
 * resets the working tree to the snapshot, then hands over to the agent.
 */
export function buildLauncherScript(agentCommand: string): string {
  return [
    'set -eu',
    'cd "$REPO_PATH"',
    'git config --global --add safe.directory "$REPO_PATH" >/dev/null 2>&1 || true',
    'git config --global user.email "agent@sandbox.invalid" >/dev/null 2>&1 || true',
    'git config --global user.name "Sandbox Agent" >/dev/null 2>&1 || true',
    'if [ -d .git ]; then',
    '  git config core.filemode false >/dev/null 2>&1 || true',
    '  git reset --hard HEAD >/dev/null 2>&1 || true',
    '  git clean -fd >/dev/null 2>&1 || true',
    'fi',
    'echo "[agent] model: $MODEL_NAME"',
    `exec ${agentCommand}`,
  ].join('\n');
}

export function buildAgentEnv(config: AgentConfig, repoPath: string): string[] {
  const env = Object.entries(config.credentials).map(([name, value]) => `${name}=${value}`);
  env.push(`MODEL_NAME=${config.model}`, `REPO_PATH=${repoPath}`, 'PYTHONUNBUFFERED=1');
  if (config.branch) {
    env.push(`AGENT_BRANCH=${config.branch}`);
  }
  return env;
}

export interface InvokeRequest {
  repoPath: string;
  request: AgentRequest;
  logPath: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs the external modification agent inside the task container.
 *
 * Credentials travel only in the exec's environment; nothing is written
 * into the image. A timeout is a run failure with kind 'timeout'.
 */
export class AgentInvoker {
  private log: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.log = logger ?? pino({ level: 'silent' });
  }

  /**
   * @throws RunError on write failure, exec failure, timeout or non-zero exit
   * @throws InterruptedError when the run is cancelled
   */
  async invoke(resources: RuntimeResources, config: AgentConfig, request: InvokeRequest): Promise<void> {
    const logFile = new ArtifactLog(request.logPath, this.log);
    const startTime = Date.now();

    try {
      logFile.write(`# agent provider=${config.provider} model=${config.model} timeout=${request.timeoutMs}ms\n`);
      this.log.info(
        { model: config.model, provider: config.provider, credentialNames: Object.keys(config.credentials) },
        'Starting agent'
      );

      try {
        await resources.putFiles(
          [
            { name: 'agent/issue.txt', content: request.request.issueDescription },
            { name: 'agent/config.yaml', content: renderAgentConfig(request.repoPath) },
          ],
          '/tmp',
          request.signal
        );
      } catch (error) {
        if (error instanceof InterruptedError) throw error;
        throw new RunError(`Failed to write agent request into container: ${getErrorMessage(error)}`);
      }

      const command = renderAgentCommand(config.command, {
        model: config.model,
        config: AGENT_CONFIG_FILE,
        issue: REQUEST_FILE,
        repo: request.repoPath,
      });

      let result: ExecResult;
      try {
        result = await resources.exec(['sh', '-c', buildLauncherScript(command)], {
          timeoutMs: request.timeoutMs,
          env: buildAgentEnv(config, request.repoPath),
          workingDir: request.repoPath,
          signal: request.signal,
          onOutput: text => logFile.write(text),
        });
      } catch (error) {
        if (error instanceof InterruptedError) {
          logFile.write(`\n# agent interrupted\n`);
          throw error;
        }
        if (error instanceof OperationTimeoutError) {
          logFile.write(`\n# agent timed out after ${request.timeoutMs}ms\n`);
          this.log.error({ timeoutMs: request.timeoutMs }, 'Agent timed out');
          throw new RunError(`Agent timed out after ${request.timeoutMs}ms`, 'timeout');
        }
        throw new RunError(`Agent invocation failed: ${getErrorMessage(error)}`, 'exec');
      }

      const duration = Date.now() - startTime;
      logFile.write(`\n# agent exited with code ${result.exitCode} after ${duration}ms\n`);
      if (result.exitCode !== 0) {
        this.log.error({ exitCode: result.exitCode, duration }, 'Agent failed');
        throw new RunError(`Agent exited with code ${result.exitCode}`, 'exit');
      }
      this.log.info({ duration }, 'Agent completed');
    } finally {
      await logFile.close();
    }
  }
}
