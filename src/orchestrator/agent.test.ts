import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import {
  AgentInvoker,
  DEFAULT_AGENT_COMMAND,
  buildAgentEnv,
  buildLauncherScript,
  renderAgentCommand,
  renderAgentConfig,
  resolveAgentConfig,
  shellQuote,
} from './agent.js';
import { RuntimeResources, deriveHandle } from './resources.js';
import { InterruptedError, OperationTimeoutError, RunError } from '../errors.js';
import { FakeRuntime, commandText, type ExecCall } from '../test-utils/fake-runtime.js';
import type { ExecResult } from '../types.js';

describe('resolveAgentConfig', () => {
  it('picks the default model of the first provider with a credential', () => {
    const config = resolveAgentConfig({ env: { OPENAI_API_KEY: 'test-openai', PATH: '/usr/bin' } });

    expect(config.model).toBe('gpt-4o');
    expect(config.provider).toBe('openai');
    expect(config.credentials).toEqual({ OPENAI_API_KEY: 'test-openai' });
    expect(config.command).toBe(DEFAULT_AGENT_COMMAND);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('tries providers in order', () => {
    const config = resolveAgentConfig({
      env: { ANTHROPIC_API_KEY: 'test-anthropic', GEMINI_API_KEY: 'test-gemini' },
    });

    expect(config.model).toBe('gemini-1.5-pro-latest');
    expect(config.credentials).toEqual({ GEMINI_API_KEY: 'test-gemini', ANTHROPIC_API_KEY: 'test-anthropic' });
  });

  it('lets an explicit model win', () => {
    const config = resolveAgentConfig({ env: { OPENAI_API_KEY: 'test-openai' }, modelName: ' my-model ' });

    expect(config.model).toBe('my-model');
    expect(config.provider).toBe('explicit');
  });

  it('fails with a config error when nothing identifies a model', () => {
    const error = (() => {
      try {
        resolveAgentConfig({ env: { OPENAI_API_KEY: '' } });
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(RunError);
    expect(error).toMatchObject({ status: 'run_failed', kind: 'config' });
  });

  it('forwards env-file entries and reads credentials from them', () => {
    const config = resolveAgentConfig({
      env: {},
      extraEnv: { OPENAI_API_KEY: 'test-openai', HTTP_PROXY: 'http://proxy.invalid:3128' },
      branch: 'experimental',
      command: 'my-agent {issue}',
    });

    expect(config.model).toBe('gpt-4o');
    expect(config.credentials).toEqual({ OPENAI_API_KEY: 'test-openai', HTTP_PROXY: 'http://proxy.invalid:3128' });
    expect(config.branch).toBe('experimental');
    expect(config.command).toBe('my-agent {issue}');
  });
});

describe('command rendering', () => {
  it('quotes only values that need it', () => {
    expect(shellQuote('gpt-4o')).toBe('gpt-4o');
    expect(shellQuote('two words')).toBe("'two words'");
    expect(shellQuote("it's")).toBe(`'it'"'"'s'`);
    expect(shellQuote('')).toBe("''");
  });

  it('fills the default template', () => {
    expect(
      renderAgentCommand(DEFAULT_AGENT_COMMAND, {
        model: 'gpt-4o',
        config: '/tmp/agent/config.yaml',
        issue: '/tmp/agent/issue.txt',
        repo: '/repo',
      })
    ).toBe(
      'sweagent run --config=/tmp/agent/config.yaml --agent.model.name=gpt-4o --agent.tools.parse_function.type=thought_action'
    );
  });

  it('leaves unknown placeholders alone', () => {
    expect(renderAgentCommand('run {repo} {other}', { model: 'm', config: 'c', issue: 'i', repo: '/my repo' })).toBe(
      "run '/my repo' {other}"
    );
  });

  it('points the agent config at the request file and the repository', () => {
    const config = YAML.parse(renderAgentConfig('/workspace'));

    expect(config.env.repo.path).toBe('/workspace');
    expect(config.problem_statement).toEqual({ type: 'text_file', path: '/tmp/agent/issue.txt' });
  });

  it('ends the launcher with the agent command', () => {
    const lines = buildLauncherScript('my-agent --go').split('\n');
    expect(lines[0]).toBe('set -eu');
    expect(lines[lines.length - 1]).toBe('exec my-agent --go');
  });

  it('builds the exec environment', () => {
    const config = resolveAgentConfig({ env: { OPENAI_API_KEY: 'test-openai' }, branch: 'v2' });
    expect(buildAgentEnv(config, '/repo')).toEqual([
      'OPENAI_API_KEY=test-openai',
      'MODEL_NAME=gpt-4o',
      'REPO_PATH=/repo',
      'PYTHONUNBUFFERED=1',
      'AGENT_BRANCH=v2',
    ]);
  });
});

describe('AgentInvoker', () => {
  let taskDir: string;
  let logPath: string;
  const config = resolveAgentConfig({ env: { OPENAI_API_KEY: 'test-openai' } });
  const request = { taskId: 't1', issueDescription: 'Handle empty input in parse()' };

  beforeEach(async () => {
    taskDir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-test-'));
    logPath = path.join(taskDir, 'agent.log');
  });

  afterEach(async () => {
    await fs.rm(taskDir, { recursive: true, force: true });
  });

  async function started(exec: (call: ExecCall) => Promise<ExecResult>): Promise<{ runtime: FakeRuntime; resources: RuntimeResources }> {
    const runtime = new FakeRuntime({ exec });
    const handle = deriveHandle('t1');
    runtime.images.add(handle.imageTag);
    await runtime.createContainer({ name: handle.containerName, image: handle.imageTag, cmd: ['sleep', 'infinity'], binds: [] });
    await runtime.startContainer(handle.containerName);
    return { runtime, resources: new RuntimeResources(runtime, handle, { repoPath: '/repo', keep: false }) };
  }

  function invoke(resources: RuntimeResources, signal?: AbortSignal): Promise<void> {
    return new AgentInvoker().invoke(resources, config, { repoPath: '/repo', request, logPath, timeoutMs: 1000, signal });
  }

  it('writes the request into the container and runs the agent with its credentials', async () => {
    const { runtime, resources } = await started(async () => ({ stdout: 'submitted\n', stderr: '', exitCode: 0 }));

    await invoke(resources);

    const upload = runtime.archives[0];
    expect(upload.targetPath).toBe('/tmp');
    expect(upload.entries.find(e => e.name === 'agent/issue.txt')?.content).toBe('Handle empty input in parse()');
    expect(upload.entries.some(e => e.name === 'agent/config.yaml')).toBe(true);

    const call = runtime.execs[0];
    expect(call.command.slice(0, 2)).toEqual(['sh', '-c']);
    expect(commandText(call)).toContain('exec sweagent run --config=/tmp/agent/config.yaml --agent.model.name=gpt-4o');
    expect(call.options.env).toContain('OPENAI_API_KEY=test-openai');
    expect(call.options.timeoutMs).toBe(1000);

    const log = await fs.readFile(logPath, 'utf-8');
    expect(log.split('\n')[0]).toBe('# agent provider=openai model=gpt-4o timeout=1000ms');
    expect(log).toContain('submitted\n');
  });

  it('treats a non-zero exit as run_failed', async () => {
    const { resources } = await started(async () => ({ stdout: '', stderr: 'boom\n', exitCode: 2 }));

    const error = await invoke(resources).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RunError);
    expect(error).toMatchObject({ kind: 'exit', message: 'Agent exited with code 2' });
    expect(await fs.readFile(logPath, 'utf-8')).toContain('boom\n');
  });

  it('reports a timeout with kind timeout', async () => {
    const { resources } = await started(async () => {
      throw new OperationTimeoutError('Command sh', 1000);
    });

    await expect(invoke(resources)).rejects.toMatchObject({
      status: 'run_failed',
      kind: 'timeout',
      message: 'Agent timed out after 1000ms',
    });
    expect(await fs.readFile(logPath, 'utf-8')).toContain('# agent timed out after 1000ms');
  });

  it('reports exec failures with kind exec', async () => {
    const { resources } = await started(async () => {
      throw new Error('connection reset');
    });

    await expect(invoke(resources)).rejects.toMatchObject({
      kind: 'exec',
      message: 'Agent invocation failed: connection reset',
    });
  });

  it('lets an interruption through', async () => {
    const interrupted = new InterruptedError('SIGINT');
    const { resources } = await started(async () => {
      throw interrupted;
    });

    await expect(invoke(resources)).rejects.toBe(interrupted);
  });

  it('lets an interruption during the request upload through', async () => {
    const interrupted = new InterruptedError('SIGTERM');
    const { runtime, resources } = await started(async () => ({ stdout: '', stderr: '', exitCode: 0 }));
    vi.spyOn(resources, 'putFiles').mockRejectedValueOnce(interrupted);

    await expect(invoke(resources)).rejects.toBe(interrupted);
    expect(runtime.execs).toHaveLength(0);
  });
});
