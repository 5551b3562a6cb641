import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ImageBuilder, LineTail } from './builder.js';
import { BuildError, InterruptedError, OperationTimeoutError } from '../errors.js';
import { FakeRuntime } from '../test-utils/fake-runtime.js';
import type { BuildContext } from './context.js';

describe('LineTail', () => {
  it('keeps the last complete lines across chunks', () => {
    const tail = new LineTail(2);
    tail.push('one\ntw');
    tail.push('o\nthree\n');
    expect(tail.toString()).toBe('two\nthree');
  });

  it('includes a trailing partial line and skips blank ones', () => {
    const tail = new LineTail(3);
    tail.push('a\n\n\nb\nc');
    expect(tail.toString()).toBe('a\nb\nc');
  });
});

describe('ImageBuilder', () => {
  let taskDir: string;
  let context: BuildContext;
  let logPath: string;

  beforeEach(async () => {
    taskDir = await fs.mkdtemp(path.join(os.tmpdir(), 'builder-test-'));
    const dir = path.join(taskDir, 'context');
    context = { dir, descriptorPath: path.join(dir, 'Dockerfile'), vcsDir: path.join(dir, '.git') };
    logPath = path.join(taskDir, 'build.log');
  });

  afterEach(async () => {
    await fs.rm(taskDir, { recursive: true, force: true });
  });

  it('builds the image and logs the output', async () => {
    const runtime = new FakeRuntime();

    await new ImageBuilder(runtime).build(context, { imageTag: 'task-t1', useCache: true, timeoutMs: 1000, logPath });

    expect(runtime.images.has('task-t1')).toBe(true);
    const log = await fs.readFile(logPath, 'utf-8');
    expect(log.split('\n')[0]).toBe(`# docker build -t task-t1 ${context.dir}`);
    expect(log).toContain('Step 1/1 : FROM busybox\n');
    expect(log).toMatch(/# build finished in \d+ms\n$/);
  });

  it('passes --no-cache through', async () => {
    const runtime = new FakeRuntime({
      build: async (_dir, options) => {
        expect(options.noCache).toBe(true);
      },
    });

    await new ImageBuilder(runtime).build(context, { imageTag: 'task-t1', useCache: false, timeoutMs: 1000, logPath });

    expect((await fs.readFile(logPath, 'utf-8')).split('\n')[0]).toBe(`# docker build -t task-t1 --no-cache ${context.dir}`);
  });

  it('turns a failed build into build_failed with the log tail', async () => {
    const runtime = new FakeRuntime({
      build: async (_dir, options) => {
        options.onOutput?.('Step 1/2 : FROM busybox\n');
        options.onOutput?.('Step 2/2 : RUN exit 3\n');
        throw new Error("The command '/bin/sh -c exit 3' returned a non-zero code: 3");
      },
    });

    const error = await new ImageBuilder(runtime)
      .build(context, { imageTag: 'task-t1', useCache: true, timeoutMs: 1000, logPath })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BuildError);
    expect(error).toMatchObject({ status: 'build_failed', kind: 'exit' });
    const tail = error instanceof BuildError ? error.logTail.split('\n') : [];
    expect(tail.slice(-2)).toEqual([
      'Step 2/2 : RUN exit 3',
      "# build failed: The command '/bin/sh -c exit 3' returned a non-zero code: 3",
    ]);
    expect(await fs.readFile(logPath, 'utf-8')).toContain('Step 2/2 : RUN exit 3\n');
  });

  it('reports a timeout with kind timeout', async () => {
    const runtime = new FakeRuntime({
      build: async () => {
        throw new OperationTimeoutError('Build of task-t1', 50);
      },
    });

    const error = await new ImageBuilder(runtime)
      .build(context, { imageTag: 'task-t1', useCache: true, timeoutMs: 50, logPath })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ status: 'build_failed', kind: 'timeout' });
    expect(error instanceof BuildError && error.message.split('\n')[0]).toBe('Build timed out after 50ms');
  });

  it('lets an interruption through untouched', async () => {
    const interrupted = new InterruptedError('SIGINT');
    const runtime = new FakeRuntime({
      build: async () => {
        throw interrupted;
      },
    });

    await expect(
      new ImageBuilder(runtime).build(context, { imageTag: 'task-t1', useCache: true, timeoutMs: 50, logPath })
    ).rejects.toBe(interrupted);
  });
});
