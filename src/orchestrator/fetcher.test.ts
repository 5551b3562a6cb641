import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { DefaultResourceFetcher, driveFileId, resolveReference } from './fetcher.js';
import { DownloadError, InterruptedError } from '../errors.js';

const DRIVE_ID = '1AbCdEfGhIjKlMnOp';

describe('resolveReference', () => {
  it('resolves relative paths against the base directory', () => {
    expect(resolveReference('inputs/repo.zip', '/data')).toEqual({ kind: 'local', path: '/data/inputs/repo.zip' });
  });

  it('accepts absolute paths and file URLs', () => {
    expect(resolveReference('/srv/Dockerfile', '/data')).toEqual({ kind: 'local', path: '/srv/Dockerfile' });
    expect(resolveReference('file:///srv/Dockerfile')).toEqual({ kind: 'local', path: '/srv/Dockerfile' });
  });

  it('rewrites Drive share links to direct downloads', () => {
    expect(resolveReference(`https://drive.google.com/file/d/${DRIVE_ID}/view?usp=sharing`)).toEqual({
      kind: 'http',
      url: `https://drive.google.com/uc?export=download&id=${DRIVE_ID}&confirm=t`,
      drive: true,
    });
  });

  it('keeps plain HTTP URLs', () => {
    expect(resolveReference('https://example.com/repo.zip')).toEqual({
      kind: 'http',
      url: 'https://example.com/repo.zip',
      drive: false,
    });
  });

  it('rejects empty references and unknown schemes', () => {
    expect(() => resolveReference('  ')).toThrow('Empty resource reference');
    expect(() => resolveReference('s3://bucket/repo.zip')).toThrow('Unsupported reference scheme: s3://bucket/repo.zip');
  });
});

describe('driveFileId', () => {
  it('reads ids from both link shapes', () => {
    expect(driveFileId(`https://drive.google.com/file/d/${DRIVE_ID}/view`)).toBe(DRIVE_ID);
    expect(driveFileId(`https://drive.google.com/open?id=${DRIVE_ID}`)).toBe(DRIVE_ID);
  });

  it('fails on links without an id', () => {
    expect(() => driveFileId('https://drive.google.com/drive/my-drive')).toThrow(DownloadError);
  });
});

describe('DefaultResourceFetcher', () => {
  let workDir: string;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetcher-test-'));
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  function fetcherWith(fetchImpl: typeof fetch): DefaultResourceFetcher {
    return new DefaultResourceFetcher({ baseDir: workDir, fetchImpl, sleep });
  }

  it('copies a local file relative to the base directory', async () => {
    await fs.writeFile(path.join(workDir, 'Dockerfile'), 'FROM busybox\n');
    const destination = path.join(workDir, 'out', 'context', 'Dockerfile');

    const result = await fetcherWith(vi.fn<typeof fetch>()).fetch('Dockerfile', destination);

    expect(result).toBe(destination);
    expect(await fs.readFile(destination, 'utf-8')).toBe('FROM busybox\n');
  });

  it('copies a file URL', async () => {
    const source = path.join(workDir, 'repo.zip');
    await fs.writeFile(source, 'zip-bytes');
    const destination = path.join(workDir, 'copy.zip');

    await fetcherWith(vi.fn<typeof fetch>()).fetch(pathToFileURL(source).href, destination);

    expect(await fs.readFile(destination, 'utf-8')).toBe('zip-bytes');
  });

  it('rejects missing and empty local files', async () => {
    await fs.writeFile(path.join(workDir, 'empty.zip'), '');
    const fetcher = fetcherWith(vi.fn<typeof fetch>());

    await expect(fetcher.fetch('missing.zip', path.join(workDir, 'a.zip'))).rejects.toThrow(DownloadError);
    await expect(fetcher.fetch('empty.zip', path.join(workDir, 'b.zip'))).rejects.toThrow(
      `Resource is empty: ${path.join(workDir, 'empty.zip')}`
    );
  });

  it('retries transient HTTP failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('payload'));
    const destination = path.join(workDir, 'repo.zip');

    await fetcherWith(fetchImpl).fetch('https://example.com/repo.zip', destination);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(await fs.readFile(destination, 'utf-8')).toBe('payload');
  });

  it('retries zero-sized downloads', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(''))
      .mockResolvedValueOnce(new Response('payload'));

    await fetcherWith(fetchImpl).fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'));

    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('does not retry access errors', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('gone', { status: 404 }));

    await expect(
      fetcherWith(fetchImpl).fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'))
    ).rejects.toThrow('Access denied or not found (HTTP 404): https://example.com/repo.zip');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after four attempts', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => new Response('oops', { status: 500 }));

    const error = await fetcherWith(fetchImpl)
      .fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({
      status: 'download_error',
      kind: 'network',
      message: 'Failed to download after 4 attempts: HTTP 500',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('treats an HTML answer from Drive as an error', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('<html>Sign in</html>', { headers: { 'content-type': 'text/html; charset=utf-8' } })
    );

    await expect(
      fetcherWith(fetchImpl).fetch(`https://drive.google.com/file/d/${DRIVE_ID}/view`, path.join(workDir, 'repo.zip'))
    ).rejects.toThrow(/Drive returned an HTML page/);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('cuts off a stalled transfer and retries it', async () => {
    // Never settles unless the request signal aborts
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      })
    );
    const fetcher = new DefaultResourceFetcher({ baseDir: workDir, fetchImpl, sleep, attempts: 2, timeoutMs: 20 });

    const error = await fetcher
      .fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({
      kind: 'timeout',
      message: 'Failed to download after 2 attempts: timed out after 20ms',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('times out even when the transport ignores the signal', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(() => new Promise<Response>(() => undefined));
    const fetcher = new DefaultResourceFetcher({ baseDir: workDir, fetchImpl, sleep, attempts: 1, timeoutMs: 20 });

    await expect(
      fetcher.fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'))
    ).rejects.toMatchObject({ kind: 'timeout' });
  });

  it('reports an interrupt while the body is read as an interruption', async () => {
    const controller = new AbortController();
    // Headers arrive, the body never finishes
    const stalledBody = new ReadableStream<Uint8Array>({
      start(streamController) {
        streamController.enqueue(new TextEncoder().encode('partial'));
      },
    });
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => {
      setTimeout(() => controller.abort(new InterruptedError('SIGINT')), 10);
      return new Response(stalledBody);
    });

    const error = await fetcherWith(fetchImpl)
      .fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'), controller.signal)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InterruptedError);
    expect(error).toMatchObject({ message: 'Interrupted by SIGINT' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('stops when the run is cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new InterruptedError('SIGTERM'));
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(
      fetcherWith(fetchImpl).fetch('https://example.com/repo.zip', path.join(workDir, 'repo.zip'), controller.signal)
    ).rejects.toThrow('Interrupted by SIGTERM');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
