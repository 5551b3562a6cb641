import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';
import { DownloadError, getErrorMessage, interruption, throwIfAborted } from '../errors.js';

/**
 * Resolves an opaque reference to a local file.
 * Re-fetching into the same destination overwrites it.
 */
export interface ResourceFetcher {
  fetch(reference: string, destination: string, signal?: AbortSignal): Promise<string>;
}

export type ResolvedReference =
  | { kind: 'local'; path: string }
  | { kind: 'http'; url: string; drive: boolean };

export interface FetcherOptions {
  attempts?: number;         // default: 4
  timeoutMs?: number;        // per attempt, body included; default: 300000
  baseDelayMs?: number;      // default: 1000
  maxDelayMs?: number;       // default: 10000
  baseDir?: string;          // relative local paths resolve against this
  logger?: pino.Logger;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

type TransferOutcome =
  | { ok: true; body: Buffer }
  | { ok: false; reason: string };

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts,
 * whether or not `work` honours the signal itself.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// Not worth retrying: the link is private, gone or malformed
const NON_RETRYABLE_STATUS = new Set([400, 401, 403, 404, 410]);

const DRIVE_ID_PATTERNS = [
  /\/file\/d\/([A-Za-z0-9_-]{10,})/,
  /[?&]id=([A-Za-z0-9_-]{10,})/,
];

/**
 * Extract the file id from a Google Drive share link.
 */
export function driveFileId(url: string): string {
  for (const pattern of DRIVE_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match) return match[1];
  }
  throw new DownloadError(`Could not parse Drive file id from: ${url}`, 'config');
}

export function resolveReference(reference: string, baseDir = process.cwd()): ResolvedReference {
  const trimmed = reference.trim();
  if (!trimmed) {
    throw new DownloadError('Empty resource reference', 'config');
  }
  if (trimmed.startsWith('file://')) {
    return { kind: 'local', path: fileURLToPath(trimmed) };
  }
  if (/^https?:\/\//i.test(trimmed)) {
    if (trimmed.includes('drive.google.com')) {
      const id = driveFileId(trimmed);
      return {
        kind: 'http',
        url: `https://drive.google.com/uc?export=download&id=${id}&confirm=t`,
        drive: true,
      };
    }
    return { kind: 'http', url: trimmed, drive: false };
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new DownloadError(`Unsupported reference scheme: ${trimmed}`, 'config');
  }
  return { kind: 'local', path: path.resolve(baseDir, trimmed) };
}

/**
 * Fetches local paths, file:// URLs, HTTP(S) URLs and Google Drive links.
 * HTTP transfers are retried with exponential backoff; 4xx answers are not.
 * Each attempt, body included, is cut off after `timeoutMs`.
 */
export class DefaultResourceFetcher implements ResourceFetcher {
  private attempts: number;
  private timeoutMs: number;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private baseDir: string;
  private log: pino.Logger;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: FetcherOptions = {}) {
    this.attempts = options.attempts ?? 4;
    this.timeoutMs = options.timeoutMs ?? 300000;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 10000;
    this.baseDir = options.baseDir ?? process.cwd();
    this.log = options.logger ?? pino({ level: 'silent' });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async fetch(reference: string, destination: string, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const source = resolveReference(reference, this.baseDir);
    await fs.mkdir(path.dirname(destination), { recursive: true });

    if (source.kind === 'local') {
      await this.copyLocal(source.path, destination);
    } else {
      await this.download(source.url, source.drive, destination, signal);
    }

    this.log.info({ destination: path.basename(destination) }, 'Resource fetched');
    return destination;
  }

  private async copyLocal(sourcePath: string, destination: string): Promise<void> {
    try {
      await fs.copyFile(sourcePath, destination);
    } catch (error) {
      throw new DownloadError(`Cannot read ${sourcePath}: ${getErrorMessage(error)}`);
    }
    const stat = await fs.stat(destination);
    if (stat.size === 0) {
      throw new DownloadError(`Resource is empty: ${sourcePath}`);
    }
  }

  private async download(url: string, drive: boolean, destination: string, signal?: AbortSignal): Promise<void> {
    let lastError = 'unknown error';
    let timedOut = false;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      throwIfAborted(signal);
      this.log.info({ attempt, attempts: this.attempts, destination: path.basename(destination) }, 'Downloading');

      const deadline = AbortSignal.timeout(this.timeoutMs);
      const attemptSignal = signal ? AbortSignal.any([signal, deadline]) : deadline;

      let outcome: TransferOutcome;
      try {
        outcome = await untilAborted(this.transfer(url, drive, attemptSignal), attemptSignal);
      } catch (error) {
        if (signal?.aborted) throw interruption(signal);
        if (error instanceof DownloadError) throw error;
        timedOut = deadline.aborted;
        lastError = timedOut ? `timed out after ${this.timeoutMs}ms` : getErrorMessage(error);
        await this.backoff(attempt, lastError);
        continue;
      }

      if (!outcome.ok) {
        timedOut = false;
        lastError = outcome.reason;
        await this.backoff(attempt, lastError);
        continue;
      }

      await fs.writeFile(destination, outcome.body);
      return;
    }

    throw new DownloadError(
      `Failed to download after ${this.attempts} attempts: ${lastError}`,
      timedOut ? 'timeout' : 'network'
    );
  }

  /**
   * One HTTP attempt, body included. Throws DownloadError for answers that
   * retrying cannot fix.
   */
  private async transfer(url: string, drive: boolean, signal: AbortSignal): Promise<TransferOutcome> {
    const response = await this.fetchImpl(url, { signal, redirect: 'follow' });

    if (NON_RETRYABLE_STATUS.has(response.status)) {
      throw new DownloadError(`Access denied or not found (HTTP ${response.status}): ${url}`);
    }
    if (!response.ok) {
      return { ok: false, reason: `HTTP ${response.status}` };
    }
    // Drive answers private or missing files with a sign-in page
    if (drive && (response.headers.get('content-type') ?? '').includes('text/html')) {
      throw new DownloadError(`Drive returned an HTML page instead of the file; check sharing settings: ${url}`);
    }

    const body = Buffer.from(await response.arrayBuffer());
    if (body.length === 0) {
      return { ok: false, reason: 'Zero-sized download' };
    }
    return { ok: true, body };
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    if (attempt >= this.attempts) return;
    const delay = Math.min(this.baseDelayMs * Math.pow(2, attempt) + Math.random() * this.baseDelayMs, this.maxDelayMs);
    this.log.warn({ attempt, reason, delayMs: Math.round(delay) }, 'Download failed, retrying');
    await this.sleep(delay);
  }
}
