import { createWriteStream } from 'fs';
import type { WriteStream } from 'fs';
import * as path from 'path';
import pino from 'pino';
import { TaskArtifacts } from '../types.js';

/**
 * Fixed per-task directory layout. Log inspection tooling relies on these names.
 */
export const ARTIFACT_FILES = {
  buildLog: 'build.log',
  agentLog: 'agent.log',
  testLog: 'test.log',
  request: 'request.json',
} as const;

export const RESULT_FILE = 'result.json';
export const CONTEXT_DIR = 'context';
export const ARCHIVE_FILE = 'git.zip';

export function artifactPaths(taskDir: string): TaskArtifacts {
  return {
    buildLog: path.join(taskDir, ARTIFACT_FILES.buildLog),
    agentLog: path.join(taskDir, ARTIFACT_FILES.agentLog),
    testLog: path.join(taskDir, ARTIFACT_FILES.testLog),
    request: path.join(taskDir, ARTIFACT_FILES.request),
  };
}

/**
 * Append-only log file for a stage. Write failures are logged, not thrown.
 */
export class ArtifactLog {
  private stream: WriteStream;

  constructor(filePath: string, logger?: pino.Logger) {
    const log = logger ?? pino({ level: 'silent' });
    this.stream = createWriteStream(filePath, { flags: 'w' });
    this.stream.on('error', err => log.warn({ file: path.basename(filePath), err: err.message }, 'Artifact write failed'));
  }

  write(text: string): void {
    this.stream.write(text);
  }

  close(): Promise<void> {
    return new Promise(resolve => {
      this.stream.end(() => resolve());
    });
  }
}
