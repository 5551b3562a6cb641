import * as fs from 'fs/promises';
import * as path from 'path';
import AdmZip from 'adm-zip';
import pino from 'pino';
import writeFileAtomic from 'write-file-atomic';
import { UnzipError, getErrorMessage } from '../errors.js';
import { AgentRequest } from '../types.js';

export const DESCRIPTOR_NAME = 'Dockerfile';
export const VCS_DIR = '.git';

// Archive tools add these next to the real content
const IGNORED_TOP_LEVEL = new Set(['__MACOSX']);

/**
 * Directory handed to the image build: one descriptor, one .git directory.
 */
export interface BuildContext {
  dir: string;
  descriptorPath: string;
  vcsDir: string;
}

export interface PrepareInput {
  descriptorPath: string;   // already placed inside the context directory
  archivePath: string;
  request: AgentRequest;
  requestPath: string;      // side artifact, outside the context
}

function isWithin(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Unpacks a version-control snapshot next to its build descriptor and checks
 * that `.git` ends up at the context root.
 */
export class BuildContextPreparer {
  private log: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.log = logger ?? pino({ level: 'silent' });
  }

  async prepare(input: PrepareInput): Promise<BuildContext> {
    const dir = path.dirname(input.descriptorPath);

    await writeFileAtomic(
      input.requestPath,
      JSON.stringify({ task_id: input.request.taskId, issue_description: input.request.issueDescription }, null, 2) + '\n',
      { encoding: 'utf-8' }
    );

    this.unpack(input.archivePath, dir);

    const vcsDir = path.join(dir, VCS_DIR);
    if (!(await isDirectory(vcsDir))) {
      const wrapper = await this.findWrappedVcsDir(dir);
      if (wrapper) {
        throw new UnzipError(
          `Archive wraps ${VCS_DIR} one level too deep (found ${wrapper}/${VCS_DIR}); ` +
          `${VCS_DIR} must sit at the archive root`
        );
      }
      throw new UnzipError(`No ${VCS_DIR} folder found after unzip`);
    }

    this.log.info({ contextDir: dir }, 'Build context prepared');
    return { dir, descriptorPath: input.descriptorPath, vcsDir };
  }

  private unpack(archivePath: string, dir: string): void {
    let zip: AdmZip;
    try {
      zip = new AdmZip(archivePath);
    } catch (error) {
      throw new UnzipError(`Cannot open archive ${path.basename(archivePath)}: ${getErrorMessage(error)}`);
    }

    const entries = zip.getEntries();
    for (const entry of entries) {
      const target = path.resolve(dir, entry.entryName);
      if (!isWithin(dir, target)) {
        throw new UnzipError(`Zip member escapes destination directory: ${entry.entryName}`);
      }
      if (path.relative(dir, target) === DESCRIPTOR_NAME) {
        throw new UnzipError(`Archive contains a top-level ${DESCRIPTOR_NAME} that would replace the build descriptor`);
      }
    }

    try {
      zip.extractAllTo(dir, true);
    } catch (error) {
      throw new UnzipError(`Failed to extract ${path.basename(archivePath)}: ${getErrorMessage(error)}`);
    }
    this.log.info({ entries: entries.length }, 'Archive extracted');
  }

  private async findWrappedVcsDir(dir: string): Promise<string | null> {
    const children = await fs.readdir(dir, { withFileTypes: true });
    for (const child of children) {
      if (!child.isDirectory() || IGNORED_TOP_LEVEL.has(child.name)) continue;
      if (await isDirectory(path.join(dir, child.name, VCS_DIR))) {
        return child.name;
      }
    }
    return null;
  }
}
