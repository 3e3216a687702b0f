import { once } from 'events';
import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { DirectoryNotFoundError } from '../errors';

/**
 * Where downloaded artifacts are written.
 */
export class LocalArtifactStore {
  private baseDir: string;

  constructor(baseDir: string = '.') {
    this.baseDir = baseDir;
  }

  pathFor(filename: string): string {
    return join(this.baseDir, filename);
  }

  async ensureDir(dir: string = this.baseDir): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) throw error;
    }
  }

  /**
   * Create the directory when `create` is set, otherwise require that it already exists.
   */
  async prepare(create: boolean): Promise<void> {
    if (create) {
      await this.ensureDir();
      return;
    }
    if (!(await this.directoryExists())) {
      throw new DirectoryNotFoundError(this.baseDir);
    }
  }

  async directoryExists(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.baseDir);
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Write `stream` to `fullPath`, whose directory must already exist. A partial file is
   * removed when either side fails.
   */
  async saveFile(fullPath: string, stream: Readable): Promise<string> {
    const out = createWriteStream(fullPath);
    try {
      await pipeline(stream, out);
    } catch (error: unknown) {
      if (!out.closed) await once(out, 'close');
      await fs.rm(fullPath, { force: true });
      throw error;
    }
    return fullPath;
  }
}
