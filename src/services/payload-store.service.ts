import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';

/** Where job payload bytes live between admission and a terminal state */
export interface PayloadStore {
  /** Returns the reference to store on the job */
  put(jobId: string, payload: Buffer): Promise<string>;
  get(ref: string): Promise<Buffer>;
  delete(ref: string): Promise<void>;
}

/** One file per job under the payload directory */
export class FilePayloadStore implements PayloadStore {
  constructor(private readonly dir: string) {}

  async put(jobId: string, payload: Buffer): Promise<string> {
    await fs.promises.mkdir(this.dir, { recursive: true });
    const file = `${jobId}.bin`;
    await fs.promises.writeFile(path.join(this.dir, file), payload);
    return file;
  }

  async get(ref: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolve(ref));
  }

  async delete(ref: string): Promise<void> {
    try {
      await fs.promises.unlink(this.resolve(ref));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      logger.warn({ error, ref }, 'Failed to delete payload');
    }
  }

  private resolve(ref: string): string {
    // Refs are bare file names; never let one escape the payload directory
    return path.join(this.dir, path.basename(ref));
  }
}

export class MemoryPayloadStore implements PayloadStore {
  private readonly payloads = new Map<string, Buffer>();

  async put(jobId: string, payload: Buffer): Promise<string> {
    this.payloads.set(jobId, payload);
    return jobId;
  }

  async get(ref: string): Promise<Buffer> {
    const payload = this.payloads.get(ref);
    if (!payload) throw new Error(`Payload not found: ${ref}`);
    return payload;
  }

  async delete(ref: string): Promise<void> {
    this.payloads.delete(ref);
  }

  has(ref: string): boolean {
    return this.payloads.has(ref);
  }
}
