import { randomUUID } from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { StorageError } from '../../lib/errors';
import { ObjectStorage } from './object-storage';

/**
 * Filesystem storage rooted at one directory. Writes land in a temp file next
 * to the destination and are renamed into place, so readers never see a
 * partially written object.
 */
export class LocalObjectStorage implements ObjectStorage {
  readonly name = 'local';
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async put(key: string, bytes: Buffer, _contentType?: string): Promise<string> {
    const destination = this.resolveKey(key);
    const tmpPath = `${destination}.${randomUUID()}.tmp`;
    try {
      await fs.ensureDir(path.dirname(destination));
      await fs.writeFile(tmpPath, bytes);
      await fs.rename(tmpPath, destination);
      return key;
    } catch (error) {
      await fs.remove(tmpPath).catch(() => undefined);
      throw new StorageError(`Failed to write ${key}`, key, error instanceof Error ? error : undefined);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    const filePath = this.resolveKey(key);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new StorageError(`Failed to read ${key}`, key, error instanceof Error ? error : undefined);
    }
  }

  async delete(key: string): Promise<void> {
    await fs.remove(this.resolveKey(key));
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.root, key);
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new StorageError(`Key escapes the storage root: ${key}`, key);
    }
    return resolved;
  }
}
