import { promises as fs } from 'fs';
import path from 'path';

import { errorCode } from '@retry-rounds/errors';

import type { DeletableStore } from './store-deleter.js';

/**
 * A directory on disk whose top-level entries are the components. The
 * directory itself is removed once it is empty.
 */
export class DirectoryStore implements DeletableStore {
  constructor(public readonly locator: string) {}

  async exists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.locator);
      return stats.isDirectory();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async listComponents(): Promise<string[]> {
    const entries = await fs.readdir(this.locator);
    return [...entries.sort(), '.'];
  }

  async deleteComponent(name: string): Promise<void> {
    if (name === '.') {
      await fs.rmdir(this.locator);
      return;
    }
    await fs.rm(path.join(this.locator, name), { recursive: true, force: true });
  }
}
