import { promises as fs } from 'fs';
import path from 'path';

import { errorCode } from '@retry-rounds/errors';

import { formatJson, formatText } from '../format.js';
import type { FileTransportConfig, LogEntry, LogTransport } from '../types.js';

const DEFAULT_MAX_SIZE_BYTES = 50 * 1024 * 1024;

/**
 * File transport for logging to files with rotation support.
 * Entries are appended one after another in call order.
 */
export class FileTransport implements LogTransport {
  public readonly name = 'file';
  private readonly config: Required<FileTransportConfig>;
  private pending: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(config: FileTransportConfig) {
    this.config = {
      maxSizeBytes: DEFAULT_MAX_SIZE_BYTES,
      maxFiles: 5,
      format: 'text',
      ...config,
    };
  }

  log(entry: LogEntry): Promise<void> {
    const write = this.pending.then(() => this.append(entry));
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.pending = write.catch(() => undefined);
    return write;
  }

  async close(): Promise<void> {
    await this.pending;
  }

  private async append(entry: LogEntry): Promise<void> {
    if (!this.directoryReady) {
      await fs.mkdir(path.dirname(this.config.filename), { recursive: true });
      this.directoryReady = true;
    }

    if (await this.needsRotation()) {
      await this.rotateLogFile();
    }

    const line = this.config.format === 'json' ? formatJson(entry) : formatText(entry);
    await fs.appendFile(this.config.filename, `${line}\n`);
  }

  private async needsRotation(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.config.filename);
      return stats.size >= this.config.maxSizeBytes;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private async rotateLogFile(): Promise<void> {
    const { filename, maxFiles } = this.config;

    await this.removeIfPresent(`${filename}.${maxFiles}`);

    for (let i = maxFiles - 1; i >= 1; i--) {
      await this.renameIfPresent(`${filename}.${i}`, `${filename}.${i + 1}`);
    }

    await this.renameIfPresent(filename, `${filename}.1`);
  }

  private async removeIfPresent(file: string): Promise<void> {
    try {
      await fs.unlink(file);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  private async renameIfPresent(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}
