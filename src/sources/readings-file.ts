/**
 * Readings File
 *
 * Loads host sensor states from a JSON file and watches it for changes.
 * The file maps sensor ids to `{ state, unit?, lastUpdated? }`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { READINGS_WATCH_DEBOUNCE_MS } from '../constants';
import { ComfortAdvisorError } from '../engine/errors';
import { ReadingsFileSchema, safeValidateData, type ReadingsFile } from '../config/config-schemas';

export type ReadingsFileFailure = 'not_found' | 'unreadable' | 'invalid_json' | 'invalid_format';

export class ReadingsFileError extends ComfortAdvisorError {
    readonly code = 'readings_file';

    constructor(
        readonly reason: ReadingsFileFailure,
        readonly filePath: string,
        detail: string,
        readonly cause?: Error,
    ) {
        super(`Readings file ${filePath}: ${detail}`);
    }
}

export interface ReadingSource {
    read(): Promise<ReadingsFile>;
    watch(onChange: () => void): void;
    close(): void;
}

export class FileReadingSource implements ReadingSource {
  private watcher: fs.FSWatcher | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly filePath: string,
    private readonly debounceMs: number = READINGS_WATCH_DEBOUNCE_MS,
  ) {}

  async read(): Promise<ReadingsFile> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const notFound = 'code' in cause && cause.code === 'ENOENT';
      throw new ReadingsFileError(notFound ? 'not_found' : 'unreadable', this.filePath, notFound ? 'file not found' : cause.message, cause);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ReadingsFileError('invalid_json', this.filePath, `invalid JSON (${cause.message})`, cause);
    }

    const result = safeValidateData(ReadingsFileSchema, data);
    if (!result.success) {
      throw new ReadingsFileError('invalid_format', this.filePath, result.error);
    }
    return result.data;
  }

  /**
     * Call onChange after the file is written, replaced or created.
     * The directory is watched so editors that replace the file are seen.
     */
  watch(onChange: () => void): void {
    this.close();

    const fileName = path.basename(this.filePath);
    this.watcher = fs.watch(path.dirname(this.filePath), (_event, changed) => {
      if (changed !== null && changed.toString() !== fileName) {
        return;
      }
      if (this.debounceTimer) {
        clearTimeout(this.debounceTimer);
      }
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = null;
        onChange();
      }, this.debounceMs);
    });
  }

  close(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }
}
