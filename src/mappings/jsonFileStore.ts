/**
 * JSON File Mapping Store
 *
 * Keeps all mappings in one pretty-printed UTF-8 JSON object:
 *
 *   { "Сыр гауда 45%": { "id": "...", "name": "Сыр Гауда", "code": "00412" } }
 *
 * Writers are serialized through an in-process queue and replace the file
 * with a rename, so readers never see a half-written file.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { componentLogger } from '../utils';
import { describeError, PersistenceFailureError } from '../utils/errors';
import { normalizeMappingKey, toMappingRecords } from './normalizeKey';
import { mappingFileSchema } from './schema';
import type { LearnedMapping, LearnedMappingStore, MappingInput } from './types';

const logger = componentLogger('mappings');

type MappingFile = Record<string, LearnedMapping>;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class JsonFileMappingStore implements LearnedMappingStore {
  readonly kind = 'file';

  private queue: Promise<unknown> = Promise.resolve();
  private writes = 0;

  constructor(private readonly filePath: string) {}

  // ============================================
  // File access
  // ============================================

  private async readAll(): Promise<MappingFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new PersistenceFailureError(
        `Cannot read mappings file ${this.filePath}: ${describeError(error)}`,
        error
      );
    }

    if (!raw.trim()) {
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceFailureError(`Mappings file ${this.filePath} is not valid JSON`, error);
    }

    const result = mappingFileSchema.safeParse(json);
    if (!result.success) {
      throw new PersistenceFailureError(
        `Mappings file ${this.filePath} has an unexpected shape`,
        result.error
      );
    }

    return result.data;
  }

  private async writeAll(data: MappingFile): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${++this.writes}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceFailureError(
        `Cannot write mappings file ${this.filePath}: ${describeError(error)}`,
        error
      );
    }
  }

  /**
   * Runs read-modify-write tasks one at a time.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // The caller receives the rejection; the queue only needs to move on
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ============================================
  // LearnedMappingStore
  // ============================================

  async get(lineText: string): Promise<LearnedMapping | null> {
    const key = normalizeMappingKey(lineText);
    if (!key) {
      return null;
    }

    const data = await this.readAll();
    return data[key] ?? null;
  }

  remove(lineText: string): Promise<void> {
    const key = normalizeMappingKey(lineText);
    if (!key) {
      return Promise.resolve();
    }

    return this.exclusive(async () => {
      const data = await this.readAll();
      if (!(key in data)) return;

      delete data[key];
      await this.writeAll(data);
      logger.debug(`Mapping removed: "${key}"`);
    });
  }

  save(mappings: Readonly<Record<string, MappingInput>>): Promise<void> {
    const records = toMappingRecords(mappings);
    if (records.length === 0) {
      return Promise.resolve();
    }

    return this.exclusive(async () => {
      const data = await this.readAll();
      for (const [key, record] of records) {
        data[key] = record;
      }
      await this.writeAll(data);
      logger.debug(`Mappings saved: ${records.length}`);
    });
  }
}

export default JsonFileMappingStore;
