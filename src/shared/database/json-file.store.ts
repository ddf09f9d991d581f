/**
 * =============================================================================
 * JSON FILE STORE - Snapshot persistence
 * =============================================================================
 *
 * Reads a JSON snapshot from the first usable file in an ordered candidate
 * list and writes it back atomically (temp file + rename).
 *
 * CONSISTENCY:
 * - Writers are serialized per store with an in-process mutex
 * - Readers never see a half-written file (rename is atomic on one volume)
 * - Single-writer process only; no cross-process locking
 * =============================================================================
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { logger } from '../services/logger.service';
import { Mutex } from '../utils/mutex';
import { DataFileCorruptedError, InternalError } from '../../core/errors/AppError';
import { ErrorCode } from '../../core/constants';

/**
 * A parsed snapshot and the file it came from
 */
export interface JsonSnapshot {
  path: string;
  data: unknown;
}

export interface ReadOptions {
  /**
   * When true, a candidate that exists but does not parse is an error.
   * When false (default) it is logged and the next candidate is tried.
   */
  strict?: boolean;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileStore {
  private readonly mutex = new Mutex();

  constructor(
    private readonly name: string,
    private readonly candidates: readonly string[]
  ) {
    if (candidates.length === 0) {
      throw new Error(`${name} store needs at least one candidate path`);
    }
  }

  /**
   * File that writes go to (first candidate)
   */
  get writePath(): string {
    return this.candidates[0];
  }

  /**
   * Read the first candidate that exists and parses.
   * Returns null when no candidate yields a snapshot.
   */
  async read(options: ReadOptions = {}): Promise<JsonSnapshot | null> {
    for (const candidate of this.candidates) {
      let raw: string;
      try {
        raw = await fs.readFile(candidate, 'utf-8');
      } catch (error) {
        if (isMissingFileError(error)) continue;
        if (options.strict) {
          throw new DataFileCorruptedError(candidate, error instanceof Error ? error.message : String(error));
        }
        logger.warn(`${this.name}: cannot read candidate, skipping`, { file: candidate, error: String(error) });
        continue;
      }

      try {
        return { path: candidate, data: JSON.parse(raw) };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        if (options.strict) {
          throw new DataFileCorruptedError(candidate, reason);
        }
        logger.warn(`${this.name}: invalid JSON in candidate, skipping`, { file: candidate, error: reason });
      }
    }
    return null;
  }

  /**
   * Replace the snapshot at writePath atomically
   */
  async write(data: unknown): Promise<void> {
    await this.mutex.runExclusive(() => this.writeUnlocked(data));
  }

  /**
   * Read-modify-write under the store's mutex.
   * The updater receives the current snapshot data (null when none exists)
   * and returns the data to persist plus a result for the caller.
   */
  async update<R>(
    updater: (current: unknown) => { data: unknown; result: R }
  ): Promise<R> {
    return this.mutex.runExclusive(async () => {
      const snapshot = await this.read({ strict: true });
      const { data, result } = updater(snapshot ? snapshot.data : null);
      await this.writeUnlocked(data);
      return result;
    });
  }

  private async writeUnlocked(data: unknown): Promise<void> {
    const target = this.writePath;
    const tmp = `${target}.tmp`;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tmp, target);
      logger.debug(`${this.name}: snapshot written`, { file: target });
    } catch (error) {
      logger.error(`${this.name}: failed to write snapshot`, {
        file: target,
        error: error instanceof Error ? error.message : String(error)
      });
      await fs.rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(`${this.name}: could not remove temp file`, { file: tmp, error: String(cleanupError) });
      });
      throw new InternalError('Failed to save data', ErrorCode.STORAGE_ERROR, { store: this.name });
    }
  }
}
