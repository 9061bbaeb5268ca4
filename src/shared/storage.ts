/**
 * JSON document store
 *
 * Each document lives in <dataDir>/<name>.json. Writes go to <name>.tmp first and are
 * renamed into place, so a reader sees either the old document or the new one and a
 * crash mid-write leaves the old one on disk.
 */

import fs from 'fs-extra';
import path from 'path';
import { Mutex } from './lock.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('storage');

const DOCUMENT_EXT = '.json';
const TEMP_EXT = '.tmp';

export class JsonStore {
  private readonly lock = new Mutex();

  constructor(readonly dataDir: string) {}

  private documentPath(name: string): string {
    return path.join(this.dataDir, `${name}${DOCUMENT_EXT}`);
  }

  private tempPath(name: string): string {
    return path.join(this.dataDir, `${name}${TEMP_EXT}`);
  }

  /**
   * Write a document atomically
   * @returns false if the document could not be written
   */
  async save(name: string, data: unknown): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      try {
        const content = JSON.stringify(data, null, 2);
        if (content === undefined) {
          throw new Error('document is not serializable');
        }
        await fs.ensureDir(this.dataDir);
        const tempPath = this.tempPath(name);
        await fs.writeFile(tempPath, content, 'utf-8');
        await fs.rename(tempPath, this.documentPath(name));
        return true;
      } catch (error) {
        log.error(`Failed to save ${name}: ${errorMessage(error)}`);
        return false;
      }
    });
  }

  /**
   * Read a document, or `fallback` when it is missing or unreadable
   */
  async load(name: string, fallback: unknown = null): Promise<unknown> {
    return this.lock.runExclusive(async () => {
      const filePath = this.documentPath(name);
      try {
        if (!(await fs.pathExists(filePath))) {
          return fallback;
        }
        const content = await fs.readFile(filePath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        return parsed;
      } catch (error) {
        log.error(`Failed to load ${name}: ${errorMessage(error)}`);
        return fallback;
      }
    });
  }

  async delete(name: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      try {
        await fs.remove(this.documentPath(name));
        return true;
      } catch (error) {
        log.error(`Failed to delete ${name}: ${errorMessage(error)}`);
        return false;
      }
    });
  }

  async exists(name: string): Promise<boolean> {
    return this.lock.runExclusive(() => fs.pathExists(this.documentPath(name)));
  }

  /**
   * Names of every stored document (temp files excluded)
   */
  async list(): Promise<Set<string>> {
    return this.lock.runExclusive(async () => {
      try {
        if (!(await fs.pathExists(this.dataDir))) {
          return new Set<string>();
        }
        const entries = await fs.readdir(this.dataDir);
        return new Set(
          entries
            .filter(entry => entry.endsWith(DOCUMENT_EXT))
            .map(entry => entry.slice(0, -DOCUMENT_EXT.length))
        );
      } catch (error) {
        log.error(`Failed to list documents: ${errorMessage(error)}`);
        return new Set<string>();
      }
    });
  }
}
