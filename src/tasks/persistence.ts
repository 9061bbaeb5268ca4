/**
 * Task persistence
 *
 * All tasks live in one document named "tasks" in the JSON store.
 */

import { JsonStore } from '../shared/storage.js';
import { createLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import {
  DecodedTaskDocument,
  OUTPUT_LIMIT,
  Task,
  buildTaskDocument,
  decodeTaskDocument
} from './state.js';

const log = createLogger('tasks');

export const TASK_DOCUMENT_NAME = 'tasks';

export class TaskStorage {
  constructor(
    private readonly store: JsonStore,
    private readonly outputLimit = OUTPUT_LIMIT
  ) {}

  /**
   * Load every persisted task. A missing, unreadable or unsupported document yields no tasks.
   */
  async load(): Promise<DecodedTaskDocument> {
    const raw = await this.store.load(TASK_DOCUMENT_NAME, null);
    if (raw === null) {
      return { tasks: new Map(), lastId: 0 };
    }
    try {
      return decodeTaskDocument(raw);
    } catch (error) {
      log.error(`Ignoring task document: ${errorMessage(error)}`);
      return { tasks: new Map(), lastId: 0 };
    }
  }

  /**
   * Write every task together with the id counter, so deleted ids stay allocated
   */
  save(tasks: Iterable<Task>, lastId: number): Promise<boolean> {
    return this.store.save(TASK_DOCUMENT_NAME, buildTaskDocument(tasks, lastId, this.outputLimit));
  }
}
