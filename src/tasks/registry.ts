/**
 * Task registry
 *
 * In-memory map of tasks backed by TaskStorage. Every durable mutation is persisted
 * before the call returns; streamed output is only kept in memory until the next save.
 */

import { Mutex } from '../shared/lock.js';
import { createLogger } from '../shared/logger.js';
import { PreconditionError } from '../shared/errors.js';
import { TaskStorage } from './persistence.js';
import {
  Task,
  TaskState,
  assertTransition,
  createTask,
  lastTaskId,
  recoverTask
} from './state.js';

const log = createLogger('registry');

export type TaskPatch = Partial<Pick<Task, 'localPath' | 'output' | 'error'>>;

export class TaskRegistry {
  private readonly lock = new Mutex();
  private counter: number;

  private constructor(
    private readonly storage: TaskStorage,
    private readonly tasks: Map<string, Task>,
    lastId: number
  ) {
    this.counter = Math.max(lastId, lastTaskId(tasks.keys()));
  }

  /**
   * Load persisted tasks. Tasks left in a running state by a previous process are reset
   * and the result is written back.
   */
  static async open(storage: TaskStorage): Promise<TaskRegistry> {
    const { tasks: loaded, lastId } = await storage.load();
    let recovered = 0;
    for (const [id, task] of loaded) {
      const next = recoverTask(task);
      if (next !== task) {
        loaded.set(id, next);
        recovered++;
      }
    }
    const registry = new TaskRegistry(storage, loaded, lastId);
    if (recovered > 0) {
      log.warn(`Reset ${recovered} interrupted task(s)`);
      await registry.save();
    }
    log.info(`Loaded ${loaded.size} task(s)`);
    return registry;
  }

  get size(): number {
    return this.tasks.size;
  }

  get(id: string): Readonly<Task> | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  /**
   * Get a task or fail with PreconditionError
   */
  require(id: string): Readonly<Task> {
    const task = this.get(id);
    if (!task) {
      throw new PreconditionError(`Task not found: ${id}`);
    }
    return task;
  }

  list(): Readonly<Task>[] {
    return [...this.tasks.values()].map(task => ({ ...task }));
  }

  async create(repoUrl: string): Promise<Readonly<Task>> {
    return this.lock.runExclusive(async () => {
      this.counter++;
      const task = createTask(String(this.counter), repoUrl);
      this.tasks.set(task.id, task);
      await this.persist();
      log.info(`Created task ${task.id} for ${repoUrl}`);
      return { ...task };
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      if (!this.tasks.delete(id)) {
        return false;
      }
      await this.persist();
      return true;
    });
  }

  /**
   * Move a task to `status`, checking the transition table
   * @throws IllegalTransitionError
   */
  async transition(id: string, status: TaskState, message: string, patch: TaskPatch = {}): Promise<Readonly<Task>> {
    return this.lock.runExclusive(async () => {
      const task = this.mustGet(id);
      assertTransition(task.status, status);
      Object.assign(task, patch, { status, message });
      await this.persist();
      return { ...task };
    });
  }

  /**
   * Change fields without changing status
   */
  async update(id: string, patch: TaskPatch & { message?: string }): Promise<Readonly<Task>> {
    return this.lock.runExclusive(async () => {
      const task = this.mustGet(id);
      Object.assign(task, patch);
      await this.persist();
      return { ...task };
    });
  }

  /**
   * Append one streamed line to a task's output. Not persisted on its own.
   */
  appendOutput(id: string, line: string): void {
    const task = this.tasks.get(id);
    if (!task) {
      return;
    }
    task.output = task.output ? `${task.output}\n${line}` : line;
  }

  async save(): Promise<boolean> {
    return this.lock.runExclusive(() => this.persist());
  }

  private mustGet(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new PreconditionError(`Task not found: ${id}`);
    }
    return task;
  }

  private persist(): Promise<boolean> {
    return this.storage.save(this.tasks.values(), this.counter);
  }
}
