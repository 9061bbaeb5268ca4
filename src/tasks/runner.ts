/**
 * Clone/review orchestrator
 *
 * PENDING -> CLONING -> CLONED | ERROR, then CLONED -> REVIEWING -> COMPLETED | ERROR.
 * Status changes go through the registry (and are persisted there) and are published on the bus.
 */

import fs from 'fs-extra';
import path from 'path';
import { GitRepository, GitRunner, runGit } from '../shared/git.js';
import { CodeEditor, EditorFactory } from '../shared/aider.js';
import { NotificationBus } from '../shared/events.js';
import { REVIEW_REPOSITORY_PROMPT } from '../shared/prompts.js';
import { createLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { TaskRegistry, TaskPatch } from './registry.js';
import { TaskState } from './state.js';

const log = createLogger('runner');

export interface TaskRunnerDeps {
  registry: TaskRegistry;
  bus: NotificationBus;
  workDir: string;
  editorFactory: EditorFactory;
  git?: GitRunner;
}

export class TaskRunner {
  private readonly registry: TaskRegistry;
  private readonly bus: NotificationBus;
  private readonly workDir: string;
  private readonly editorFactory: EditorFactory;
  private readonly git: GitRunner;
  private readonly editors = new Map<string, CodeEditor>();

  constructor(deps: TaskRunnerDeps) {
    this.registry = deps.registry;
    this.bus = deps.bus;
    this.workDir = deps.workDir;
    this.editorFactory = deps.editorFactory;
    this.git = deps.git ?? runGit;
  }

  /**
   * Clone the task's repository, or pull if a checkout already exists
   * @returns true when the task ended in CLONED
   */
  async cloneRepo(id: string): Promise<boolean> {
    const task = this.registry.require(id);
    const target = path.join(this.workDir, task.repoName);

    await this.setStatus(id, 'cloning', `Cloning ${task.repoUrl}`, { output: '', error: '' });

    await fs.ensureDir(this.workDir);
    const existing = await fs.pathExists(path.join(target, '.git'));
    const result = existing
      ? await new GitRepository(target, this.git).pull()
      : await GitRepository.clone(task.repoUrl, target, this.workDir, this.git);

    if (result.exitCode !== 0) {
      const stderr = result.stderr;
      await this.setStatus(id, 'error', `Clone failed: ${stderr}`, { error: stderr });
      return false;
    }

    const verb = existing ? 'Updated' : 'Cloned';
    await this.setStatus(id, 'cloned', `${verb} to ${target}`, { localPath: target });
    return true;
  }

  /**
   * Run a read-only review of the checkout with the code editor
   * @returns true when the task ended in COMPLETED
   */
  async reviewRepo(id: string): Promise<boolean> {
    const task = this.registry.require(id);
    if (!task.localPath) {
      await this.fail(id, 'Review failed: repository is not cloned');
      return false;
    }

    await this.setStatus(id, 'reviewing', 'Running code review', { output: '', error: '' });

    const editor = this.editorFactory(task.localPath);
    this.editors.set(id, editor);
    try {
      const result = await editor.run(REVIEW_REPOSITORY_PROMPT, {
        autoCommit: false,
        onLine: line => {
          this.registry.appendOutput(id, line);
          this.bus.output('task', id, line);
        }
      });

      if (result.exitCode !== 0) {
        await this.setStatus(id, 'error', `Review failed with exit code ${result.exitCode}`, {
          error: result.transcript
        });
        return false;
      }
      await this.setStatus(id, 'completed', 'Review completed');
      return true;
    } finally {
      this.editors.delete(id);
    }
  }

  /**
   * Clone then review. Never rejects; unexpected errors put the task in ERROR.
   */
  async runFull(id: string): Promise<boolean> {
    try {
      const cloned = await this.cloneRepo(id);
      if (!cloned) {
        return false;
      }
      return await this.reviewRepo(id);
    } catch (error) {
      log.error(`Task ${id} failed: ${errorMessage(error)}`);
      await this.fail(id, `Task failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Stop the editor running for a task, if any
   */
  async stop(id: string): Promise<boolean> {
    const editor = this.editors.get(id);
    if (!editor) {
      return false;
    }
    await editor.stop();
    return true;
  }

  isRunning(id: string): boolean {
    return this.editors.has(id);
  }

  private async setStatus(id: string, status: TaskState, message: string, patch: TaskPatch = {}): Promise<void> {
    await this.registry.transition(id, status, message, patch);
    this.bus.status('task', id, status, message);
    log.info(`Task ${id}: ${status} - ${message}`);
  }

  /**
   * Move to ERROR unless the task is already there (or gone)
   */
  private async fail(id: string, message: string): Promise<void> {
    const task = this.registry.get(id);
    if (!task || task.status === 'error') {
      return;
    }
    try {
      await this.setStatus(id, 'error', message, { error: message });
    } catch (error) {
      log.error(`Could not record failure for task ${id}: ${errorMessage(error)}`);
    }
  }
}
