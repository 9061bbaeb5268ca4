/**
 * Remediation service
 *
 * Facade over the registry, the clone/review runner, triage and fix attempts.
 * Requests are validated before anything runs; a rejected request throws PreconditionError
 * synchronously. Long operations run in the background and are tracked until they settle.
 */

import { JsonStore } from '../shared/storage.js';
import { NotificationBus } from '../shared/events.js';
import { AiderRunner, EditorFactory } from '../shared/aider.js';
import { GitHubClient, PlatformClient } from '../shared/github.js';
import { GitRunner } from '../shared/git.js';
import { EngineConfig } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import { PreconditionError, errorMessage } from '../shared/errors.js';
import { TaskStorage } from '../tasks/persistence.js';
import { TaskRegistry } from '../tasks/registry.js';
import { TaskRunner } from '../tasks/runner.js';
import { IN_FLIGHT_STATES, Task, parseRepoUrl } from '../tasks/state.js';
import { DEFAULT_SELECTION_LIMIT, Issue, IssueSelector, RawIssue } from '../triage/index.js';
import { FixIssue, FixOptions, FixWorkflow } from '../fix/index.js';
import { FixResult, createFixResult } from '../fix/state.js';

const log = createLogger('service');

export interface RunHandle<T> {
  taskId: string;
  /** Settles when the background operation ends; never rejects */
  done: Promise<T>;
}

export interface SelectIssuesOptions {
  limit?: number;
  /** Restrict the platform query to these labels */
  labels?: string[];
  /** Query the beginner labels one by one instead of listing all open issues */
  goodFirstOnly?: boolean;
  /** How many issues to fetch before ranking */
  fetchLimit?: number;
}

export interface ServiceDeps {
  registry: TaskRegistry;
  bus: NotificationBus;
  workDir: string;
  editorFactory: EditorFactory;
  git?: GitRunner;
  platform?: PlatformClient;
  selector?: IssueSelector;
}

export interface ServiceOverrides {
  git?: GitRunner;
  editorFactory?: EditorFactory;
  platform?: PlatformClient;
}

interface RunningOperation {
  done: Promise<unknown>;
  stop: () => Promise<void>;
}

const DEFAULT_FETCH_LIMIT = 30;

export class RemediationService {
  readonly bus: NotificationBus;
  private readonly registry: TaskRegistry;
  private readonly runner: TaskRunner;
  private readonly editorFactory: EditorFactory;
  private readonly git?: GitRunner;
  private readonly platform?: PlatformClient;
  private readonly selector: IssueSelector;
  private readonly running = new Map<string, RunningOperation>();

  constructor(deps: ServiceDeps) {
    this.registry = deps.registry;
    this.bus = deps.bus;
    this.editorFactory = deps.editorFactory;
    this.git = deps.git;
    this.platform = deps.platform;
    this.selector = deps.selector ?? new IssueSelector();
    this.runner = new TaskRunner({
      registry: deps.registry,
      bus: deps.bus,
      workDir: deps.workDir,
      editorFactory: deps.editorFactory,
      git: deps.git
    });
  }

  /**
   * Build a service from configuration, loading persisted tasks
   */
  static async create(config: EngineConfig, overrides: ServiceOverrides = {}): Promise<RemediationService> {
    const storage = new TaskStorage(new JsonStore(config.dataDir), config.outputLimit);
    const registry = await TaskRegistry.open(storage);
    const platform = overrides.platform
      ?? (config.githubToken ? new GitHubClient(config.githubToken) : undefined);

    return new RemediationService({
      registry,
      bus: new NotificationBus(config.eventBufferSize),
      workDir: config.workDir,
      editorFactory: overrides.editorFactory
        ?? (repoPath => new AiderRunner(repoPath, { binary: config.aiderBinary, model: config.aiderModel })),
      git: overrides.git,
      platform,
      selector: new IssueSelector(config.triage)
    });
  }

  get hasPlatform(): boolean {
    return this.platform !== undefined;
  }

  addTask(repoUrl: string): Promise<Readonly<Task>> {
    const url = repoUrl.trim();
    if (!url) {
      throw new PreconditionError('Repository URL is required');
    }
    return this.registry.create(url);
  }

  getTask(id: string): Readonly<Task> | undefined {
    return this.registry.get(id);
  }

  listTasks(): Readonly<Task>[] {
    return this.registry.list();
  }

  /**
   * Remove a task from memory and the store. The checkout on disk is left alone.
   */
  deleteTask(id: string): Promise<boolean> {
    this.requireIdle(this.requireTask(id));
    return this.registry.delete(id);
  }

  isRunning(id: string): boolean {
    return this.running.has(id);
  }

  /**
   * Clone (or update) and review a task in the background
   */
  startTask(id: string): RunHandle<boolean> {
    this.requireIdle(this.requireTask(id));

    return this.track(
      id,
      this.runner.runFull(id),
      () => false,
      async () => {
        await this.runner.stop(id);
      }
    );
  }

  /**
   * Run a fix attempt for `issue` inside the task's checkout, in the background
   */
  startFix(id: string, issue: FixIssue, options: FixOptions = {}): RunHandle<FixResult> {
    const { task, localPath } = this.checkFixable(id);
    if (!Number.isInteger(issue.number) || issue.number <= 0) {
      throw new PreconditionError(`Invalid issue number: ${issue.number}`);
    }

    const target = parseRepoUrl(task.repoUrl);
    const resolved: FixOptions = {
      ...options,
      owner: options.owner ?? target?.owner,
      repo: options.repo ?? target?.repo
    };
    if (resolved.autoPr && !this.platform) {
      throw new PreconditionError('A GitHub token is required to open pull requests');
    }
    if (resolved.autoPr && (!resolved.owner || !resolved.repo)) {
      log.warn(`Cannot determine owner/repo from ${task.repoUrl}; the attempt will stop after pushing`);
    }

    const workflow = new FixWorkflow({
      repoPath: localPath,
      editor: this.editorFactory(localPath),
      git: this.git,
      platform: this.platform,
      bus: this.bus,
      attemptId: id
    });

    return this.track(
      id,
      this.runFix(id, workflow, issue, resolved),
      error => ({ ...createFixResult(issue.number, issue.title), status: 'error', error: errorMessage(error) }),
      () => workflow.stop()
    );
  }

  /**
   * Check that a fix could start for a task right now: it exists, is idle and has a checkout.
   * Lets callers validate before fetching the issue.
   * @throws PreconditionError
   */
  checkFixable(id: string): { task: Readonly<Task>; localPath: string } {
    const task = this.requireTask(id);
    this.requireIdle(task);
    if (!task.localPath) {
      throw new PreconditionError(`Task ${id} has not been cloned`);
    }
    return { task, localPath: task.localPath };
  }

  /**
   * Fetch open issues and rank them easiest first
   */
  selectIssues(owner: string, repo: string, options: SelectIssuesOptions = {}): Promise<Issue[]> {
    const platform = this.platform;
    if (!platform) {
      throw new PreconditionError('A GitHub token is required to list issues');
    }
    const limit = options.limit ?? DEFAULT_SELECTION_LIMIT;
    const fetchLimit = options.fetchLimit ?? DEFAULT_FETCH_LIMIT;

    const fetched: Promise<RawIssue[]> = options.goodFirstOnly
      ? platform.listGoodFirstIssues(owner, repo, fetchLimit)
      : platform.listIssues(owner, repo, { labels: options.labels, state: 'open', limit: fetchLimit });
    return fetched.then(issues => this.selector.best(issues, limit));
  }

  /**
   * Ask the running operation of a task to stop
   * @returns false when nothing was running
   */
  async stop(id: string): Promise<boolean> {
    const operation = this.running.get(id);
    if (!operation) {
      return false;
    }
    await operation.stop();
    return true;
  }

  /**
   * Resolve once every background operation has settled
   */
  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map(operation => operation.done));
    }
  }

  private async runFix(id: string, workflow: FixWorkflow, issue: FixIssue, options: FixOptions): Promise<FixResult> {
    await this.registry.transition(id, 'fixing', `Fixing issue #${issue.number}`, { error: '' });
    this.bus.status('task', id, 'fixing', `Fixing issue #${issue.number}`);

    const result = await workflow.run(issue, options);

    if (result.success) {
      const message = result.prUrl
        ? `Fixed issue #${issue.number}: ${result.prUrl}`
        : `Fix for issue #${issue.number} finished at ${result.status}`;
      await this.registry.transition(id, 'completed', message, { output: result.output });
      this.bus.status('task', id, 'completed', message);
    } else {
      const message = `Fix for issue #${issue.number} failed: ${result.error}`;
      await this.registry.transition(id, 'error', message, { output: result.output, error: result.error });
      this.bus.status('task', id, 'error', message);
    }
    return result;
  }

  /**
   * Register a background operation. `done` never rejects: an unexpected error is logged,
   * the task is moved to ERROR and `fallback` supplies the result.
   */
  private track<T>(
    id: string,
    work: Promise<T>,
    fallback: (error: unknown) => T,
    stop: () => Promise<void>
  ): RunHandle<T> {
    const done = work
      .catch(async (error: unknown) => {
        log.error(`Task ${id} failed: ${errorMessage(error)}`);
        await this.recordFailure(id, errorMessage(error));
        return fallback(error);
      })
      .finally(() => {
        this.running.delete(id);
      });
    this.running.set(id, { done, stop });
    return { taskId: id, done };
  }

  private async recordFailure(id: string, message: string): Promise<void> {
    const task = this.registry.get(id);
    if (!task || !IN_FLIGHT_STATES.has(task.status)) {
      return;
    }
    try {
      await this.registry.transition(id, 'error', `Operation failed: ${message}`, { error: message });
      this.bus.status('task', id, 'error', `Operation failed: ${message}`);
    } catch (error) {
      log.error(`Could not record failure for task ${id}: ${errorMessage(error)}`);
    }
  }

  private requireTask(id: string): Readonly<Task> {
    const task = this.registry.get(id);
    if (!task) {
      throw new PreconditionError(`Task not found: ${id}`);
    }
    return task;
  }

  private requireIdle(task: Readonly<Task>): void {
    if (this.running.has(task.id) || IN_FLIGHT_STATES.has(task.status)) {
      throw new PreconditionError(`Task ${task.id} is busy (${task.status})`);
    }
  }
}
