/**
 * Task state schema
 *
 * A task is one managed repository checkout. Tasks are persisted as a single document
 * (see persistence.ts) and decoded back with defaults for any field that is missing.
 */

import { IllegalTransitionError } from '../shared/errors.js';

export const TASK_STATES = [
  'pending',   // Created, nothing fetched yet
  'cloning',   // Clone or pull in progress
  'cloned',    // Checkout available at localPath
  'reviewing', // Code review tool running
  'fixing',    // Fix workflow running
  'completed', // Last operation finished successfully
  'error'      // Last operation failed
] as const;

export type TaskState = typeof TASK_STATES[number];

/** States that mean some operation is running right now */
export const IN_FLIGHT_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['cloning', 'reviewing', 'fixing']);

/**
 * Allowed transitions. completed/error -> cloning and -> fixing are caller restarts.
 */
export const TASK_TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  pending: ['cloning', 'error'],
  cloning: ['cloned', 'error'],
  cloned: ['cloning', 'reviewing', 'fixing', 'error'],
  reviewing: ['completed', 'error'],
  fixing: ['completed', 'cloned', 'error'],
  completed: ['cloning', 'fixing', 'error'],
  error: ['cloning', 'fixing']
};

export function isTaskState(value: unknown): value is TaskState {
  return TASK_STATES.some(state => state === value);
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TaskState, to: TaskState): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError('task', from, to);
  }
}

export interface Task {
  id: string;
  repoUrl: string;
  repoName: string;
  status: TaskState;
  /** Set once the repository has been cloned */
  localPath: string | null;
  message: string;
  output: string;
  error: string;
}

/**
 * Repository name from a clone URL: last path segment without a trailing slash or .git
 */
export function repoNameFromUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const segments = trimmed.split(/[/:]/);
  return segments[segments.length - 1] || trimmed;
}

/**
 * Owner and repository from an https or scp-style clone URL
 */
export function parseRepoUrl(url: string): { owner: string; repo: string } | null {
  const trimmed = url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const segments = trimmed.split(/[/:]/).filter(s => s.length > 0);
  if (segments.length < 2) {
    return null;
  }
  const owner = segments[segments.length - 2];
  const repo = segments[segments.length - 1];
  if (owner.includes('.') || owner.includes('@')) {
    // host name, not an owner (e.g. https://example.com/repo)
    return null;
  }
  return { owner, repo };
}

export function createTask(id: string, repoUrl: string): Task {
  return {
    id,
    repoUrl,
    repoName: repoNameFromUrl(repoUrl),
    status: 'pending',
    localPath: null,
    message: '',
    output: '',
    error: ''
  };
}

/**
 * Tasks that were running when the process stopped cannot still be running.
 * Those with a checkout go back to cloned, the rest to pending.
 */
export function recoverTask(task: Task): Task {
  if (!IN_FLIGHT_STATES.has(task.status)) {
    return task;
  }
  const status: TaskState = task.localPath ? 'cloned' : 'pending';
  return {
    ...task,
    status,
    message: `Interrupted while ${task.status}; reset to ${status}`
  };
}

/**
 * Highest numeric id among `ids`; non-numeric ids are ignored
 */
export function lastTaskId(ids: Iterable<string>): number {
  let max = 0;
  for (const id of ids) {
    if (!/^\d+$/.test(id)) continue;
    max = Math.max(max, parseInt(id, 10));
  }
  return max;
}

// --- Persisted document ---

export const TASK_DOCUMENT_VERSION = 2;
export const OUTPUT_LIMIT = 10000;

export interface PersistedTask {
  id: string;
  repo_url: string;
  repo_name: string;
  status: TaskState;
  local_path: string | null;
  message: string;
  output: string;
  error: string;
}

export interface TaskDocument {
  version: number;
  updated_at: string;
  /** Highest id ever allocated, including deleted tasks (version 2) */
  last_id: number;
  tasks: Record<string, PersistedTask>;
}

export interface DecodedTaskDocument {
  tasks: Map<string, Task>;
  lastId: number;
}

export function serializeTask(task: Task, outputLimit = OUTPUT_LIMIT): PersistedTask {
  return {
    id: task.id,
    repo_url: task.repoUrl,
    repo_name: task.repoName,
    status: task.status,
    local_path: task.localPath,
    message: task.message,
    output: task.output.slice(0, outputLimit),
    error: task.error
  };
}

export function buildTaskDocument(
  tasks: Iterable<Task>,
  lastId: number,
  outputLimit = OUTPUT_LIMIT
): TaskDocument {
  const document: TaskDocument = {
    version: TASK_DOCUMENT_VERSION,
    updated_at: new Date().toISOString(),
    last_id: lastId,
    tasks: {}
  };
  for (const task of tasks) {
    document.tasks[task.id] = serializeTask(task, outputLimit);
  }
  document.last_id = Math.max(lastId, lastTaskId(Object.keys(document.tasks)));
  return document;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return record;
}

function stringField(record: Record<string, unknown>, key: string, fallback = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Decode one persisted task; missing or mistyped fields get defaults
 */
export function decodeTask(key: string, raw: unknown): Task | null {
  const record = asRecord(raw);
  if (!record) {
    return null;
  }
  const repoUrl = stringField(record, 'repo_url');
  const localPath = stringField(record, 'local_path');
  return {
    id: stringField(record, 'id', key) || key,
    repoUrl,
    repoName: stringField(record, 'repo_name') || repoNameFromUrl(repoUrl),
    status: isTaskState(record.status) ? record.status : 'pending',
    localPath: localPath || null,
    message: stringField(record, 'message'),
    output: stringField(record, 'output'),
    error: stringField(record, 'error')
  };
}

/**
 * Decode a task document of any known version.
 * Version 0 (no version field) has the same task shape; every field is default-filled.
 * Documents before version 2 carry no `last_id`; the highest stored id stands in for it.
 */
export function decodeTaskDocument(raw: unknown): DecodedTaskDocument {
  const tasks = new Map<string, Task>();
  const document = asRecord(raw);
  if (!document) {
    return { tasks, lastId: 0 };
  }
  const version = typeof document.version === 'number' ? document.version : 0;
  if (version > TASK_DOCUMENT_VERSION) {
    throw new Error(`Unsupported task document version: ${version}`);
  }
  const entries = asRecord(document.tasks) ?? {};
  for (const [key, value] of Object.entries(entries)) {
    const task = decodeTask(key, value);
    if (task) {
      tasks.set(key, { ...task, id: key });
    }
  }
  const stored = document.last_id;
  const lastId = typeof stored === 'number' && Number.isInteger(stored) && stored > 0 ? stored : 0;
  return { tasks, lastId: Math.max(lastId, lastTaskId(tasks.keys())) };
}
