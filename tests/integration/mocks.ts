/**
 * Test doubles for integration testing
 *
 * Scripted git, a scripted code editor and an in-memory platform client
 */

import { vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import type { GitResult, GitRunner } from '../../src/shared/git.js';
import type { CodeEditor, EditorResult, EditorRunOptions } from '../../src/shared/aider.js';
import type { CreatePRParams, PlatformClient } from '../../src/shared/github.js';
import type { RawIssue } from '../../src/triage/index.js';

export type GitHandler = GitResult | ((args: string[], cwd: string) => GitResult | Promise<GitResult>);

export interface ScriptedGit {
  runner: GitRunner;
  /** Every invocation in order */
  calls: Array<{ args: string[]; cwd: string }>;
  /** Respond to an exact command line (args joined by spaces) or to a subcommand */
  on(command: string, handler: GitHandler): void;
  /** Command lines run so far, args joined by spaces */
  commands(): string[];
}

export function ok(stdout = ''): GitResult {
  return { exitCode: 0, stdout, stderr: '' };
}

export function fail(stderr: string, exitCode = 1, stdout = ''): GitResult {
  return { exitCode, stdout, stderr };
}

/**
 * Git runner answering from a script. Unscripted commands succeed with no output.
 */
export function createScriptedGit(): ScriptedGit {
  const handlers = new Map<string, GitHandler>();
  const calls: Array<{ args: string[]; cwd: string }> = [];

  const runner: GitRunner = async (args, cwd) => {
    calls.push({ args, cwd });
    const handler = handlers.get(args.join(' ')) ?? handlers.get(args[0]);
    if (!handler) {
      return ok();
    }
    return typeof handler === 'function' ? handler(args, cwd) : handler;
  };

  return {
    runner,
    calls,
    on(command, handler) {
      handlers.set(command, handler);
    },
    commands() {
      return calls.map(call => call.args.join(' '));
    }
  };
}

/**
 * `git clone <url> <dest>` that creates <dest>/.git
 */
export function cloneCreatesCheckout(): GitHandler {
  return async args => {
    await fs.ensureDir(path.join(args[2], '.git'));
    return ok(`Cloning into '${path.basename(args[2])}'...`);
  };
}

export interface EditorStep {
  exitCode?: number;
  /** Lines streamed through onLine and joined into the transcript */
  lines?: string[];
  /** Called before the step returns, e.g. to modify the scripted repository */
  effect?: () => void;
  /** Keep the run open until stop() is called */
  waitForStop?: boolean;
}

/**
 * Code editor returning one scripted step per call; once the script runs out every call succeeds silently
 */
export function createScriptedEditor(steps: EditorStep[] = []) {
  const queue = [...steps];
  const instructions: string[] = [];
  let stopRequested: () => void = () => undefined;

  const run = vi.fn(async (instruction: string, options: EditorRunOptions = {}): Promise<EditorResult> => {
    instructions.push(instruction);
    const step: EditorStep = queue.shift() ?? {};
    const lines = step.lines ?? [];
    for (const line of lines) {
      options.onLine?.(line);
    }
    step.effect?.();
    if (step.waitForStop) {
      await new Promise<void>(resolve => {
        stopRequested = resolve;
      });
      return { exitCode: -15, transcript: [...lines, 'Terminated'].join('\n') };
    }
    return { exitCode: step.exitCode ?? 0, transcript: lines.join('\n') };
  });

  const stop = vi.fn(async () => {
    stopRequested();
  });

  const editor: CodeEditor = { run, stop };
  return { editor, run, stop, instructions };
}

export type ScriptedEditor = ReturnType<typeof createScriptedEditor>;

export interface FakePlatformState {
  login: string;
  repositoryOwner: string;
  issues: RawIssue[];
  pulls: Array<{ owner: string; repo: string } & CreatePRParams>;
  failPullRequest?: string;
  failOwnerLookup?: boolean;
}

export function createPlatformState(overrides: Partial<FakePlatformState> = {}): FakePlatformState {
  return {
    login: 'alice',
    repositoryOwner: 'octo',
    issues: [],
    pulls: [],
    ...overrides
  };
}

/**
 * In-memory platform client
 */
export function createFakePlatform(state: FakePlatformState) {
  const platform = {
    listIssues: vi.fn(async (_owner: string, _repo: string, options: { limit?: number } = {}) =>
      state.issues.slice(0, options.limit ?? 30)
    ),

    listGoodFirstIssues: vi.fn(async (_owner: string, _repo: string, limit = 10) =>
      state.issues.slice(0, limit)
    ),

    getIssue: vi.fn(async (_owner: string, _repo: string, issueNumber: number) => {
      const issue = state.issues.find(candidate => candidate.number === issueNumber);
      if (!issue) throw new Error(`Issue #${issueNumber} not found`);
      return {
        number: issue.number,
        title: issue.title ?? '',
        body: issue.body ?? '',
        state: 'open',
        labels: issue.labels ?? []
      };
    }),

    createPullRequest: vi.fn(async (owner: string, repo: string, params: CreatePRParams) => {
      if (state.failPullRequest) {
        throw new Error(state.failPullRequest);
      }
      state.pulls.push({ owner, repo, ...params });
      const number = state.pulls.length;
      return { number, url: `https://github.com/${owner}/${repo}/pull/${number}`, title: params.title };
    }),

    getCurrentUser: vi.fn(async () => state.login),

    getRepositoryOwner: vi.fn(async () => {
      if (state.failOwnerLookup) {
        throw new Error('Not Found');
      }
      return state.repositoryOwner;
    })
  } satisfies PlatformClient;

  return platform;
}
