/**
 * Aider CLI runner
 * Runs the code-editing tool inside a working tree and streams its transcript line by line
 */

import { execa, type ExecaChildProcess } from 'execa';
import fs from 'fs-extra';
import { createInterface } from 'readline';
import { launchFailure } from './git.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('aider');

export interface EditorRunOptions {
  /** Files the tool should add to its context */
  files?: string[];
  /** Called with each transcript line as it arrives */
  onLine?: (line: string) => void;
  /** Let the tool commit its own edits. Read-only invocations pass false. */
  autoCommit?: boolean;
}

export interface EditorResult {
  exitCode: number;
  transcript: string;
}

/**
 * Code-modification capability
 */
export interface CodeEditor {
  run(instruction: string, options?: EditorRunOptions): Promise<EditorResult>;
  /** Terminate the running invocation, if any */
  stop(): Promise<void>;
}

export type EditorFactory = (repoPath: string) => CodeEditor;

export interface AiderOptions {
  binary?: string;
  model?: string;
  /** Time between SIGTERM and SIGKILL when stopping */
  killGraceMs?: number;
}

export const DEFAULT_KILL_GRACE_MS = 5000;

export class AiderRunner implements CodeEditor {
  private readonly binary: string;
  private readonly model?: string;
  private readonly killGraceMs: number;
  private process: ExecaChildProcess | null = null;

  constructor(
    readonly repoPath: string,
    options: AiderOptions = {}
  ) {
    this.binary = options.binary || 'aider';
    this.model = options.model;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  buildArgs(instruction: string, files: string[] = [], autoCommit = true): string[] {
    const args: string[] = [];
    if (this.model) {
      args.push('--model', this.model);
    }
    args.push('--yes');
    if (!autoCommit) {
      args.push('--no-auto-commits');
    }
    for (const file of files) {
      args.push('--file', file);
    }
    args.push('--message', instruction);
    return args;
  }

  async run(instruction: string, options: EditorRunOptions = {}): Promise<EditorResult> {
    if (!(await fs.pathExists(this.repoPath))) {
      return { exitCode: -1, transcript: `Repository path does not exist: ${this.repoPath}` };
    }

    const args = this.buildArgs(instruction, options.files, options.autoCommit ?? true);
    log.debug(`Running ${this.binary} in ${this.repoPath} (${instruction.length} chars of instruction)`);

    const lines: string[] = [];
    try {
      const child = execa(this.binary, args, {
        cwd: this.repoPath,
        all: true,
        reject: false,
        stdin: 'ignore'
      });
      this.process = child;

      if (child.all) {
        const reader = createInterface({ input: child.all, crlfDelay: Infinity });
        for await (const raw of reader) {
          const line = raw.trimEnd();
          lines.push(line);
          options.onLine?.(line);
        }
      }

      const result = await child;
      if (typeof result.exitCode !== 'number') {
        const message = launchFailure(result, this.binary);
        return { exitCode: -1, transcript: lines.length > 0 ? `${lines.join('\n')}\n${message}` : message };
      }
      return { exitCode: result.exitCode, transcript: lines.join('\n') };
    } catch (error) {
      return { exitCode: -1, transcript: errorMessage(error) };
    } finally {
      this.process = null;
    }
  }

  async stop(): Promise<void> {
    const child = this.process;
    if (!child || child.exitCode !== null) {
      return;
    }
    log.info(`Stopping ${this.binary} (pid ${child.pid ?? 'unknown'})`);
    child.kill('SIGTERM', { forceKillAfterTimeout: this.killGraceMs });
    await child;
  }
}
