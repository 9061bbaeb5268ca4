/**
 * Git operations for clone, branch and publish steps
 *
 * Every command goes through a GitRunner that reports the exit code and both output
 * streams as-is; deciding what a non-zero exit means is left to the caller.
 */

import { execa } from 'execa';
import { errorMessage } from './errors.js';

export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

/**
 * Run git as a subprocess. A failure to launch git is reported as exit code -1.
 */
export const runGit: GitRunner = async (args, cwd) => {
  try {
    const result = await execa('git', args, { cwd, reject: false, stdin: 'ignore' });
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : -1;
    return {
      exitCode,
      stdout: result.stdout,
      stderr: result.stderr || (exitCode === -1 ? launchFailure(result, 'git') : '')
    };
  } catch (error) {
    return { exitCode: -1, stdout: '', stderr: errorMessage(error) };
  }
};

/**
 * Message for a subprocess that never produced an exit code (not found, killed by signal)
 */
export function launchFailure(result: object, command: string): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage;
  }
  return `Failed to run ${command}`;
}

export const DEFAULT_BRANCH_FALLBACK = 'main';

/**
 * A working tree on disk
 */
export class GitRepository {
  constructor(
    readonly path: string,
    private readonly runner: GitRunner = runGit
  ) {}

  /**
   * Clone `url` into `destination`; git runs from `parentDir`
   */
  static clone(
    url: string,
    destination: string,
    parentDir: string,
    runner: GitRunner = runGit
  ): Promise<GitResult> {
    return runner(['clone', url, destination], parentDir);
  }

  run(...args: string[]): Promise<GitResult> {
    return this.runner(args, this.path);
  }

  /**
   * Get the current branch name
   * @returns Current branch, or the fallback when it cannot be read
   */
  async getCurrentBranch(): Promise<string> {
    const { exitCode, stdout } = await this.run('branch', '--show-current');
    return exitCode === 0 && stdout.trim() ? stdout.trim() : DEFAULT_BRANCH_FALLBACK;
  }

  /**
   * Resolve the remote's default branch from refs/remotes/origin/HEAD
   */
  async getDefaultBranch(): Promise<string> {
    const { exitCode, stdout } = await this.run('symbolic-ref', 'refs/remotes/origin/HEAD', '--short');
    if (exitCode !== 0 || !stdout.trim()) {
      return DEFAULT_BRANCH_FALLBACK;
    }
    return stdout.trim().replace(/^origin\//, '');
  }

  checkout(branchName: string): Promise<GitResult> {
    return this.run('checkout', branchName);
  }

  createBranch(branchName: string): Promise<GitResult> {
    return this.run('checkout', '-b', branchName);
  }

  async branchExists(branchName: string): Promise<boolean> {
    const { exitCode } = await this.run('show-ref', '--verify', `refs/heads/${branchName}`);
    return exitCode === 0;
  }

  pull(remote?: string, branchName?: string): Promise<GitResult> {
    if (remote && branchName) {
      return this.run('pull', remote, branchName);
    }
    return this.run('pull');
  }

  diff(staged: boolean): Promise<GitResult> {
    return staged ? this.run('diff', '--cached') : this.run('diff');
  }

  status(): Promise<GitResult> {
    return this.run('status', '--porcelain');
  }

  addAll(): Promise<GitResult> {
    return this.run('add', '-A');
  }

  commit(message: string): Promise<GitResult> {
    return this.run('commit', '-m', message);
  }

  push(branchName: string, remote = 'origin'): Promise<GitResult> {
    return this.run('push', '-u', remote, branchName);
  }
}

/**
 * git prints "nothing to commit" on stdout or stderr depending on version
 */
export function isNothingToCommit(result: GitResult): boolean {
  return result.stdout.includes('nothing to commit') || result.stderr.includes('nothing to commit');
}
