/**
 * Fix workflow
 *
 * One attempt to fix one issue inside an existing checkout:
 * branch -> edit -> capture diff and review -> commit -> push -> open a pull request.
 * Commit, push and pull request are each opt-in; the attempt stops successfully at the
 * first step it is not allowed to take.
 */

import { GitRepository, GitRunner, isNothingToCommit, runGit } from '../shared/git.js';
import { CodeEditor } from '../shared/aider.js';
import { PlatformClient } from '../shared/github.js';
import { NotificationBus } from '../shared/events.js';
import { getFixBranch, getPullRequestHead } from '../shared/branches.js';
import { buildDiffReviewPrompt, buildFixPrompt } from '../shared/prompts.js';
import { createLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { criticalFindings, extractReview } from './review.js';
import { FixResult, FixState, assertFixTransition, createFixResult } from './state.js';

const log = createLogger('fix');

export const NO_CHANGES = 'no changes detected';

export interface FixIssue {
  number: number;
  title: string;
  body?: string;
}

export interface FixOptions {
  autoCommit?: boolean;
  autoPush?: boolean;
  autoPr?: boolean;
  /** Target repository for the pull request */
  owner?: string;
  repo?: string;
  /** Files to hand to the editor up front */
  files?: string[];
}

export interface FixWorkflowDeps {
  repoPath: string;
  editor: CodeEditor;
  git?: GitRunner;
  platform?: PlatformClient;
  bus?: NotificationBus;
  /** Id used on published events; defaults to the issue number */
  attemptId?: string;
}

export function buildCommitMessage(issue: FixIssue): string {
  return `fix: resolve issue #${issue.number} - ${issue.title}`;
}

export function buildPullRequestTitle(issue: FixIssue): string {
  return `Fix #${issue.number}: ${issue.title}`;
}

export function buildPullRequestBody(issue: FixIssue): string {
  return `## Summary
This PR fixes #${issue.number}.

## Changes
- Automated fix generated with aider

## Related Issue
Closes #${issue.number}
`;
}

export class FixWorkflow {
  private readonly repository: GitRepository;
  private readonly editor: CodeEditor;
  private readonly platform?: PlatformClient;
  private readonly bus?: NotificationBus;
  private readonly attemptId?: string;

  constructor(deps: FixWorkflowDeps) {
    this.repository = new GitRepository(deps.repoPath, deps.git ?? runGit);
    this.editor = deps.editor;
    this.platform = deps.platform;
    this.bus = deps.bus;
    this.attemptId = deps.attemptId;
  }

  /**
   * Run the attempt. Never rejects: failures are reported through `status: 'error'`.
   */
  async run(issue: FixIssue, options: FixOptions = {}): Promise<FixResult> {
    const result = createFixResult(issue.number, issue.title);
    const id = this.attemptId ?? String(issue.number);

    const setStatus = (status: FixState, message: string): void => {
      assertFixTransition(result.status, status);
      result.status = status;
      this.bus?.status('fix', id, status, message);
      log.info(`Issue #${issue.number}: ${status} - ${message}`);
    };
    const emit = (line: string): void => {
      result.output += `${line}\n`;
      this.bus?.output('fix', id, line);
    };

    try {
      // Branch
      const branchName = getFixBranch(issue.number);
      setStatus('branching', `Creating branch ${branchName}`);
      const defaultBranch = await this.prepareBranch(branchName);
      result.branchName = branchName;
      emit(`Created branch ${branchName} from ${defaultBranch}`);

      // Edit
      setStatus('fixing', 'Editing code');
      const fix = await this.editor.run(buildFixPrompt(issue.title, issue.body ?? ''), {
        files: options.files,
        autoCommit: false,
        onLine: emit
      });
      if (fix.exitCode !== 0) {
        throw new Error(`Fix failed with exit code ${fix.exitCode}`);
      }
      emit('Fix completed');

      // Diff and review
      setStatus('reviewing', 'Collecting changes');
      result.diff = await this.captureDiff();
      emit('=== Git Diff ===');
      for (const line of result.diff.replace(/\n$/, '').split('\n')) {
        emit(line);
      }

      if (result.diff === NO_CHANGES) {
        log.warn(`Issue #${issue.number}: no changes to review`);
      } else {
        setStatus('reviewing', 'Reviewing changes');
        await this.reviewChanges(result, emit);
      }

      setStatus('diff_ready', 'Changes ready');
      if (!options.autoCommit) {
        result.success = true;
        return result;
      }

      // Commit
      setStatus('committing', 'Committing changes');
      await this.commit(issue, emit);
      if (!options.autoPush) {
        result.success = true;
        return result;
      }

      // Push
      setStatus('pushing', `Pushing ${branchName}`);
      const push = await this.repository.push(branchName);
      if (push.exitCode !== 0) {
        throw new Error(`Push failed: ${push.stderr}`);
      }
      emit(`Pushed to origin/${branchName}`);
      if (!options.autoPr || !options.owner || !options.repo) {
        result.success = true;
        return result;
      }

      // Pull request
      setStatus('creating_pr', 'Creating pull request');
      result.prUrl = await this.openPullRequest(issue, options.owner, options.repo, branchName, defaultBranch);
      emit(`Pull request created: ${result.prUrl}`);

      setStatus('completed', 'Fix completed');
      result.success = true;
    } catch (error) {
      const message = errorMessage(error);
      result.error = message;
      result.success = false;
      if (result.status !== 'error') {
        result.status = 'error';
        this.bus?.status('fix', id, 'error', `Error: ${message}`);
      }
      log.error(`Issue #${issue.number}: ${message}`);
      emit(`Error: ${message}`);
    }
    return result;
  }

  /**
   * Stop the editor if it is running
   */
  stop(): Promise<void> {
    return this.editor.stop();
  }

  /**
   * Switch to the default branch, update it, then check out (or create) the fix branch
   * @returns The default branch name
   */
  private async prepareBranch(branchName: string): Promise<string> {
    const defaultBranch = await this.repository.getDefaultBranch();
    const checkout = await this.repository.checkout(defaultBranch);
    if (checkout.exitCode !== 0) {
      log.warn(`Could not check out ${defaultBranch}: ${checkout.stderr.trim()}`);
    }
    const pull = await this.repository.pull('origin', defaultBranch);
    if (pull.exitCode !== 0) {
      log.warn(`Could not update ${defaultBranch}: ${pull.stderr.trim()}`);
    }

    const result = (await this.repository.branchExists(branchName))
      ? await this.repository.checkout(branchName)
      : await this.repository.createBranch(branchName);
    if (result.exitCode !== 0) {
      throw new Error(`Failed to create branch: ${result.stderr}`);
    }
    return defaultBranch;
  }

  /**
   * Staged and unstaged changes, or the porcelain status when only untracked files changed
   */
  async captureDiff(): Promise<string> {
    const staged = await this.repository.diff(true);
    const unstaged = await this.repository.diff(false);

    let diff = '';
    if (staged.stdout) {
      diff += `=== Staged Changes ===\n${staged.stdout}\n`;
    }
    if (unstaged.stdout) {
      diff += `=== Unstaged Changes ===\n${unstaged.stdout}\n`;
    }
    if (!diff) {
      const status = await this.repository.status();
      if (status.stdout) {
        diff = `=== File Status ===\n${status.stdout}`;
      }
    }
    return diff || NO_CHANGES;
  }

  /**
   * Ask the editor to review the diff. Neither a failed run nor an unparseable answer stops the attempt.
   */
  private async reviewChanges(result: FixResult, emit: (line: string) => void): Promise<void> {
    const review = await this.editor.run(buildDiffReviewPrompt(result.diff), {
      autoCommit: false,
      onLine: emit
    });
    if (review.exitCode !== 0) {
      log.warn(`Review exited with code ${review.exitCode}`);
    }

    result.review = extractReview(review.transcript);
    if (!result.review) {
      log.warn('No structured review available');
      return;
    }

    const critical = criticalFindings(result.review);
    if (critical.length > 0) {
      log.warn(`Review found ${critical.length} high-priority issue(s)`);
      for (const finding of critical) {
        emit(`[P${finding.priority}] ${finding.title}`);
      }
    }
    emit(`Review verdict: ${result.review.overallCorrectness || 'none'}`);
  }

  private async commit(issue: FixIssue, emit: (line: string) => void): Promise<void> {
    const add = await this.repository.addAll();
    if (add.exitCode !== 0) {
      throw new Error(`Commit failed: ${add.stderr}`);
    }
    const message = buildCommitMessage(issue);
    const commit = await this.repository.commit(message);
    if (commit.exitCode === 0) {
      emit(`Committed: ${message}`);
      return;
    }
    if (isNothingToCommit(commit)) {
      log.warn(`Issue #${issue.number}: nothing to commit`);
      emit('No changes to commit');
      return;
    }
    throw new Error(`Commit failed: ${commit.stderr}`);
  }

  private async openPullRequest(
    issue: FixIssue,
    owner: string,
    repo: string,
    branchName: string,
    base: string
  ): Promise<string> {
    if (!this.platform) {
      throw new Error('No platform client configured for pull requests');
    }
    const username = await this.platform.getCurrentUser();

    let ownsRepository = false;
    try {
      ownsRepository = (await this.platform.getRepositoryOwner(owner, repo)) === username;
    } catch (error) {
      log.warn(`Could not determine repository owner: ${errorMessage(error)}`);
    }

    const pr = await this.platform.createPullRequest(owner, repo, {
      title: buildPullRequestTitle(issue),
      body: buildPullRequestBody(issue),
      head: getPullRequestHead(branchName, username, ownsRepository),
      base
    });
    return pr.url;
  }
}
