#!/usr/bin/env node
/**
 * Action entry point
 *
 * Runs one command against the task store and reports the result as action outputs.
 */

import * as core from '@actions/core';
import { loadConfig } from './shared/config.js';
import { GitHubClient } from './shared/github.js';
import { EngineEvent } from './shared/events.js';
import { errorMessage } from './shared/errors.js';
import { RemediationService } from './orchestrator/index.js';
import { parseRepoUrl } from './tasks/state.js';

export type Command = 'add' | 'fork' | 'run' | 'issues' | 'fix' | 'list' | 'delete';

const COMMANDS: readonly Command[] = ['add', 'fork', 'run', 'issues', 'fix', 'list', 'delete'];

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function requireInput(name: string): string {
  return core.getInput(name, { required: true }).trim();
}

function numberInput(name: string, fallback?: number): number {
  const raw = core.getInput(name).trim();
  if (!raw) {
    if (fallback === undefined) {
      throw new Error(`Input required and not supplied: ${name}`);
    }
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Input ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function booleanInput(name: string): boolean {
  return core.getInput(name).trim() !== '' && core.getBooleanInput(name);
}

/**
 * owner/repo from the `owner` and `repo` inputs, or parsed from `repo_url`
 */
function targetRepository(): { owner: string; repo: string } {
  const owner = core.getInput('owner').trim();
  const repo = core.getInput('repo').trim();
  if (owner && repo) {
    return { owner, repo };
  }
  const parsed = parseRepoUrl(core.getInput('repo_url'));
  if (!parsed) {
    throw new Error('Either owner and repo, or a GitHub repo_url, is required');
  }
  return parsed;
}

function logEvent(event: EngineEvent): void {
  if (event.type === 'status') {
    core.info(`[${event.source} ${event.id}] ${event.status}: ${event.message}`);
  } else {
    core.info(`[${event.source} ${event.id}] ${event.line}`);
  }
}

async function run(): Promise<void> {
  const command = core.getInput('command').trim() || 'list';
  core.info(`Running command: ${command}`);

  try {
    if (!isCommand(command)) {
      throw new Error(`Unknown command: ${command}`);
    }

    const config = loadConfig();
    const github = config.githubToken ? new GitHubClient(config.githubToken) : undefined;
    const service = await RemediationService.create(config, { platform: github });
    const subscription = service.bus.subscribe(logEvent);

    switch (command) {
      case 'add': {
        let url = core.getInput('repo_url').trim();
        if (!url) {
          const { owner, repo } = targetRepository();
          if (!github) {
            throw new Error('GITHUB_TOKEN is required to resolve owner/repo');
          }
          url = await github.getCloneUrl(owner, repo, booleanInput('use_ssh'));
        }
        const task = await service.addTask(url);
        core.setOutput('task_id', task.id);
        core.info(`Added task ${task.id}: ${task.repoName}`);
        break;
      }

      case 'fork': {
        if (!github) {
          throw new Error('GITHUB_TOKEN is required to fork');
        }
        const { owner, repo } = targetRepository();
        const fork = await github.forkRepository(owner, repo);
        const task = await service.addTask(fork.cloneUrl);
        core.setOutput('task_id', task.id);
        core.setOutput('fork_url', fork.htmlUrl);
        core.info(`Forked ${owner}/${repo} to ${fork.fullName}; added task ${task.id}`);
        break;
      }

      case 'run': {
        const handle = service.startTask(requireInput('task_id'));
        const ok = await handle.done;
        const task = service.getTask(handle.taskId);
        core.setOutput('status', task?.status ?? 'unknown');
        if (!ok) {
          throw new Error(task?.message || `Task ${handle.taskId} failed`);
        }
        break;
      }

      case 'issues': {
        const { owner, repo } = targetRepository();
        const issues = await service.selectIssues(owner, repo, {
          limit: numberInput('limit', 5),
          goodFirstOnly: booleanInput('good_first_only')
        });
        for (const issue of issues) {
          core.info(`#${issue.number} [${issue.difficultyScore}] ${issue.title} - ${issue.recommendation}`);
        }
        core.setOutput('issues', JSON.stringify(issues));
        break;
      }

      case 'fix': {
        const taskId = requireInput('task_id');
        const issueNumber = numberInput('issue_number');
        const { task } = service.checkFixable(taskId);
        const target = parseRepoUrl(task.repoUrl);
        const issue = github && target
          ? await github.getIssue(target.owner, target.repo, issueNumber)
          : { number: issueNumber, title: requireInput('issue_title'), body: core.getInput('issue_body') };

        const handle = service.startFix(taskId, issue, {
          autoCommit: booleanInput('auto_commit'),
          autoPush: booleanInput('auto_push'),
          autoPr: booleanInput('auto_pr')
        });
        const result = await handle.done;
        core.setOutput('status', result.status);
        core.setOutput('branch', result.branchName);
        core.setOutput('diff', result.diff);
        if (result.prUrl) {
          core.setOutput('pr_url', result.prUrl);
        }
        if (!result.success) {
          throw new Error(result.error || `Fix for issue #${issueNumber} failed`);
        }
        break;
      }

      case 'list': {
        const tasks = service.listTasks();
        for (const task of tasks) {
          core.info(`${task.id}\t${task.status}\t${task.repoName}\t${task.message}`);
        }
        core.setOutput('tasks', JSON.stringify(tasks));
        break;
      }

      case 'delete': {
        const id = requireInput('task_id');
        await service.deleteTask(id);
        core.info(`Deleted task ${id}`);
        break;
      }
    }

    await service.bus.flush();
    subscription.unsubscribe();
  } catch (error) {
    core.setFailed(errorMessage(error));
  }
}

run().catch(error => {
  core.setFailed(errorMessage(error));
});

export { run };
