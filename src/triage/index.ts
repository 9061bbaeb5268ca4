/**
 * Issue triage
 *
 * Ranks open issues by an estimated difficulty (1 easiest, 5 hardest) using labels, keywords,
 * body length, discussion size and the number of source files mentioned. No model is involved.
 */

import { DEFAULT_LABEL_SETS, TriageLabelSets, hasAnyLabel } from './labels.js';

export interface Issue {
  number: number;
  title: string;
  body: string;
  labels: string[];
  url: string;
  comments: number;
  assignees: string[];
  createdAt: string;
  /** 1-5, null until scored */
  difficultyScore: number | null;
  recommendation: string;
  estimatedFiles: number;
}

/**
 * Issue as delivered by a platform client; only `number` is required
 */
export interface RawIssue {
  number: number;
  title?: string;
  body?: string | null;
  labels?: string[];
  url?: string;
  comments?: number;
  assignees?: string[];
  createdAt?: string;
}

const FILE_MENTION = /\b\w+\.(py|js|ts|go|rs|java|cpp|c|h)\b/g;

const SHORT_BODY = 200;
const LONG_BODY = 1000;
const MANY_FILES = 3;

export const DEFAULT_SELECTION_LIMIT = 5;

export function toIssue(raw: RawIssue): Issue {
  return {
    number: raw.number,
    title: raw.title ?? '',
    body: raw.body ?? '',
    labels: raw.labels ?? [],
    url: raw.url ?? '',
    comments: raw.comments ?? 0,
    assignees: raw.assignees ?? [],
    createdAt: raw.createdAt ?? '',
    difficultyScore: null,
    recommendation: '',
    estimatedFiles: 0
  };
}

export class IssueSelector {
  private readonly sets: TriageLabelSets;

  constructor(overrides: Partial<TriageLabelSets> = {}) {
    this.sets = { ...DEFAULT_LABEL_SETS, ...overrides };
  }

  /**
   * Drop assigned issues and issues with a skip label
   */
  filter(issues: RawIssue[]): Issue[] {
    return issues
      .map(toIssue)
      .filter(issue => issue.assignees.length === 0)
      .filter(issue => !hasAnyLabel(issue.labels, this.sets.skipLabels));
  }

  /**
   * Score an issue and record difficulty, recommendation and estimated file count on it
   * @returns The difficulty, 1-5
   */
  quickScore(issue: Issue): number {
    let score = 3;

    const title = issue.title.toLowerCase();
    const body = issue.body.toLowerCase();
    const hasGoodLabel = hasAnyLabel(issue.labels, this.sets.goodLabels);

    if (hasGoodLabel) {
      score -= 1;
    }

    const easy = this.sets.easyKeywords.map(keyword => keyword.toLowerCase());
    if (easy.some(keyword => title.includes(keyword) || body.includes(keyword))) {
      score -= 1;
    }

    if (issue.body.length < SHORT_BODY) {
      score -= 0.5;
    }
    if (issue.body.length > LONG_BODY) {
      score += 1;
    }

    if (issue.comments > 10) {
      score += 1;
    } else if (issue.comments > 5) {
      score += 0.5;
    }

    const fileMentions = issue.body.match(FILE_MENTION)?.length ?? 0;
    if (fileMentions > MANY_FILES) {
      score += 1;
    }
    issue.estimatedFiles = Math.max(1, fileMentions);

    // truncate toward zero, then clamp
    const difficulty = Math.max(1, Math.min(5, Math.trunc(score)));
    issue.difficultyScore = difficulty;
    issue.recommendation = this.recommend(issue, difficulty, hasGoodLabel);
    return difficulty;
  }

  /**
   * Easiest first; ties broken by fewer comments. Issues already scored are not rescored.
   */
  sortByDifficulty(issues: Issue[]): Issue[] {
    for (const issue of issues) {
      if (issue.difficultyScore === null) {
        this.quickScore(issue);
      }
    }
    return [...issues].sort(
      (a, b) => (a.difficultyScore ?? 0) - (b.difficultyScore ?? 0) || a.comments - b.comments
    );
  }

  best(issues: RawIssue[], limit = DEFAULT_SELECTION_LIMIT): Issue[] {
    return this.sortByDifficulty(this.filter(issues)).slice(0, limit);
  }

  private recommend(issue: Issue, difficulty: number, hasGoodLabel: boolean): string {
    const reasons: string[] = [];
    const title = issue.title.toLowerCase();

    if (hasGoodLabel) {
      reasons.push('has a beginner-friendly label');
    }
    if (['typo', 'spelling', 'grammar'].some(word => title.includes(word))) {
      reasons.push('is a spelling/grammar fix');
    } else if (['doc', 'readme'].some(word => title.includes(word))) {
      reasons.push('is a documentation update');
    }
    if (issue.comments === 0) {
      reasons.push('has no comments');
    }

    if (difficulty <= 2) {
      return reasons.length > 0 ? `Recommended: ${reasons.join(', ')}` : 'Recommended';
    }
    if (difficulty === 3) {
      return reasons.length > 0 ? `Worth a try: ${reasons.join(', ')}` : 'Medium difficulty';
    }
    return 'Hard, consider skipping';
  }
}
