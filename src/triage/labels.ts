/**
 * Label and keyword sets used to rank candidate issues.
 * Labels are compared lower-cased and whole; keywords are substrings of title or body.
 */

/** Labels maintainers put on issues meant for newcomers */
export const GOOD_LABELS = [
  'good first issue',
  'good-first-issue',
  'help wanted',
  'help-wanted',
  'beginner',
  'beginner-friendly',
  'easy',
  'low-hanging-fruit',
  'starter',
  'first-timers-only',
  'documentation',
  'docs',
  'typo'
] as const;

/** Issues carrying any of these are never selected */
export const SKIP_LABELS = [
  'wontfix',
  "won't fix",
  'invalid',
  'duplicate',
  'question',
  'discussion',
  'needs-discussion',
  'breaking-change',
  'breaking',
  'security'
] as const;

export const EASY_KEYWORDS = [
  'typo', 'typos',
  'spelling',
  'grammar',
  'documentation',
  'readme',
  'comment',
  'rename',
  'format',
  'formatting',
  'indent',
  'whitespace',
  'missing',
  'add',
  'update',
  'fix link',
  'broken link'
] as const;

/** Labels queried one by one when listing beginner issues on the platform */
export const GOOD_FIRST_ISSUE_QUERY_LABELS = [
  'good first issue',
  'good-first-issue',
  'help wanted',
  'beginner',
  'easy'
] as const;

export interface TriageLabelSets {
  goodLabels: readonly string[];
  skipLabels: readonly string[];
  easyKeywords: readonly string[];
}

export const DEFAULT_LABEL_SETS: TriageLabelSets = {
  goodLabels: GOOD_LABELS,
  skipLabels: SKIP_LABELS,
  easyKeywords: EASY_KEYWORDS
};

/**
 * True if any of `labels` (case-insensitive) is in `set`
 */
export function hasAnyLabel(labels: readonly string[], set: readonly string[]): boolean {
  const lowered = new Set(set.map(label => label.toLowerCase()));
  return labels.some(label => lowered.has(label.toLowerCase()));
}
