// Branch naming for fix attempts
// Format: fix/issue-{issue_number}

export const FIX_BRANCH_PREFIX = 'fix/issue-';

/**
 * Generate the branch name used for fixing an issue
 * @param issueNumber - The issue number
 * @returns Branch name in format: fix/issue-{issue}
 */
export function getFixBranch(issueNumber: number): string {
  if (!Number.isInteger(issueNumber) || issueNumber <= 0) {
    throw new Error(`Invalid issue number: ${issueNumber}`);
  }
  return `${FIX_BRANCH_PREFIX}${issueNumber}`;
}

/**
 * Extract the issue number from a fix branch name
 * @param branch - The branch name to parse
 * @returns The issue number, or null when the branch is not a fix branch
 */
export function parseFixBranch(branch: string): number | null {
  const match = branch.match(/^fix\/issue-(\d+)$/);
  if (!match) {
    return null;
  }
  const issueNumber = parseInt(match[1], 10);
  return issueNumber > 0 ? issueNumber : null;
}

/**
 * Head reference for a pull request. Branches pushed to a repository the user does not
 * own are addressed as {user}:{branch}.
 */
export function getPullRequestHead(branch: string, username: string, ownsRepository: boolean): string {
  return ownsRepository ? branch : `${username}:${branch}`;
}
