/**
 * Instructions sent to the code-editing tool
 */

export const REVIEW_REPOSITORY_PROMPT = `Review the structure of this project and report:
1. What the project does
2. How the code is organised
3. The main modules and files
4. The technology stack
5. What could be improved

Do not modify any files.`;

export function buildFixPrompt(issueTitle: string, issueBody: string): string {
  return `Fix the following issue.

## Issue title
${issueTitle}

## Issue description
${issueBody || '(no description provided)'}

Please:
1. Work out the cause of the problem
2. Find the relevant code
3. Implement the fix
4. Make sure the change does not break existing behaviour`;
}

export function buildDiffReviewPrompt(diff: string): string {
  return `Review the following change as you would review a pull request. Do not modify any files.

\`\`\`diff
${diff}
\`\`\`

Answer with a single JSON object in this shape:
{
  "findings": [
    {
      "title": "short summary",
      "body": "why this is a problem",
      "priority": 0,
      "confidence": 0.9,
      "file": "path/to/file",
      "line": 1
    }
  ],
  "overall_correctness": "patch is correct" | "patch is incorrect",
  "overall_confidence": 0.8
}

priority ranges from 0 (must fix) to 3 (nit); confidence ranges from 0 to 1.`;
}
