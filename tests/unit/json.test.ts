/**
 * Unit tests for JSON extraction utilities
 */

import { describe, it, expect } from 'vitest';
import { extractJsonObject, safeJsonParse } from '../../src/shared/json.js';

describe('extractJsonObject', () => {
  describe('Strategy 1: Markdown code blocks', () => {
    it('should extract from ```json ... ``` blocks', () => {
      const output = `Here is my review:
\`\`\`json
{"overall_correctness": "patch is correct", "findings": []}
\`\`\`
Let me know if you need more.`;

      expect(extractJsonObject(output)).toEqual({
        overall_correctness: 'patch is correct',
        findings: []
      });
    });

    it('should handle markdown with whitespace', () => {
      const output = `
        \`\`\`json
        {"key": "value"}
        \`\`\`
      `;

      expect(extractJsonObject(output)).toEqual({ key: 'value' });
    });
  });

  describe('Strategy 2: Generic code blocks', () => {
    it('should extract from ``` ... ``` without json specifier', () => {
      const output = `Result:
\`\`\`
{"items": [1, 2, 3]}
\`\`\`
Done`;

      expect(extractJsonObject(output)).toEqual({ items: [1, 2, 3] });
    });
  });

  describe('Strategy 3: Object boundaries', () => {
    it('should extract the span between the first { and the last }', () => {
      const output = 'Aider> reviewing... {"findings": [{"title": "x"}]} done';

      expect(extractJsonObject(output)).toEqual({ findings: [{ title: 'x' }] });
    });
  });

  describe('Strategy 4: Whole text', () => {
    it('should parse the whole text when it is an object', () => {
      expect(extractJsonObject('  {"a": 1}  ')).toEqual({ a: 1 });
    });
  });

  describe('Failure cases', () => {
    it('should return null when there is no object', () => {
      expect(extractJsonObject('The patch looks fine to me.')).toBeNull();
    });

    it('should return null for arrays', () => {
      expect(extractJsonObject('[1, 2, 3]')).toBeNull();
    });

    it('should return null for malformed JSON', () => {
      expect(extractJsonObject('{"findings": [}')).toBeNull();
    });
  });
});

describe('safeJsonParse', () => {
  it('should parse valid JSON', () => {
    expect(safeJsonParse('["a", "b"]')).toEqual(['a', 'b']);
  });

  it('should name the context in the error', () => {
    expect(() => safeJsonParse('not json', 'TRIAGE_GOOD_LABELS')).toThrow(
      /^Failed to parse TRIAGE_GOOD_LABELS:/
    );
  });
});
