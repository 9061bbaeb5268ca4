/**
 * JSON extraction from free-text tool transcripts
 */

import { errorMessage } from './errors.js';

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text.trim());
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Locate one JSON object embedded in a transcript
 *
 * Tried in order: a ```json fenced block, any fenced block, the span from the first `{`
 * to the last `}`, the whole text.
 * @returns The parsed object, or null when none of the candidates parse
 */
export function extractJsonObject(output: string): JsonObject | null {
  const markdownMatch = output.match(/```json\s*([\s\S]*?)\s*```/);
  if (markdownMatch) {
    const parsed = tryParseObject(markdownMatch[1]);
    if (parsed) return parsed;
  }

  const genericMatch = output.match(/```\s*([\s\S]*?)\s*```/);
  if (genericMatch) {
    const parsed = tryParseObject(genericMatch[1]);
    if (parsed) return parsed;
  }

  const firstBrace = output.indexOf('{');
  const lastBrace = output.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    const parsed = tryParseObject(output.substring(firstBrace, lastBrace + 1));
    if (parsed) return parsed;
  }

  return tryParseObject(output);
}

/**
 * Parse JSON, naming the context in the error
 */
export function safeJsonParse(jsonStr: string, context = 'JSON'): unknown {
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to parse ${context}: ${errorMessage(error)}\n` +
      `Input: ${jsonStr.substring(0, 200)}...`
    );
  }
}
