/**
 * Structured review extraction
 */

import { extractJsonObject, JsonObject } from '../shared/json.js';
import { ParsedReview, ReviewFinding } from './state.js';

const DEFAULT_PRIORITY = 3;

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringOr(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function parseFinding(raw: JsonObject): ReviewFinding {
  const location = isObject(raw.code_location) ? raw.code_location : {};
  const line = numberOr(raw.line, numberOr(location.line, NaN));
  return {
    title: stringOr(raw.title),
    body: stringOr(raw.body),
    priority: clamp(Math.trunc(numberOr(raw.priority, DEFAULT_PRIORITY)), 0, 3),
    confidence: clamp(numberOr(raw.confidence, 0), 0, 1),
    file: stringOr(raw.file, stringOr(location.file)),
    line: Number.isNaN(line) ? null : line
  };
}

/**
 * Validate a decoded review object
 * @returns null when the value has no findings list and no verdict
 */
export function parseReview(value: unknown): ParsedReview | null {
  if (!isObject(value)) {
    return null;
  }
  const findings = Array.isArray(value.findings) ? value.findings.filter(isObject) : null;
  const correctness = value.overall_correctness;
  if (findings === null && typeof correctness !== 'string') {
    return null;
  }
  return {
    findings: (findings ?? []).map(parseFinding),
    overallCorrectness: stringOr(correctness),
    overallConfidence: clamp(numberOr(value.overall_confidence, 0), 0, 1)
  };
}

/**
 * Parse the review out of a review transcript
 */
export function extractReview(transcript: string): ParsedReview | null {
  return parseReview(extractJsonObject(transcript));
}

/**
 * Findings that must be addressed before merging (priority 0 or 1)
 */
export function criticalFindings(review: ParsedReview): ReviewFinding[] {
  return review.findings.filter(finding => finding.priority <= 1);
}
