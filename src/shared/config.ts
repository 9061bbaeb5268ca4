/**
 * Engine configuration from environment variables
 */

import path from 'path';
import { ConfigError, errorMessage } from './errors.js';
import { safeJsonParse } from './json.js';
import { DEFAULT_EVENT_BUFFER } from './events.js';
import { OUTPUT_LIMIT } from '../tasks/state.js';
import type { TriageLabelSets } from '../triage/labels.js';

export interface EngineConfig {
  dataDir: string;
  workDir: string;
  githubToken?: string;
  aiderBinary: string;
  aiderModel?: string;
  outputLimit: number;
  eventBufferSize: number;
  /** Replacements for the built-in triage label sets */
  triage: Partial<TriageLabelSets>;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_DATA_DIR = './data';
export const DEFAULT_AIDER_BINARY = 'aider';

/**
 * Parse a positive integer variable
 * @throws ConfigError if the value is set but not a positive integer
 */
export function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Parse a JSON array of strings
 * @throws ConfigError if the value is set but is not a JSON array of strings
 */
export function parseStringList(env: Env, name: string): string[] | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = safeJsonParse(raw, name);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }
  if (!Array.isArray(parsed) || !parsed.every(item => typeof item === 'string')) {
    throw new ConfigError(`${name} must be a JSON array of strings`);
  }
  return parsed;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const dataDir = optional(env, 'REMEDIATOR_DATA_DIR') ?? DEFAULT_DATA_DIR;

  const triage: Partial<TriageLabelSets> = {};
  const goodLabels = parseStringList(env, 'TRIAGE_GOOD_LABELS');
  const skipLabels = parseStringList(env, 'TRIAGE_SKIP_LABELS');
  const easyKeywords = parseStringList(env, 'TRIAGE_EASY_KEYWORDS');
  if (goodLabels) triage.goodLabels = goodLabels;
  if (skipLabels) triage.skipLabels = skipLabels;
  if (easyKeywords) triage.easyKeywords = easyKeywords;

  return {
    dataDir,
    workDir: optional(env, 'REMEDIATOR_WORK_DIR') ?? path.join(dataDir, 'repos'),
    githubToken: optional(env, 'GITHUB_TOKEN'),
    aiderBinary: optional(env, 'AIDER_BIN') ?? DEFAULT_AIDER_BINARY,
    aiderModel: optional(env, 'AIDER_MODEL'),
    outputLimit: parsePositiveInt(env, 'OUTPUT_LIMIT', OUTPUT_LIMIT),
    eventBufferSize: parsePositiveInt(env, 'EVENT_BUFFER_SIZE', DEFAULT_EVENT_BUFFER),
    triage
  };
}
