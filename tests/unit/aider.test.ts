/**
 * Unit tests for the aider runner
 */

import { describe, it, expect } from 'vitest';
import path from 'path';
import { AiderRunner } from '../../src/shared/aider.js';

describe('AiderRunner', () => {
  describe('buildArgs', () => {
    it('should pass the instruction non-interactively', () => {
      const runner = new AiderRunner('/repo');

      expect(runner.buildArgs('Fix the bug')).toEqual(['--yes', '--message', 'Fix the bug']);
    });

    it('should add the model, files and commit mode', () => {
      const runner = new AiderRunner('/repo', { model: 'test-model' });

      expect(runner.buildArgs('Review', ['src/a.ts', 'README.md'], false)).toEqual([
        '--model', 'test-model',
        '--yes',
        '--no-auto-commits',
        '--file', 'src/a.ts',
        '--file', 'README.md',
        '--message', 'Review'
      ]);
    });
  });

  describe('run', () => {
    it('should report a missing repository as exit code -1 without launching', async () => {
      const missing = path.join('/nonexistent', 'remediator-test-repo');
      const runner = new AiderRunner(missing, { binary: 'definitely-not-installed' });

      const result = await runner.run('Fix it');
      expect(result).toEqual({
        exitCode: -1,
        transcript: `Repository path does not exist: ${missing}`
      });
    });
  });

  describe('stop', () => {
    it('should do nothing when no process is running', async () => {
      await expect(new AiderRunner('/repo').stop()).resolves.toBeUndefined();
    });
  });
});
