/**
 * Unit tests for the task registry
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { dir, DirectoryResult } from 'tmp-promise';
import { JsonStore } from '../../src/shared/storage.js';
import { TaskStorage } from '../../src/tasks/persistence.js';
import { TaskRegistry } from '../../src/tasks/registry.js';
import { IllegalTransitionError, PreconditionError } from '../../src/shared/errors.js';

describe('TaskRegistry', () => {
  let tmp: DirectoryResult;
  let store: JsonStore;

  const open = () => TaskRegistry.open(new TaskStorage(store));

  beforeEach(async () => {
    tmp = await dir({ unsafeCleanup: true });
    store = new JsonStore(tmp.path);
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should start empty when nothing is stored', async () => {
    const registry = await open();

    expect(registry.size).toBe(0);
    expect(registry.list()).toEqual([]);
  });

  it('should allocate increasing ids', async () => {
    const registry = await open();

    const a = await registry.create('https://github.com/octo/a');
    const b = await registry.create('https://github.com/octo/b');
    expect([a.id, b.id]).toEqual(['1', '2']);
    expect(a.status).toBe('pending');
    expect(a.repoName).toBe('a');
  });

  it('should allocate unique ids under concurrent creation', async () => {
    const registry = await open();

    const tasks = await Promise.all(
      Array.from({ length: 5 }, (_, i) => registry.create(`https://github.com/octo/r${i}`))
    );
    expect(tasks.map(t => t.id).sort()).toEqual(['1', '2', '3', '4', '5']);
  });

  it('should never reuse a deleted id, including after reload', async () => {
    const registry = await open();
    await registry.create('https://github.com/octo/a');
    await registry.create('https://github.com/octo/b');
    await registry.create('https://github.com/octo/c');

    expect(await registry.delete('2')).toBe(true);
    expect((await registry.create('https://github.com/octo/d')).id).toBe('4');

    const reloaded = await open();
    expect(reloaded.list().map(t => t.id)).toEqual(['1', '3', '4']);
    expect((await reloaded.create('https://github.com/octo/e')).id).toBe('5');
  });

  it('should not hand out the newest id again after it was deleted and the registry reloaded', async () => {
    const registry = await open();
    await registry.create('https://github.com/octo/a');
    await registry.create('https://github.com/octo/b');
    const newest = await registry.create('https://github.com/octo/c');

    expect(await registry.delete(newest.id)).toBe(true);

    const reloaded = await open();
    expect(reloaded.list().map(t => t.id)).toEqual(['1', '2']);
    expect((await reloaded.create('https://github.com/octo/d')).id).toBe('4');
  });

  it('should keep the counter when every task has been deleted', async () => {
    const registry = await open();
    await registry.create('https://github.com/octo/a');
    await registry.delete('1');

    const stored: unknown = await fs.readJson(path.join(tmp.path, 'tasks.json'));
    expect(stored).toMatchObject({ version: 2, last_id: 1, tasks: {} });
    expect((await (await open()).create('https://github.com/octo/b')).id).toBe('2');
  });

  it('should return false when deleting an unknown task', async () => {
    const registry = await open();

    expect(await registry.delete('99')).toBe(false);
  });

  it('should persist every transition', async () => {
    const registry = await open();
    const task = await registry.create('https://github.com/octo/widgets');

    await registry.transition(task.id, 'cloning', 'Cloning');
    await registry.transition(task.id, 'cloned', 'Cloned', { localPath: '/w/widgets' });

    const reloaded = await open();
    expect(reloaded.get(task.id)).toMatchObject({
      status: 'cloned',
      message: 'Cloned',
      localPath: '/w/widgets'
    });
  });

  it('should reject illegal transitions and leave the task unchanged', async () => {
    const registry = await open();
    const task = await registry.create('https://github.com/octo/widgets');

    await expect(registry.transition(task.id, 'reviewing', 'nope')).rejects.toThrow(IllegalTransitionError);
    expect(registry.get(task.id)?.status).toBe('pending');
  });

  it('should reject changes to unknown tasks', async () => {
    const registry = await open();

    await expect(registry.transition('42', 'cloning', 'x')).rejects.toThrow(PreconditionError);
    expect(() => registry.require('42')).toThrow('Task not found: 42');
  });

  it('should return copies', async () => {
    const registry = await open();
    const task = await registry.create('https://github.com/octo/widgets');

    const copy = registry.get(task.id);
    expect(copy).not.toBe(registry.get(task.id));
    expect(copy).toEqual(registry.get(task.id));
  });

  it('should make appended output durable on the next save', async () => {
    const registry = await open();
    const task = await registry.create('https://github.com/octo/widgets');

    registry.appendOutput(task.id, 'first');
    registry.appendOutput(task.id, 'second');
    registry.appendOutput('missing', 'ignored');
    expect(registry.get(task.id)?.output).toBe('first\nsecond');
    expect((await open()).get(task.id)?.output).toBe('');

    await registry.save();
    expect((await open()).get(task.id)?.output).toBe('first\nsecond');
  });

  it('should reset interrupted tasks on load and persist the reset', async () => {
    await fs.writeJson(path.join(tmp.path, 'tasks.json'), {
      version: 1,
      updated_at: '2026-01-01T00:00:00.000Z',
      tasks: {
        '1': { id: '1', repo_url: 'https://github.com/octo/a', repo_name: 'a', status: 'reviewing', local_path: '/w/a', message: '', output: '', error: '' },
        '2': { id: '2', repo_url: 'https://github.com/octo/b', repo_name: 'b', status: 'cloning', local_path: null, message: '', output: '', error: '' },
        '3': { id: '3', repo_url: 'https://github.com/octo/c', repo_name: 'c', status: 'completed', local_path: '/w/c', message: 'done', output: '', error: '' }
      }
    });

    const registry = await open();
    expect(registry.get('1')?.status).toBe('cloned');
    expect(registry.get('2')?.status).toBe('pending');
    expect(registry.get('3')?.status).toBe('completed');

    const stored: unknown = await fs.readJson(path.join(tmp.path, 'tasks.json'));
    expect(stored).toMatchObject({
      version: 2,
      last_id: 3,
      tasks: {
        '1': { status: 'cloned', local_path: '/w/a' },
        '2': { status: 'pending', local_path: null }
      }
    });
  });

  it('should recover the id counter from a non-contiguous document', async () => {
    await fs.writeJson(path.join(tmp.path, 'tasks.json'), {
      version: 1,
      tasks: {
        '3': { repo_url: 'https://github.com/octo/a', status: 'pending' },
        '11': { repo_url: 'https://github.com/octo/b', status: 'pending' },
        legacy: { repo_url: 'https://github.com/octo/c', status: 'pending' }
      }
    });

    const registry = await open();
    expect(registry.size).toBe(3);
    expect((await registry.create('https://github.com/octo/d')).id).toBe('12');
  });
});
