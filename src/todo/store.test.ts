import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TodoStoreError } from '../errors.js';
import { TODO_FILE_NAME, TodoStore } from './store.js';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

let dir: string;
let store: TodoStore;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-todos-'));
  store = TodoStore.inDirectory(dir, fixedNow);
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('TodoStore', () => {
  it('keeps its file in the directory it was given', () => {
    expect(store.filePath).toBe(path.join(dir, TODO_FILE_NAME));
  });

  it('treats a missing or blank file as an empty list', async () => {
    expect(await store.list()).toEqual([]);

    await fs.writeFile(store.filePath, '  \n');
    expect(await store.list()).toEqual([]);
  });

  it('adds tasks as given with a creation time and persists them', async () => {
    await store.add('Buy milk');

    expect(await store.list()).toEqual([{ task: 'Buy milk', done: false, created: '2026-01-02T03:04:05.000Z' }]);
    expect(await fs.readFile(store.filePath, 'utf-8')).toBe(
      JSON.stringify([{ task: 'Buy milk', done: false, created: '2026-01-02T03:04:05.000Z' }], null, 2)
    );
  });

  it('writes non-ASCII text as is', async () => {
    await store.add('Kjøp melk ☕');

    expect(await fs.readFile(store.filePath, 'utf-8')).toContain('"task": "Kjøp melk ☕"');
  });

  it('keeps surrounding whitespace in a task', async () => {
    expect((await store.add('  Call mom ')).task).toBe('  Call mom ');
  });

  it('rejects an empty task', async () => {
    await expect(store.add('   ')).rejects.toThrow(new TodoStoreError('Task description must not be empty'));
  });

  it('completes items by 1-based position', async () => {
    await store.add('First');
    await store.add('Second');

    const result = await store.complete(2);

    expect(result).toEqual({
      status: 'completed',
      item: {
        task: 'Second',
        done: true,
        created: '2026-01-02T03:04:05.000Z',
        completed: '2026-01-02T03:04:05.000Z',
      },
    });
    expect((await store.list()).map(item => item.done)).toEqual([false, true]);
  });

  it('distinguishes empty lists, bad positions and finished items', async () => {
    expect(await store.complete(1)).toEqual({ status: 'empty' });

    await store.add('Only');
    expect(await store.complete(0)).toEqual({ status: 'invalid_index', count: 1 });
    expect(await store.complete(2)).toEqual({ status: 'invalid_index', count: 1 });
    expect(await store.complete(1.5)).toEqual({ status: 'invalid_index', count: 1 });

    await store.complete(1);
    const again = await store.complete(1);
    expect(again.status).toBe('already_done');
  });

  it('fails on files that are not a todo list', async () => {
    await fs.writeFile(store.filePath, '{not json');
    await expect(store.list()).rejects.toBeInstanceOf(TodoStoreError);

    await fs.writeFile(store.filePath, JSON.stringify([{ task: 1 }]));
    await expect(store.list()).rejects.toBeInstanceOf(TodoStoreError);
  });

  it('creates the directory on first save', async () => {
    const nested = TodoStore.inDirectory(path.join(dir, 'a', 'b'), fixedNow);
    await nested.add('Deep');

    expect(await nested.list()).toHaveLength(1);
  });
});
