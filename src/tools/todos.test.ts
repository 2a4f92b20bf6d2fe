import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ToolArgumentError } from '../errors.js';
import { formatTodoList, todoAdd, todoDone, todoList } from './todos.js';
import type { ToolContext } from './types.js';

let workDir: string;
let context: ToolContext;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-todo-tools-'));
  context = { workingDirectory: workDir, python: 'python3' };
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe('formatTodoList', () => {
  it('has a message for an empty list', () => {
    expect(formatTodoList([])).toBe('📝 No todos found!');
  });
});

describe('todo tools', () => {
  it('adds, lists and completes todos in the working directory', async () => {
    expect(await todoAdd.invoke({ task: 'Write tests' }, context)).toBe('✅ Added: Write tests');
    expect(await todoAdd.invoke({ task: 'Ship it' }, context)).toBe('✅ Added: Ship it');
    expect(await todoDone.invoke({ index: 1 }, context)).toBe('🎉 Completed: Write tests');

    expect(await todoList.invoke({}, context)).toBe('📋 Your todos:\n  1. ✓ ~~Write tests~~\n  2. ○ Ship it');
    await expect(fs.stat(path.join(workDir, 'todos.json'))).resolves.toBeTruthy();
  });

  it('reports problems completing todos', async () => {
    expect(await todoDone.invoke({ index: 1 }, context)).toBe('❌ No todos found!');

    await todoAdd.invoke({ task: 'Write tests' }, context);
    expect(await todoDone.invoke({ index: 4 }, context)).toBe('❌ Invalid todo number');

    await todoDone.invoke({ index: 1 }, context);
    expect(await todoDone.invoke({ index: 1 }, context)).toBe('Todo "Write tests" is already marked as done');
  });

  it('accepts a list call with no arguments', async () => {
    expect(await todoList.invoke(undefined, context)).toBe('📝 No todos found!');
  });

  it('checks argument types', async () => {
    await expect(todoDone.invoke({ index: '1' }, context)).rejects.toBeInstanceOf(ToolArgumentError);
  });
});
