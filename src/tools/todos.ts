import { z } from 'zod';
import { defineTool } from './types.js';
import { TodoStore, type CompleteResult, type TodoItem } from '../todo/store.js';

export function formatTodoList(items: TodoItem[]): string {
  if (items.length === 0) {
    return '📝 No todos found!';
  }
  const lines = ['📋 Your todos:'];
  items.forEach((item, i) => {
    lines.push(item.done ? `  ${i + 1}. ✓ ~~${item.task}~~` : `  ${i + 1}. ○ ${item.task}`);
  });
  return lines.join('\n');
}

export function formatCompleteResult(result: CompleteResult): string {
  switch (result.status) {
    case 'completed':
      return `🎉 Completed: ${result.item.task}`;
    case 'already_done':
      return `Todo "${result.item.task}" is already marked as done`;
    case 'empty':
      return '❌ No todos found!';
    case 'invalid_index':
      return '❌ Invalid todo number';
  }
}

export const todoAdd = defineTool({
  name: 'todo_add',
  description: 'Add a new todo item to the todo list.',
  schema: z.object({
    task: z.string().describe('The task description to add to the todo list.'),
  }),
  run: async ({ task }, { workingDirectory }) => {
    const item = await TodoStore.inDirectory(workingDirectory).add(task);
    return `✅ Added: ${item.task}`;
  },
});

export const todoList = defineTool({
  name: 'todo_list',
  description: 'List all todo items showing their status (completed or pending).',
  schema: z.object({}),
  run: async (_args, { workingDirectory }) => {
    const items = await TodoStore.inDirectory(workingDirectory).list();
    return formatTodoList(items);
  },
});

export const todoDone = defineTool({
  name: 'todo_done',
  description: 'Mark a todo item as complete by its number (1-based index).',
  schema: z.object({
    index: z.number().int().describe('The number of the todo item to mark as complete (starting from 1).'),
  }),
  run: async ({ index }, { workingDirectory }) => {
    const result = await TodoStore.inDirectory(workingDirectory).complete(index);
    return formatCompleteResult(result);
  },
});

export const todoTools = [todoAdd, todoList, todoDone];
