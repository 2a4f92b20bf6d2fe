import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { TodoStoreError } from '../errors.js';

export const TODO_FILE_NAME = 'todos.json';

const TodoItemSchema = z.object({
  task: z.string(),
  done: z.boolean(),
  created: z.string().optional(),
  completed: z.string().optional(),
});

const TodoListSchema = z.array(TodoItemSchema);

export type TodoItem = z.infer<typeof TodoItemSchema>;

export type CompleteResult =
  | { status: 'completed'; item: TodoItem }
  | { status: 'already_done'; item: TodoItem }
  | { status: 'empty' }
  | { status: 'invalid_index'; count: number };

/**
 * Flat JSON file holding the todo list. The whole file is rewritten on every change.
 */
export class TodoStore {
  readonly filePath: string;
  private now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
  }

  static inDirectory(directory: string, now?: () => Date): TodoStore {
    return new TodoStore(path.join(directory, TODO_FILE_NAME), now);
  }

  async load(): Promise<TodoItem[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    if (!content.trim()) {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new TodoStoreError(`${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = TodoListSchema.safeParse(data);
    if (!parsed.success) {
      throw new TodoStoreError(`${this.filePath} does not contain a todo list`, { cause: parsed.error });
    }
    return parsed.data;
  }

  async save(items: TodoItem[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(items, null, 2), 'utf-8');
  }

  async add(task: string): Promise<TodoItem> {
    if (!task.trim()) {
      throw new TodoStoreError('Task description must not be empty');
    }

    const items = await this.load();
    const item: TodoItem = { task, done: false, created: this.now().toISOString() };
    items.push(item);
    await this.save(items);
    return item;
  }

  async list(): Promise<TodoItem[]> {
    return this.load();
  }

  /**
   * Mark the item at a 1-based position as done.
   */
  async complete(index: number): Promise<CompleteResult> {
    const items = await this.load();
    if (items.length === 0) {
      return { status: 'empty' };
    }
    if (!Number.isInteger(index) || index < 1 || index > items.length) {
      return { status: 'invalid_index', count: items.length };
    }

    const item = items[index - 1];
    if (item.done) {
      return { status: 'already_done', item };
    }

    item.done = true;
    item.completed = this.now().toISOString();
    await this.save(items);
    return { status: 'completed', item };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
