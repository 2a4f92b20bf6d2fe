import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { TODO_FILE_NAME, TodoStore, type TodoItem } from './store.js';

export interface TodoCliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

const defaultIO: TodoCliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  },
};

export function renderTodoLines(items: TodoItem[]): string[] {
  if (items.length === 0) {
    return [chalk.yellow('📝 No todos found!')];
  }
  return [
    chalk.blue.bold('📋 Your todos:'),
    ...items.map((item, i) => {
      const status = item.done ? chalk.green('✓') : chalk.yellow('○');
      const task = item.done ? chalk.gray.strikethrough(item.task) : item.task;
      return `  ${i + 1}. ${status} ${task}`;
    }),
  ];
}

export function createTodoProgram(io: TodoCliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('todo')
    .description('Minimal todo list stored in a JSON file')
    .option('-f, --file <path>', 'Todo file to use', TODO_FILE_NAME);

  const store = () => new TodoStore(path.resolve(program.opts<{ file: string }>().file));

  program
    .command('add')
    .description('Add a new todo')
    .argument('<task>', 'Task description')
    .action(async (task: string) => {
      const item = await store().add(task);
      io.out(`✅ Added: ${chalk.green(item.task)}`);
    });

  program
    .command('list')
    .description('List all todos')
    .action(async () => {
      const items = await store().list();
      for (const line of renderTodoLines(items)) {
        io.out(line);
      }
    });

  program
    .command('done')
    .description('Mark a todo as complete')
    .argument('<index>', 'Number of the todo (starting from 1)')
    .action(async (value: string) => {
      const index = Number(value);
      if (!value.trim() || !Number.isInteger(index)) {
        io.err(chalk.red('❌ Invalid todo number'));
        io.setExitCode(1);
        return;
      }
      const result = await store().complete(index);
      switch (result.status) {
        case 'completed':
          io.out(`🎉 Completed: ${chalk.green(result.item.task)}`);
          break;
        case 'already_done':
          io.out(chalk.yellow(`Todo "${result.item.task}" is already marked as done`));
          break;
        case 'empty':
        case 'invalid_index':
          io.err(chalk.red('❌ Invalid todo number'));
          io.setExitCode(1);
          break;
      }
    });

  return program;
}
