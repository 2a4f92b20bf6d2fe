import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { defineTool } from './types.js';
import { outsideDirectoryMessage, resolveScopedPath } from './sandbox.js';

const execFileAsync = promisify(execFile);

export const PYTHON_TIMEOUT_MS = 30_000;
export const PYTHON_MAX_BUFFER = 10 * 1024 * 1024;

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('stdout' in error || 'killed' in error);
}

export function formatProcessOutput(stdout: string, stderr: string, exitCode: number): string {
  const parts: string[] = [];
  if (stdout.trim()) {
    parts.push(`STDOUT:\n${stdout.trimEnd()}`);
  }
  if (stderr.trim()) {
    parts.push(`STDERR:\n${stderr.trimEnd()}`);
  }
  if (exitCode !== 0) {
    parts.push(`Process exited with code ${exitCode}`);
  }
  return parts.length > 0 ? parts.join('\n') : 'No output produced.';
}

export const runPythonFile = defineTool({
  name: 'run_python_file',
  description:
    'Executes a Python file within the working directory and returns its output. Runs with a 30 second timeout.',
  schema: z.object({
    file_path: z.string().describe('Path to the Python file to execute, relative to the working directory.'),
    args: z
      .array(z.string())
      .optional()
      .describe('Optional command-line arguments passed to the script.'),
  }),
  run: async ({ file_path, args = [] }, { workingDirectory, python }) => {
    const target = resolveScopedPath(workingDirectory, file_path);
    if (!target) {
      return outsideDirectoryMessage('execute', file_path);
    }
    if (!file_path.endsWith('.py')) {
      return `Error: "${file_path}" is not a Python file`;
    }

    try {
      const stats = await fs.stat(target);
      if (!stats.isFile()) {
        return `Error: File "${file_path}" not found`;
      }
    } catch {
      return `Error: File "${file_path}" not found`;
    }

    try {
      const { stdout, stderr } = await execFileAsync(python, [target, ...args], {
        cwd: workingDirectory,
        timeout: PYTHON_TIMEOUT_MS,
        maxBuffer: PYTHON_MAX_BUFFER,
        encoding: 'utf-8',
      });
      return formatProcessOutput(stdout, stderr, 0);
    } catch (error) {
      if (!isExecFailure(error)) {
        throw error;
      }
      // Node also sets `killed` here, so this must come before the timeout check
      if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
        return `Error: Output of "${file_path}" exceeded ${PYTHON_MAX_BUFFER / (1024 * 1024)} MB`;
      }
      if (error.killed) {
        return `Error: Execution of "${file_path}" timed out after ${PYTHON_TIMEOUT_MS / 1000} seconds`;
      }
      if (typeof error.code === 'number') {
        return formatProcessOutput(error.stdout ?? '', error.stderr ?? '', error.code);
      }
      return `Error: executing Python file: ${error.message}`;
    }
  },
});
