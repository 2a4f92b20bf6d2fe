import * as fs from 'fs/promises';
import * as path from 'path';
import { structuredPatch } from 'diff';
import { z } from 'zod';
import { defineTool } from './types.js';
import { outsideDirectoryMessage, resolveScopedPath } from './sandbox.js';

export const MAX_CHARS = 100_000;

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export const listFiles = defineTool({
  name: 'list_files',
  description:
    'Lists files and directories in the specified directory, constrained to the working directory.',
  schema: z.object({
    directory: z
      .string()
      .optional()
      .describe(
        'The directory to list files from, relative to the working directory. If not provided, lists files in the working directory itself.'
      ),
  }),
  run: async ({ directory }, { workingDirectory }) => {
    const label = directory || '.';
    const target = resolveScopedPath(workingDirectory, directory);
    if (!target) {
      return outsideDirectoryMessage('list', label);
    }

    const stats = await statOrNull(target);
    if (!stats) {
      return `Error: Directory "${label}" does not exist`;
    }
    if (!stats.isDirectory()) {
      return `Error: "${label}" is not a directory`;
    }

    const entries = await fs.readdir(target, { withFileTypes: true });
    if (entries.length === 0) {
      return `No files found in "${label}"`;
    }

    return entries
      .map(entry => ({ name: entry.name, isDir: entry.isDirectory() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(entry => (entry.isDir ? `- ${entry.name} (dir)` : `- ${entry.name}`))
      .join('\n');
  },
});

export const getFileContent = defineTool({
  name: 'get_file_content',
  description: `Reads and returns the first ${MAX_CHARS} characters of the content from a specified file within the working directory.`,
  schema: z.object({
    file_path: z
      .string()
      .describe('The path to the file whose content should be read, relative to the working directory.'),
  }),
  run: async ({ file_path }, { workingDirectory }) => {
    const target = resolveScopedPath(workingDirectory, file_path);
    if (!target) {
      return outsideDirectoryMessage('read', file_path);
    }

    const stats = await statOrNull(target);
    if (!stats) {
      return `Error: File "${file_path}" does not exist`;
    }
    if (!stats.isFile()) {
      return `Error: "${file_path}" is not a file`;
    }

    const content = await fs.readFile(target, 'utf-8');
    if (content.length > MAX_CHARS) {
      return `${content.slice(0, MAX_CHARS)}\n[...File "${file_path}" truncated at ${MAX_CHARS} characters]`;
    }
    return content;
  },
});

export const overwriteFile = defineTool({
  name: 'overwrite_file',
  description: "Writes content to a file within the working directory. Creates the file if it doesn't exist.",
  schema: z.object({
    file_path: z.string().describe('Path to the file to write, relative to the working directory.'),
    content: z.string().describe('Content to write to the file'),
  }),
  run: async ({ file_path, content }, { workingDirectory }) => {
    const target = resolveScopedPath(workingDirectory, file_path);
    if (!target) {
      return outsideDirectoryMessage('write to', file_path);
    }

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
    return `Successfully wrote to "${file_path}" (${content.length} characters written)`;
  },
});

export const replaceStrFile = defineTool({
  name: 'replace_str_file',
  description: 'Replaces all occurrences of a string in a file and shows the diff of changes.',
  schema: z.object({
    file_path: z.string().describe('Path to the file to modify, relative to the working directory.'),
    old_str: z.string().describe('The string to find and replace.'),
    new_str: z.string().describe('The string to replace with.'),
  }),
  run: async ({ file_path, old_str, new_str }, { workingDirectory }) => {
    const target = resolveScopedPath(workingDirectory, file_path);
    if (!target) {
      return outsideDirectoryMessage('access', file_path);
    }
    if (!old_str) {
      return 'Error: old_str must not be empty';
    }

    const stats = await statOrNull(target);
    if (!stats || !stats.isFile()) {
      return `Error: File "${file_path}" does not exist`;
    }

    const original = await fs.readFile(target, 'utf-8');
    if (!original.includes(old_str)) {
      return `Error: String "${old_str}" not found in file "${file_path}"`;
    }

    // split/join keeps `$` sequences in new_str literal
    const updated = original.split(old_str).join(new_str);
    if (updated === original) {
      return `No changes: replacing "${old_str}" with "${new_str}" leaves ${file_path} unchanged`;
    }

    await fs.writeFile(target, updated, 'utf-8');
    return formatUnifiedDiff(file_path, original, updated);
  },
});

export function formatUnifiedDiff(filePath: string, before: string, after: string): string {
  const oldName = `a/${filePath}`;
  const newName = `b/${filePath}`;
  const patch = structuredPatch(oldName, newName, before, after, undefined, undefined, { context: 3 });

  const lines = [`--- ${oldName}`, `+++ ${newName}`];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
    lines.push(...hunk.lines);
  }
  return lines.join('\n');
}

export const fileTools = [listFiles, getFileContent, overwriteFile, replaceStrFile];
