import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ToolArgumentError } from '../errors.js';
import { MAX_CHARS, formatUnifiedDiff, getFileContent, listFiles, overwriteFile, replaceStrFile } from './files.js';
import type { ToolContext } from './types.js';

let workDir: string;
let context: ToolContext;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-files-'));
  context = { workingDirectory: workDir, python: 'python3' };
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

describe('list_files', () => {
  it('lists entries sorted by name and marks directories', async () => {
    await fs.writeFile(path.join(workDir, 'b.txt'), 'b');
    await fs.writeFile(path.join(workDir, 'a.txt'), 'a');
    await fs.mkdir(path.join(workDir, 'src'));

    expect(await listFiles.invoke({}, context)).toBe('- a.txt\n- b.txt\n- src (dir)');
  });

  it('lists a subdirectory', async () => {
    await fs.mkdir(path.join(workDir, 'src'));
    await fs.writeFile(path.join(workDir, 'src', 'main.py'), 'print(1)');

    expect(await listFiles.invoke({ directory: 'src' }, context)).toBe('- main.py');
  });

  it('reports an empty directory', async () => {
    expect(await listFiles.invoke({}, context)).toBe('No files found in "."');
  });

  it('refuses to leave the working directory', async () => {
    expect(await listFiles.invoke({ directory: '..' }, context)).toBe(
      'Error: Cannot list ".." as it is outside the permitted working directory'
    );
  });

  it('reports missing directories and files given as directories', async () => {
    await fs.writeFile(path.join(workDir, 'a.txt'), 'a');

    expect(await listFiles.invoke({ directory: 'nope' }, context)).toBe('Error: Directory "nope" does not exist');
    expect(await listFiles.invoke({ directory: 'a.txt' }, context)).toBe('Error: "a.txt" is not a directory');
  });
});

describe('get_file_content', () => {
  it('returns the file content', async () => {
    await fs.writeFile(path.join(workDir, 'main.py'), 'print("hi")\n');

    expect(await getFileContent.invoke({ file_path: 'main.py' }, context)).toBe('print("hi")\n');
  });

  it('truncates long files', async () => {
    await fs.writeFile(path.join(workDir, 'big.txt'), 'x'.repeat(MAX_CHARS + 5));

    expect(await getFileContent.invoke({ file_path: 'big.txt' }, context)).toBe(
      `${'x'.repeat(MAX_CHARS)}\n[...File "big.txt" truncated at ${MAX_CHARS} characters]`
    );
  });

  it('does not truncate a file of exactly the limit', async () => {
    await fs.writeFile(path.join(workDir, 'exact.txt'), 'y'.repeat(MAX_CHARS));

    expect(await getFileContent.invoke({ file_path: 'exact.txt' }, context)).toBe('y'.repeat(MAX_CHARS));
  });

  it('reports errors as text', async () => {
    await fs.mkdir(path.join(workDir, 'src'));

    expect(await getFileContent.invoke({ file_path: '../etc/passwd' }, context)).toBe(
      'Error: Cannot read "../etc/passwd" as it is outside the permitted working directory'
    );
    expect(await getFileContent.invoke({ file_path: 'missing.txt' }, context)).toBe(
      'Error: File "missing.txt" does not exist'
    );
    expect(await getFileContent.invoke({ file_path: 'src' }, context)).toBe('Error: "src" is not a file');
  });

  it('rejects a call without file_path', async () => {
    await expect(getFileContent.invoke({}, context)).rejects.toBeInstanceOf(ToolArgumentError);
  });
});

describe('overwrite_file', () => {
  it('creates parent directories and writes the content', async () => {
    const result = await overwriteFile.invoke({ file_path: 'notes/today.md', content: 'hi' }, context);

    expect(result).toBe('Successfully wrote to "notes/today.md" (2 characters written)');
    expect(await fs.readFile(path.join(workDir, 'notes', 'today.md'), 'utf-8')).toBe('hi');
  });

  it('replaces existing content', async () => {
    await fs.writeFile(path.join(workDir, 'a.txt'), 'old content');
    await overwriteFile.invoke({ file_path: 'a.txt', content: 'new' }, context);

    expect(await fs.readFile(path.join(workDir, 'a.txt'), 'utf-8')).toBe('new');
  });

  it('refuses to write outside the working directory', async () => {
    expect(await overwriteFile.invoke({ file_path: '../evil.txt', content: 'x' }, context)).toBe(
      'Error: Cannot write to "../evil.txt" as it is outside the permitted working directory'
    );
    await expect(fs.stat(path.join(workDir, '..', 'evil.txt'))).rejects.toThrow();
  });
});

describe('replace_str_file', () => {
  it('replaces the string and returns a unified diff', async () => {
    await fs.writeFile(path.join(workDir, 'greeting.txt'), 'hello world\n');

    const result = await replaceStrFile.invoke(
      { file_path: 'greeting.txt', old_str: 'world', new_str: 'there' },
      context
    );

    expect(result.startsWith('--- a/greeting.txt\n+++ b/greeting.txt\n@@ ')).toBe(true);
    expect(result).toContain('-hello world\n+hello there');
    expect(await fs.readFile(path.join(workDir, 'greeting.txt'), 'utf-8')).toBe('hello there\n');
  });

  it('replaces every occurrence and keeps dollar signs literal', async () => {
    await fs.writeFile(path.join(workDir, 'a.txt'), 'a-a-a');

    await replaceStrFile.invoke({ file_path: 'a.txt', old_str: 'a', new_str: '$&b' }, context);

    expect(await fs.readFile(path.join(workDir, 'a.txt'), 'utf-8')).toBe('$&b-$&b-$&b');
  });

  it('reports a missing string without touching the file', async () => {
    await fs.writeFile(path.join(workDir, 'greeting.txt'), 'hello world\n');

    expect(
      await replaceStrFile.invoke({ file_path: 'greeting.txt', old_str: 'zzz', new_str: 'y' }, context)
    ).toBe('Error: String "zzz" not found in file "greeting.txt"');
    expect(await fs.readFile(path.join(workDir, 'greeting.txt'), 'utf-8')).toBe('hello world\n');
  });

  it('reports a missing file, an empty search string and an outside path', async () => {
    expect(await replaceStrFile.invoke({ file_path: 'nope.txt', old_str: 'a', new_str: 'b' }, context)).toBe(
      'Error: File "nope.txt" does not exist'
    );
    expect(await replaceStrFile.invoke({ file_path: 'nope.txt', old_str: '', new_str: 'b' }, context)).toBe(
      'Error: old_str must not be empty'
    );
    expect(await replaceStrFile.invoke({ file_path: '../x.txt', old_str: 'a', new_str: 'b' }, context)).toBe(
      'Error: Cannot access "../x.txt" as it is outside the permitted working directory'
    );
  });

  it('says so when the replacement changes nothing', async () => {
    await fs.writeFile(path.join(workDir, 'a.txt'), 'same');

    expect(await replaceStrFile.invoke({ file_path: 'a.txt', old_str: 'same', new_str: 'same' }, context)).toBe(
      'No changes: replacing "same" with "same" leaves a.txt unchanged'
    );
  });
});

describe('formatUnifiedDiff', () => {
  it('keeps unchanged neighbours as context', () => {
    const diff = formatUnifiedDiff('main.py', 'one\ntwo\nthree\n', 'one\n2\nthree\n');

    expect(diff).toContain(' one\n-two\n+2\n three');
  });
});
