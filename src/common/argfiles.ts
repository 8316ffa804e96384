import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ConfigurationError } from './errors';

/**
 * Expand `@path` arguments into the lines of the named file.
 *
 * Each non-empty line that does not start with `#` becomes one argument.
 * Files may reference further files; relative paths resolve against the
 * directory of the file naming them (or `cwd` on the command line).
 */
export async function expandArgumentFiles(args: string[], cwd = process.cwd()): Promise<string[]> {
  return expand(args, cwd, []);
}

async function expand(args: string[], baseDir: string, stack: string[]): Promise<string[]> {
  const result: string[] = [];
  for (const arg of args) {
    if (!arg.startsWith('@') || arg.length === 1) {
      result.push(arg);
      continue;
    }
    const path = resolve(baseDir, arg.slice(1));
    if (stack.includes(path)) {
      throw new ConfigurationError(`Argument file ${path} includes itself`, { chain: [...stack, path] });
    }
    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read argument file ${path}`, { path }, { cause: error });
    }
    const lines = contents
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'));
    result.push(...(await expand(lines, dirname(path), [...stack, path])));
  }
  return result;
}
