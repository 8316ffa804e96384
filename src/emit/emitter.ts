import { readFile } from 'node:fs/promises';
import { Writable } from 'node:stream';
import { FileReadError } from '../common/errors';
import type { OutputMode } from '../config/types';
import type { SelectedFile } from '../selection';

export interface EmitterOptions {
  /** `content` concatenates the files, `include` prints `include : <path>` lines. */
  mode?: OutputMode;
  /** Precede each file's content with a `# source: <path>` comment. */
  separators?: boolean;
  /** Emit `<pathKey> = <mirror root>` as the first line. */
  pathKey?: string;
}

export interface EmitContext {
  /** mirror working tree, reported through the path key */
  root: string;
}

export interface EmitResult {
  files: number;
  bytes: number;
}

/**
 * Renders selected files into scheduler configuration. The whole text is
 * built before anything reaches the sink, so a failed read never leaves a
 * partial configuration behind.
 */
export class ConfigEmitter {
  private readonly mode: OutputMode;
  private readonly separators: boolean;
  private readonly pathKey?: string;

  constructor(options: EmitterOptions = {}) {
    this.mode = options.mode ?? 'content';
    this.separators = options.separators ?? false;
    this.pathKey = options.pathKey;
  }

  async render(files: SelectedFile[], context: EmitContext): Promise<string> {
    const parts: string[] = [];
    if (this.pathKey) {
      parts.push(`${this.pathKey} = ${context.root}\n`);
    }

    if (this.mode === 'include') {
      for (const file of files) {
        parts.push(`include : ${file.absolutePath}\n`);
      }
      return parts.join('');
    }

    for (const file of files) {
      let contents: string;
      try {
        contents = await readFile(file.absolutePath, 'utf8');
      } catch (error) {
        throw new FileReadError(file.absolutePath, { cause: error });
      }
      if (this.separators) {
        parts.push(`# source: ${file.relativePath}\n`);
      }
      if (contents === '') {
        continue;
      }
      // keep the last line of one file from running into the first of the next
      parts.push(contents.endsWith('\n') ? contents : `${contents}\n`);
    }
    return parts.join('');
  }

  async emit(files: SelectedFile[], sink: Writable, context: EmitContext): Promise<EmitResult> {
    const output = await this.render(files, context);
    const bytes = Buffer.byteLength(output, 'utf8');
    if (bytes > 0) {
      await writeAll(sink, output);
    }
    return { files: files.length, bytes };
  }
}

// a closed pipe reports EPIPE both to the callback and as an 'error' event
function writeAll(sink: Writable, output: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      reject(error);
    };
    sink.once('error', onError);
    sink.write(output, 'utf8', (error) => {
      if (error) {
        // the listener stays for the 'error' event that follows
        reject(error);
        return;
      }
      sink.off('error', onError);
      resolve();
    });
  });
}
