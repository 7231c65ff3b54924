import fs, { createReadStream } from 'node:fs';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { StringDecoder } from 'node:string_decoder';
import type { OutputStream } from './types';

const TAIL_WINDOW_BYTES = 1024 * 100;

/**
 * Last `count` lines of a file, read from its final 100KB. `endOffset` caps the
 * read at an earlier size of the file.
 */
export async function readLastLines(filePath: string, count: number, endOffset?: number): Promise<string[]> {
  if (count <= 0 || !fs.existsSync(filePath)) {
    return [];
  }

  const size = Math.min(endOffset ?? Infinity, fs.statSync(filePath).size);
  if (size <= 0) {
    return [];
  }
  const start = Math.max(0, size - TAIL_WINDOW_BYTES);
  const stream = createReadStream(filePath, { start, end: size - 1 });
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  const lines: string[] = [];
  let first = true;
  for await (const line of rl) {
    // the window may start mid-line
    if (first && start > 0) {
      first = false;
      continue;
    }
    first = false;
    lines.push(line);
    if (lines.length > count) {
      lines.shift();
    }
  }
  return lines;
}

export interface FollowOptions {
  initialLines: number;
  signal?: AbortSignal;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Prints the tail of the file, then everything appended to it until the signal
 * aborts. The parent directory is watched so that a removed or rotated file is
 * picked up again once it reappears; a new or shrunk file is read from the top.
 */
export async function followLogFile(filePath: string, output: OutputStream, options: FollowOptions): Promise<void> {
  const initial = fs.statSync(filePath);
  for (const line of await readLastLines(filePath, options.initialLines, initial.size)) {
    output.write(`${line}\n`);
  }

  const { signal } = options;
  if (signal?.aborted) {
    return;
  }

  let position = initial.size;
  let inode = initial.ino;
  let decoder = new StringDecoder('utf8');

  const restartFromTop = (): void => {
    position = 0;
    decoder = new StringDecoder('utf8');
  };

  const readNewData = (): void => {
    const stats = fs.statSync(filePath);
    if (stats.ino !== inode || stats.size < position) {
      inode = stats.ino;
      restartFromTop();
    }
    if (stats.size === position) {
      return;
    }
    const length = stats.size - position;
    const buffer = Buffer.alloc(length);
    const fd = fs.openSync(filePath, 'r');
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(fd, buffer, 0, length, position);
    } finally {
      fs.closeSync(fd);
    }
    position += bytesRead;
    const text = decoder.write(buffer.subarray(0, bytesRead));
    if (text) {
      output.write(text);
    }
  };

  const fileName = path.basename(filePath);

  await new Promise<void>((resolve, reject) => {
    const watcher = fs.watch(path.dirname(filePath), { persistent: true }, (_event, changed) => {
      if (changed && changed !== fileName) {
        return;
      }
      try {
        readNewData();
      } catch (error: unknown) {
        if (isMissingFile(error)) {
          restartFromTop();
          return;
        }
        cleanup();
        reject(error);
      }
    });

    const cleanup = (): void => {
      watcher.close();
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = (): void => {
      cleanup();
      resolve();
    };

    signal?.addEventListener('abort', onAbort);

    watcher.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
