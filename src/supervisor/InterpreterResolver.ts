import { execFileSync } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { InterpreterNotFoundError } from './errors';

export type InterpreterResolver = (interpreter: string) => string;

type WhichRunner = (name: string) => string;

const runWhich: WhichRunner = (name) =>
  execFileSync('which', [ name ], { encoding: 'utf-8', stdio: [ 'ignore', 'pipe', 'ignore' ] });

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * A bare name is looked up on PATH with `which`; anything containing a path
 * separator must point at an executable file.
 */
export function createInterpreterResolver(which: WhichRunner = runWhich): InterpreterResolver {
  return (interpreter: string): string => {
    if (interpreter.includes(path.sep)) {
      const resolved = path.resolve(interpreter);
      if (!isExecutable(resolved)) {
        throw new InterpreterNotFoundError(interpreter);
      }
      return resolved;
    }

    let output: string;
    try {
      output = which(interpreter);
    } catch {
      // which exits non-zero when nothing matches
      throw new InterpreterNotFoundError(interpreter);
    }
    const resolved = output.split('\n')[0]?.trim();
    if (!resolved) {
      throw new InterpreterNotFoundError(interpreter);
    }
    return resolved;
  };
}
