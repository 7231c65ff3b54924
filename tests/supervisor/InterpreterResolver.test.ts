import { describe, it, expect, vi } from 'vitest';
import { createInterpreterResolver } from '../../src/supervisor/InterpreterResolver';
import { InterpreterNotFoundError } from '../../src/supervisor/errors';

describe('createInterpreterResolver', () => {
  it('looks bare names up with which', () => {
    const which = vi.fn((_name: string) => '/usr/bin/python3\n');
    const resolve = createInterpreterResolver(which);

    expect(resolve('python3')).toBe('/usr/bin/python3');
    expect(which).toHaveBeenCalledWith('python3');
  });

  it('fails when which finds nothing', () => {
    const failing = createInterpreterResolver(() => {
      throw new Error('exit code 1');
    });
    expect(() => failing('python3')).toThrow(InterpreterNotFoundError);
    expect(() => failing('python3')).toThrow('Interpreter not found: python3');

    const empty = createInterpreterResolver(() => '\n');
    expect(() => empty('python3')).toThrow(InterpreterNotFoundError);
  });

  it('accepts a path to an executable without consulting which', () => {
    const which = vi.fn((_name: string) => '');
    const resolve = createInterpreterResolver(which);

    expect(resolve(process.execPath)).toBe(process.execPath);
    expect(which).not.toHaveBeenCalled();
    expect(() => resolve('/nonexistent/bin/python3')).toThrow(InterpreterNotFoundError);
  });
});
