import { describe, it, expect } from 'vitest';
import { RoundtripError, errnoCode, exitCodeFor, toRoundtripError } from '../errors.js';

describe('error mapping', () => {
  it('maps each code to a non-zero exit status', () => {
    expect(exitCodeFor('IO_ERROR')).toBe(74);
    expect(exitCodeFor('PARSE_ERROR')).toBe(65);
    expect(exitCodeFor('FORMAT_ERROR')).toBe(65);
    expect(exitCodeFor('NUMBER_ERROR')).toBe(65);
    expect(exitCodeFor('BAD_INPUT')).toBe(64);
    expect(exitCodeFor('INTERNAL')).toBe(70);
  });

  it('lets an explicit exit code win', () => {
    const err = new RoundtripError('IO_ERROR', 'disk', undefined, 1);
    expect(err.exitCode).toBe(1);
    expect(err.name).toBe('RoundtripError');
    expect(err).toBeInstanceOf(Error);
  });

  it('passes RoundtripError through unchanged', () => {
    const err = new RoundtripError('PARSE_ERROR', 'bad');
    expect(toRoundtripError(err)).toBe(err);
  });

  it('keeps a known code carried by a plain error', () => {
    const err = toRoundtripError(Object.assign(new Error('disk'), { code: 'IO_ERROR' }));
    expect(err.code).toBe('IO_ERROR');
    expect(err.message).toBe('disk');
  });

  it('maps unknown errors to INTERNAL', () => {
    const err = toRoundtripError(Object.assign(new Error('weird'), { code: 'EWHAT' }));
    expect(err.code).toBe('INTERNAL');
    expect(err.exitCode).toBe(70);
    expect(toRoundtripError('boom').message).toBe('boom');
    expect(toRoundtripError(42).message).toBe('Internal error');
  });

  it('reads errno codes', () => {
    expect(errnoCode(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe('EACCES');
    expect(errnoCode(new Error('x'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});
