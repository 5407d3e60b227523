import { describe, it, expect } from 'vitest';
import { Ok, Err, unwrap, isOk, isErr } from '../src/types/results.js';

describe('Result', () => {
  it('unwraps an Ok value', () => {
    expect(unwrap(Ok(3))).toBe(3);
  });

  it('rethrows an Err that holds an Error', () => {
    const error = new Error('boom');
    expect(() => unwrap(Err(error))).toThrow(error);
  });

  it('wraps any other Err payload in an Error', () => {
    expect(() => unwrap(Err('not found'))).toThrow('not found');
  });

  it('narrows with isOk and isErr', () => {
    const ok = Ok('value');
    const err = Err([{ field: 'title', message: 'Title is required' }]);
    expect(isOk(ok) && isErr(err)).toBe(true);
    expect(isErr(ok) || isOk(err)).toBe(false);
  });
});
