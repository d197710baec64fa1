import { describe, it, expect } from 'vitest';
import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

function half(n: number): Result<number, string> {
  return n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
}

describe('Result', () => {
  it('wraps success values', () => {
    const result = ok(4);
    expect(result).toBeInstanceOf(Ok);
    expect(result.isOk()).toBe(true);
    expect(result.isErr()).toBe(false);
    expect(result.unwrap()).toBe(4);
    expect(result.map((n) => n + 1).value).toBe(5);
  });

  it('wraps errors', () => {
    const result = err('nope');
    expect(result).toBeInstanceOf(Err);
    expect(result.isErr()).toBe(true);
    expect(result.map()).toBe(result);
  });

  it('chains steps and stops at the first error', () => {
    const once = ok(8).andThen(half);
    const twice = isOk(once) ? once.andThen(half) : once;
    expect(isOk(twice) && twice.value).toBe(2);

    const odd = half(6);
    expect(isOk(odd)).toBe(true);
    const failed = isOk(odd) ? odd.andThen(half) : odd;
    expect(isErr(failed) && failed.error).toBe('3 is odd');
  });

  it('rethrows Error payloads on unwrap', () => {
    const cause = new TypeError('bad');
    expect(() => err(cause).unwrap()).toThrow(cause);
    expect(() => err('plain').unwrap()).toThrow(
      'Called unwrap on an Err value: plain'
    );
  });
});
