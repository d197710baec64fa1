import { describe, it, expect } from 'vitest';
import { describeValue } from '../describe-value.js';

class Slug {}

describe('describeValue', () => {
  it('renders primitives', () => {
    expect(describeValue(null)).toBe('null');
    expect(describeValue(undefined)).toBe('undefined');
    expect(describeValue('en')).toBe("'en'");
    expect(describeValue(5)).toBe('5');
    expect(describeValue(10n)).toBe('10n');
    expect(describeValue(false)).toBe('false');
  });

  it('renders arrays element by element', () => {
    expect(describeValue(['a', 1])).toBe("['a', 1]");
  });

  it('names class instances and prints plain objects as JSON', () => {
    expect(describeValue(new Slug())).toBe('Slug');
    expect(describeValue({ a: 1 })).toBe('{"a":1}');
  });

  it('falls back to String() when JSON fails', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(describeValue(cyclic)).toBe('[object Object]');
  });
});
