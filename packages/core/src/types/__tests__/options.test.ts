import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions } from '../options.js';
import { ConfigError } from '../errors.js';
import { RouteValueEqualityComparer } from '../../values/route-values.js';

describe('PatternOptions', () => {
  it('applies all defaults when no options are provided', () => {
    const resolved = resolveOptions();
    expect(resolved.valueComparer).toBe(RouteValueEqualityComparer);
    expect(resolved.collectNotes).toBe(true);
  });

  it('keeps provided values', () => {
    const comparer = { equals: () => false };
    const resolved = resolveOptions({
      valueComparer: comparer,
      collectNotes: false,
    });
    expect(resolved).toEqual({ valueComparer: comparer, collectNotes: false });
  });

  it('exposes frozen defaults', () => {
    expect(Object.isFrozen(DEFAULT_OPTIONS)).toBe(true);
  });

  it('rejects a comparer without equals()', () => {
    const options = JSON.parse('{"valueComparer":{}}');
    try {
      resolveOptions(options);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message: 'valueComparer must be an object with an equals(left, right) method',
        context: { setting: 'valueComparer' },
      });
    }
  });

  it('rejects a non-boolean collectNotes', () => {
    const options = JSON.parse('{"collectNotes":"yes"}');
    expect(() => resolveOptions(options)).toThrow(
      'collectNotes must be a boolean'
    );
  });
});
