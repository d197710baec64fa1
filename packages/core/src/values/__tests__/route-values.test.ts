import { describe, it, expect } from 'vitest';

import {
  RouteValueDictionary,
  RouteValueEqualityComparer,
  emptyRouteValues,
  fromRouteValues,
  toRouteValueString,
} from '../route-values.js';
import { ErrorCode } from '../../errors/codes.js';
import { InvalidArgumentError } from '../../types/errors.js';

describe('RouteValueDictionary', () => {
  it('looks keys up case-insensitively and keeps the first casing', () => {
    const values = new RouteValueDictionary<number>();
    values.set('Id', 1);
    values.set('ID', 2);

    expect(values.get('id')).toBe(2);
    expect(values.has('iD')).toBe(true);
    expect(Array.from(values.keys())).toEqual(['Id']);
    expect(values.toObject()).toEqual({ Id: 2 });
  });

  it('keeps insertion order', () => {
    const values = new RouteValueDictionary<string>();
    values.set('b', 'x').set('a', 'y');
    expect(Array.from(values)).toEqual([
      ['b', 'x'],
      ['a', 'y'],
    ]);
    expect(Array.from(values.values())).toEqual(['x', 'y']);
  });

  it('rejects add() of a key that differs only by case', () => {
    const values = new RouteValueDictionary();
    values.add('lang', 'en');
    try {
      values.add('LANG', 'fr');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({
        errorCode: ErrorCode.DUPLICATE_KEY,
        context: { key: 'LANG', value: 'fr' },
      });
    }
  });

  it('refuses writes once frozen', () => {
    const values = new RouteValueDictionary().set('a', 1).freeze();
    expect(values.isFrozen).toBe(true);
    expect(() => values.set('b', 2)).toThrow(
      'Cannot modify a frozen RouteValueDictionary'
    );
    expect(values.size).toBe(1);
  });
});

describe('emptyRouteValues', () => {
  it('returns one shared empty instance', () => {
    expect(emptyRouteValues()).toBe(emptyRouteValues());
    expect(emptyRouteValues().size).toBe(0);
  });
});

describe('fromRouteValues', () => {
  it('copies a plain object', () => {
    const input = { id: 1 };
    const values = fromRouteValues(input);
    input.id = 2;
    expect(values.get('ID')).toBe(1);
  });

  it('copies a Map', () => {
    const values = fromRouteValues(new Map([['lang', 'en']]));
    expect(values.toObject()).toEqual({ lang: 'en' });
  });

  it('rejects keys that collide case-insensitively', () => {
    expect(() => fromRouteValues({ id: 1, ID: 2 }, 'defaults')).toThrow(
      InvalidArgumentError
    );
  });

  it('rejects non-object input', () => {
    const input: Record<string, unknown> = JSON.parse('null');
    expect(() => fromRouteValues(input, 'defaults')).toThrow(
      "Route values for 'defaults' must be a plain object or a Map."
    );
  });
});

describe('toRouteValueString', () => {
  it('renders values the way they appear in a URL', () => {
    expect(toRouteValueString(null)).toBe('');
    expect(toRouteValueString(undefined)).toBe('');
    expect(toRouteValueString('abc')).toBe('abc');
    expect(toRouteValueString(5)).toBe('5');
    expect(toRouteValueString(true)).toBe('true');
    expect(toRouteValueString(new Date(Date.UTC(2024, 0, 2)))).toBe(
      '2024-01-02T00:00:00.000Z'
    );
  });
});

describe('RouteValueEqualityComparer', () => {
  const { equals } = RouteValueEqualityComparer;

  it('treats null, undefined and the empty string as the same no-value', () => {
    expect(equals('', null)).toBe(true);
    expect(equals(undefined, '')).toBe(true);
    expect(equals(null, undefined)).toBe(true);
  });

  it('never equates a value with no-value', () => {
    expect(equals('', 'x')).toBe(false);
    expect(equals(0, null)).toBe(false);
  });

  it('compares string forms case-insensitively', () => {
    expect(equals(5, '5')).toBe(true);
    expect(equals('Index', 'index')).toBe(true);
    expect(equals('en', 'fr')).toBe(false);
  });
});
