import { describe, it, expect } from 'vitest';
import {
  calculateDistance,
  didYouMean,
  suggestRequiredValueFix,
} from '../../errors/suggestions.js';

describe('Suggestion Helpers', () => {
  it('calculateDistance behaves reasonably for basics', () => {
    expect(calculateDistance('abc', 'abc')).toBe(0);
    expect(calculateDistance('abc', 'ab')).toBe(1);
    expect(calculateDistance('', 'abcd')).toBe(4);
  });

  it('didYouMean finds close matches ignoring case', () => {
    expect(didYouMean('stirng', ['string', 'number'])).toEqual(['string']);
    expect(didYouMean('ID', ['id', 'name'])).toEqual(['id']);
  });

  it('didYouMean returns at most three matches, closest first', () => {
    expect(didYouMean('ab', ['xx', 'ax', 'ab', 'ay', 'az'])).toEqual([
      'ab',
      'ax',
      'ay',
    ]);
  });

  it('suggests a close parameter or default name for a required value', () => {
    expect(suggestRequiredValueFix('aera', ['area'], ['area'])).toEqual([
      "Did you mean 'area'?",
      "Add a '{aera}' parameter to the template, or a default 'aera' equal to the required value.",
    ]);
  });

  it('never suggests the key itself', () => {
    expect(suggestRequiredValueFix('Action', ['action', 'id'], [])).toEqual([
      "Add a '{Action}' parameter to the template, or a default 'Action' equal to the required value.",
    ]);
  });
});
