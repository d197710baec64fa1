import { describe, it, expect, vi } from 'vitest';

import { DIAGNOSTIC_CODES, resolveOptions } from '@routeforge/core';
import { printEffectiveConfig, printNotes } from './debug.js';

describe('debug output', () => {
  it('prints a note count followed by one line per note', () => {
    const spy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    try {
      printNotes('group.json', [
        { code: DIAGNOSTIC_CODES.UNBOUND_DEFAULT, key: 'area' },
        {
          code: DIAGNOSTIC_CODES.POLICIES_MERGED,
          key: 'id',
          details: { outOfLine: 1, inline: 1 },
        },
      ]);

      expect(spy.mock.calls.map((call) => String(call[0]))).toEqual([
        '[routeforge] notes(group.json): 2\n',
        '[routeforge] UNBOUND_DEFAULT area\n',
        '[routeforge] POLICIES_MERGED id {"outOfLine":1,"inline":1}\n',
      ]);
    } finally {
      spy.mockRestore();
    }
  });

  it('reports a custom comparer without printing it', () => {
    const spy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    try {
      printEffectiveConfig(
        resolveOptions({
          valueComparer: { equals: (a, b) => a === b },
          collectNotes: false,
        })
      );

      expect(String(spy.mock.calls[0]?.[0])).toBe(
        '[routeforge] effective config: {"valueComparer":"custom","collectNotes":false}\n'
      );
    } finally {
      spy.mockRestore();
    }
  });
});
