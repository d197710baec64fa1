import {
  RouteValueEqualityComparer,
  type PatternNote,
  type ResolvedPatternOptions,
} from '@routeforge/core';
import { formatNote } from '@routeforge/shared';

/**
 * Print merge notes to stderr. Used behind --debug-passes.
 */
export function printNotes(label: string, notes: readonly PatternNote[]): void {
  process.stderr.write(`[routeforge] notes(${label}): ${notes.length}\n`);
  for (const note of notes) {
    process.stderr.write(`${formatNote(note)}\n`);
  }
}

export function printEffectiveConfig(options: ResolvedPatternOptions): void {
  const view = {
    valueComparer:
      options.valueComparer === RouteValueEqualityComparer
        ? 'default'
        : 'custom',
    collectNotes: options.collectNotes,
  };
  process.stderr.write(
    `[routeforge] effective config: ${JSON.stringify(view)}\n`
  );
}
