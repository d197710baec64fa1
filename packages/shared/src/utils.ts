// Shared utilities for routeforge packages

import type { NoteSummary } from './types.js';

export const formatNote = (note: NoteSummary): string => {
  const details =
    note.details === undefined ? '' : ` ${JSON.stringify(note.details)}`;
  return `[routeforge] ${note.code} ${note.key}${details}`;
};
