// Prefix/suffix text delta for changed fields

import { TextDiff } from '../../models/change-set.js';
import { FieldValue } from '../../models/types.js';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Trims the longest common prefix and suffix of two strings.
 * The result is not a minimal diff; it reports one deleted and one
 * inserted span, and never splits a surrogate pair.
 */
export function textDiff(before: string, after: string): TextDiff {
  const limit = Math.min(before.length, after.length);

  let start = 0;
  while (start < limit && before.charCodeAt(start) === after.charCodeAt(start)) {
    start++;
  }
  if (start > 0 && isHighSurrogate(before.charCodeAt(start - 1))) {
    start--;
  }

  let end = 0;
  while (
    end < limit - start &&
    before.charCodeAt(before.length - 1 - end) === after.charCodeAt(after.length - 1 - end)
  ) {
    end++;
  }
  if (end > 0 && isLowSurrogate(before.charCodeAt(before.length - end))) {
    end--;
  }

  return {
    prefix: before.slice(0, start),
    deleted: before.slice(start, before.length - end),
    inserted: after.slice(start, after.length - end),
    suffix: before.slice(before.length - end)
  };
}

/**
 * Text used to compare a field value; absent and null read as empty
 */
export function fieldText(value: FieldValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

/**
 * Markers used when rendering a text diff inline
 */
export interface DiffMarkers {
  deleteOpen: string;
  deleteClose: string;
  insertOpen: string;
  insertClose: string;
}

const DEFAULT_MARKERS: DiffMarkers = {
  deleteOpen: '[-',
  deleteClose: '-]',
  insertOpen: '{+',
  insertClose: '+}'
};

/**
 * Renders a text diff inline, e.g. `brake fails{+ intermittently+}`
 */
export function formatTextDiff(diff: TextDiff, markers: DiffMarkers = DEFAULT_MARKERS): string {
  const deleted = diff.deleted ? `${markers.deleteOpen}${diff.deleted}${markers.deleteClose}` : '';
  const inserted = diff.inserted ? `${markers.insertOpen}${diff.inserted}${markers.insertClose}` : '';
  return `${diff.prefix}${deleted}${inserted}${diff.suffix}`;
}
