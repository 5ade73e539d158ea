import { asRecords, findArray, type RawRecord, type ShapeMatcher } from './shape.js';

const KEYS = ['results', 'checks', 'findings', 'items', 'controls'] as const;

// Generic scanner exports: { "findings": [ ... ] } and friends
export const flatCollectionShape: ShapeMatcher = {
  name: 'flat-collection',
  description: 'Object with a results, checks, findings, items or controls array',

  matches(value: unknown): boolean {
    return findArray(value, KEYS) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    return asRecords(findArray(value, KEYS) ?? []);
  },
};
