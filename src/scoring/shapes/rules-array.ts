import { asRecords, findArray, type RawRecord, type ShapeMatcher } from './shape.js';

const KEYS = ['Rules', 'rules'] as const;

// { "Rules": [ ... ] }
export const rulesArrayShape: ShapeMatcher = {
  name: 'rules-array',
  description: 'Object with a top-level Rules array',

  matches(value: unknown): boolean {
    return findArray(value, KEYS) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    return asRecords(findArray(value, KEYS) ?? []);
  },
};
