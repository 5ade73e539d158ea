import { asRecords, type RawRecord, type ShapeMatcher } from './shape.js';

export const topLevelArrayShape: ShapeMatcher = {
  name: 'top-level-array',
  description: 'Array of rule records',

  matches(value: unknown): boolean {
    return Array.isArray(value);
  },

  extract(value: unknown): Iterable<RawRecord> {
    return asRecords(Array.isArray(value) ? value : []);
  },
};
