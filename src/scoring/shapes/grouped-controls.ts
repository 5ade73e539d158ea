import { findObject, isObject, type RawRecord, type ShapeMatcher } from './shape.js';

const RESULT_KEYS = ['Results', 'results'] as const;

function* extractGroups(results: Record<string, unknown>): Generator<RawRecord> {
  for (const [product, groups] of Object.entries(results)) {
    if (!Array.isArray(groups)) continue;

    for (const group of groups) {
      if (!isObject(group)) continue;
      const controls = group['Controls'];
      if (!Array.isArray(controls)) continue;

      const reference = group['GroupReferenceURL'];
      const groupUrl = typeof reference === 'string' && reference !== '' ? reference : undefined;

      for (const control of controls) {
        yield groupUrl === undefined
          ? { entry: control, service: product }
          : { entry: control, service: product, groupUrl };
      }
    }
  }
}

/**
 * ScubaGoggles 0.5 layout:
 * { "Results": { "gmail": [ { "GroupReferenceURL": "...", "Controls": [ ... ] } ] } }
 */
export const groupedControlsShape: ShapeMatcher = {
  name: 'grouped-controls',
  description: 'Results object keyed by product, each a list of control groups',

  matches(value: unknown): boolean {
    return findObject(value, RESULT_KEYS) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    const results = findObject(value, RESULT_KEYS);
    return results ? extractGroups(results) : [];
  },
};
