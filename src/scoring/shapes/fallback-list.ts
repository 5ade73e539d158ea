import { asRecords, isObject, type RawRecord, type ShapeMatcher } from './shape.js';

const MARKER_KEYS = ['rule_id', 'id', 'verdict', 'result', 'status'] as const;

function findRuleList(value: unknown): unknown[] | undefined {
  if (!isObject(value)) return undefined;

  for (const candidate of Object.values(value)) {
    if (!Array.isArray(candidate) || candidate.length === 0) continue;
    const first: unknown = candidate[0];
    if (isObject(first) && MARKER_KEYS.some(key => key in first)) {
      return candidate;
    }
  }

  return undefined;
}

// Last resort: any list property that looks like rule records
export const fallbackListShape: ShapeMatcher = {
  name: 'fallback-list',
  description: 'First array property whose items look like rule records',

  matches(value: unknown): boolean {
    return findRuleList(value) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    return asRecords(findRuleList(value) ?? []);
  },
};
