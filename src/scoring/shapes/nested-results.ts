import { asRecords, findArray, type RawRecord, type ShapeMatcher } from './shape.js';

const RESULT_KEYS = ['Results', 'results'] as const;
const RULE_KEYS = ['Rules', 'rules'] as const;

function firstRules(value: unknown): unknown[] | undefined {
  const results = findArray(value, RESULT_KEYS);
  return results && results.length > 0 ? findArray(results[0], RULE_KEYS) : undefined;
}

// { "Results": [ { "Rules": [ ... ] } ] }
export const nestedResultsShape: ShapeMatcher = {
  name: 'nested-results',
  description: 'Results array whose first element carries a Rules array',

  matches(value: unknown): boolean {
    return firstRules(value) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    return asRecords(firstRules(value) ?? []);
  },
};
