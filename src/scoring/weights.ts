import type { WeightTable } from './types.js';

export const DEFAULT_RULE_WEIGHT = 1;

export interface WeightResolver {
  resolve(ruleId: string): number;
}

function isUsableWeight(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Compile a weight table once for repeated lookups.
 *
 * Order: exact id, then the longest key the id starts with, then
 * DEFAULT_RULE_WEIGHT. Prefix candidates are sorted by length
 * descending and then by key ascending, so equal-length matches resolve
 * to the lexicographically smallest key. Non-positive or non-numeric
 * entries are skipped.
 */
export function createWeightResolver(table: WeightTable): WeightResolver {
  const exact = new Map<string, number>();
  for (const [key, value] of Object.entries(table)) {
    if (isUsableWeight(value)) {
      exact.set(key, value);
    }
  }

  const prefixes = [...exact.keys()]
    .filter(key => key.length > 0)
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));

  return {
    resolve(ruleId: string): number {
      const direct = exact.get(ruleId);
      if (direct !== undefined) return direct;

      for (const prefix of prefixes) {
        if (ruleId.startsWith(prefix)) {
          return exact.get(prefix) ?? DEFAULT_RULE_WEIGHT;
        }
      }

      return DEFAULT_RULE_WEIGHT;
    },
  };
}

export function resolveWeight(ruleId: string, table: WeightTable): number {
  return createWeightResolver(table).resolve(ruleId);
}
