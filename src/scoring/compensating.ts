import type { CompensatingControl, CompensatingControlTable } from './types.js';

export const DEFAULT_CREDIT_FRACTION = 0.5;

// Exact id only: a control documents one remediation, never a category.
export function findCompensatingControl(
  ruleId: string,
  table: CompensatingControlTable,
  asOf: Date
): CompensatingControl | undefined {
  if (!Object.hasOwn(table, ruleId)) return undefined;

  const control = table[ruleId];
  if (!control) return undefined;

  if (control.expiry && control.expiry.getTime() < asOf.getTime()) {
    return undefined;
  }

  return control;
}

export function creditFor(ruleId: string, table: CompensatingControlTable, asOf: Date): number {
  const control = findCompensatingControl(ruleId, table, asOf);
  if (!control) return 0;

  const fraction = control.creditFraction;
  if (!Number.isFinite(fraction) || fraction <= 0) return 0;
  return Math.min(1, fraction);
}
