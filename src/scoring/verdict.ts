import type { Verdict } from './types.js';

const PASS_TOKENS = new Set(['PASS', 'PASSED', 'TRUE', 'SUCCESS', 'OK']);
const FAIL_TOKENS = new Set(['FAIL', 'FAILED', 'FALSE', 'FAILURE']);
const NOT_APPLICABLE_TOKENS = new Set([
  'N/A',
  'NA',
  'NOT_APPLICABLE',
  'NOT APPLICABLE',
  'NOTAPPLICABLE',
  // Warnings and manual checks carry no automated judgement
  'WARNING',
  'WARN',
  'MANUAL',
  'REQUIRES MANUAL CHECK',
]);
const UNKNOWN_TOKENS = new Set(['UNKNOWN', 'ERROR', 'UNDEFINED', '']);

function toToken(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim().toUpperCase();
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return undefined;
}

function classify(token: string): Verdict | undefined {
  if (PASS_TOKENS.has(token)) return 'Pass';
  if (FAIL_TOKENS.has(token)) return 'Fail';
  if (NOT_APPLICABLE_TOKENS.has(token)) return 'NotApplicable';
  if (token.includes('NO EVENTS FOUND')) return 'NotApplicable';
  if (UNKNOWN_TOKENS.has(token)) return 'Unknown';
  return undefined;
}

/**
 * Map a raw verdict to the canonical union. Anything that cannot be
 * classified becomes 'Unknown'; this never throws.
 */
export function normalizeVerdict(value: unknown): Verdict {
  const token = toToken(value);
  if (token === undefined) return 'Unknown';
  return classify(token) ?? 'Unknown';
}

/**
 * True when the value is one of the known verdict spellings, including
 * the explicit unknown ones. Absent values count as recognized.
 */
export function isRecognizedVerdict(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  const token = toToken(value);
  return token !== undefined && classify(token) !== undefined;
}

export function isEvaluated(verdict: Verdict): boolean {
  return verdict === 'Pass' || verdict === 'Fail';
}
