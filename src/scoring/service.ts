import { UNKNOWN_SERVICE } from './types.js';

/**
 * Resolve the service a rule belongs to.
 *
 * A non-blank explicit service wins as given. Otherwise the second
 * dot-separated segment of the id is used unchanged, so `svc.gmail.1.1`
 * maps to `gmail` and `GWS.GMAIL.1.1v0.5` to `GMAIL`.
 */
export function inferService(ruleId: string, explicit?: string): string {
  if (explicit !== undefined && explicit.trim() !== '') {
    return explicit;
  }

  const segment = ruleId.split('.')[1];
  if (segment === undefined || segment.trim() === '') {
    return UNKNOWN_SERVICE;
  }

  return segment;
}
