import { findArray, findObject, isObject, type RawRecord, type ShapeMatcher } from './shape.js';

const SERVICE_KEYS = ['services', 'Services'] as const;
const ENTRY_KEYS = ['rules', 'results', 'checks'] as const;

function* extractServices(services: Record<string, unknown>): Generator<RawRecord> {
  for (const [service, body] of Object.entries(services)) {
    if (!isObject(body)) continue;
    for (const entry of findArray(body, ENTRY_KEYS) ?? []) {
      yield { entry, service };
    }
  }
}

// { "services": { "gmail": { "rules": [ ... ] } } }
export const serviceMapShape: ShapeMatcher = {
  name: 'service-map',
  description: 'Services object mapping each service to its rules',

  matches(value: unknown): boolean {
    return findObject(value, SERVICE_KEYS) !== undefined;
  },

  extract(value: unknown): Iterable<RawRecord> {
    const services = findObject(value, SERVICE_KEYS);
    return services ? extractServices(services) : [];
  },
};
