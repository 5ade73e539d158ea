export type JsonObject = Record<string, unknown>;

// One candidate record, plus context a layout can contribute
export interface RawRecord {
  entry: unknown;
  service?: string;
  groupUrl?: string;
}

export interface ShapeMatcher {
  name: string;
  description: string;
  matches(value: unknown): boolean;
  extract(value: unknown): Iterable<RawRecord>;
}

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// First key whose value is an array
export function findArray(value: unknown, keys: readonly string[]): unknown[] | undefined {
  if (!isObject(value)) return undefined;
  for (const key of keys) {
    const candidate = value[key];
    if (Array.isArray(candidate)) return candidate;
  }
  return undefined;
}

export function findObject(value: unknown, keys: readonly string[]): JsonObject | undefined {
  if (!isObject(value)) return undefined;
  for (const key of keys) {
    const candidate = value[key];
    if (isObject(candidate)) return candidate;
  }
  return undefined;
}

export function* asRecords(entries: readonly unknown[], service?: string): Generator<RawRecord> {
  for (const entry of entries) {
    yield service === undefined ? { entry } : { entry, service };
  }
}
