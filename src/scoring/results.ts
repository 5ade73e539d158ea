import { ParsingError } from '../errors.js';
import { inferService } from './service.js';
import { isRecognizedVerdict, normalizeVerdict } from './verdict.js';
import { allShapes, type JsonObject, type RawRecord, type ShapeMatcher } from './shapes/index.js';
import { isObject } from './shapes/shape.js';
import type { Rule, RuleDetails } from './types.js';

export type ParseWarningCode =
  | 'unrecognized-shape'
  | 'not-an-object'
  | 'missing-id'
  | 'unrecognized-verdict';

export interface ParseWarning {
  code: ParseWarningCode;
  message: string;
  index?: number; // position of the record in the extracted list
  ruleId?: string;
}

const ID_FIELDS = ['rule_id', 'id', 'rule', 'name', 'check_id', 'control_id', 'Control ID'] as const;
const VERDICT_FIELDS = ['verdict', 'result', 'Result', 'status', 'outcome', 'compliance_status'] as const;
const SERVICE_FIELDS = ['service', 'product', 'category', 'component'] as const;
const REQUIREMENT_FIELDS = ['requirement', 'Requirement', 'description', 'Description'] as const;
const CRITICALITY_FIELDS = ['severity', 'priority', 'weight_class', 'criticality', 'Criticality'] as const;
const DOC_URL_FIELDS = ['documentation_url', 'DocumentationURL'] as const;

function firstString(entry: JsonObject, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = entry[field];
    if (typeof value === 'string' && value.trim() !== '') return value;
  }
  return undefined;
}

function readId(entry: JsonObject): string | undefined {
  for (const field of ID_FIELDS) {
    const value = entry[field];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function readVerdict(entry: JsonObject): unknown {
  for (const field of VERDICT_FIELDS) {
    const value = entry[field];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

// "GWS.CALENDAR.1.1v0.5" under https://example.test/calendar -> .../calendar#11
function controlUrl(groupUrl: string, ruleId: string): string | undefined {
  const match = /\.(\d+\.\d+)/.exec(ruleId);
  if (!match?.[1]) return undefined;
  return `${groupUrl}#${match[1].replace('.', '')}`;
}

function readDetails(entry: JsonObject, ruleId: string, groupUrl?: string): RuleDetails {
  const details: RuleDetails = {};

  const requirement = firstString(entry, REQUIREMENT_FIELDS);
  if (requirement !== undefined) details.requirement = requirement;

  const criticality = firstString(entry, CRITICALITY_FIELDS);
  if (criticality !== undefined) details.criticality = criticality;

  const reference = firstString(entry, ['GroupReferenceURL']) ?? groupUrl;
  const documentationUrl = firstString(entry, DOC_URL_FIELDS)
    ?? (reference !== undefined ? controlUrl(reference, ruleId) : undefined);
  if (documentationUrl !== undefined) details.documentationUrl = documentationUrl;

  return details;
}

/**
 * Single-pass, lazily evaluated sequence of rules.
 *
 * `warnings` and `droppedCount` grow while the sequence is consumed, so
 * read them after iterating. Iterating a second time yields nothing.
 */
export class ParsedResults implements Iterable<Rule> {
  readonly warnings: ParseWarning[] = [];
  readonly shape: string | undefined;
  readonly error: ParsingError | undefined;
  private dropped = 0;
  private readonly sequence: Generator<Rule>;

  constructor(value: unknown, shapes: readonly ShapeMatcher[] = allShapes) {
    const matcher = shapes.find(candidate => candidate.matches(value));
    this.shape = matcher?.name;

    if (matcher) {
      this.error = undefined;
      this.sequence = this.normalize(matcher.extract(value));
    } else {
      const kind = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
      this.error = new ParsingError(`Unrecognized results layout (top-level ${kind})`);
      this.warnings.push({ code: 'unrecognized-shape', message: this.error.message });
      this.sequence = this.normalize([]);
    }
  }

  get droppedCount(): number {
    return this.dropped;
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.sequence;
  }

  toArray(): Rule[] {
    return [...this];
  }

  private *normalize(records: Iterable<RawRecord>): Generator<Rule> {
    let index = 0;
    for (const record of records) {
      const rule = this.toRule(record, index);
      index++;
      if (rule) yield rule;
    }
  }

  // Missing id drops the record; an odd verdict only degrades it
  private toRule(record: RawRecord, index: number): Rule | undefined {
    const { entry } = record;

    if (!isObject(entry)) {
      this.drop({ code: 'not-an-object', message: `Record ${index} is not an object`, index });
      return undefined;
    }

    const id = readId(entry);
    if (id === undefined) {
      this.drop({ code: 'missing-id', message: `Record ${index} has no rule identifier`, index });
      return undefined;
    }

    const rawVerdict = readVerdict(entry);
    if (!isRecognizedVerdict(rawVerdict)) {
      this.warnings.push({
        code: 'unrecognized-verdict',
        message: `Unrecognized verdict ${JSON.stringify(rawVerdict)} for ${id}`,
        index,
        ruleId: id,
      });
    }

    return {
      id,
      verdict: normalizeVerdict(rawVerdict),
      service: inferService(id, firstString(entry, SERVICE_FIELDS) ?? record.service),
      details: readDetails(entry, id, record.groupUrl),
      raw: entry,
    };
  }

  private drop(warning: ParseWarning): void {
    this.dropped++;
    this.warnings.push(warning);
  }
}

export function parseResults(value: unknown, shapes?: readonly ShapeMatcher[]): ParsedResults {
  return new ParsedResults(value, shapes);
}

export function parseResultsJson(text: string, shapes?: readonly ShapeMatcher[]): ParsedResults {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ParsingError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseResults(value, shapes);
}

export function isParsedResults(value: unknown): value is ParsedResults {
  return value instanceof ParsedResults;
}
