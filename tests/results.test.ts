import { describe, it, expect } from 'vitest';
import {
  isParsedResults,
  parseResults,
  parseResultsJson,
} from '../src/scoring/results.js';
import { allShapes, topLevelArrayShape } from '../src/scoring/shapes/index.js';
import { ParsingError } from '../src/errors.js';

describe('result layouts', () => {
  it('should try layouts in a fixed order', () => {
    expect(allShapes.map(shape => shape.name)).toEqual([
      'rules-array',
      'nested-results',
      'top-level-array',
      'flat-collection',
      'grouped-controls',
      'service-map',
      'fallback-list',
    ]);
  });

  it('should read a top-level Rules array', () => {
    const first = { rule_id: 'svc.gmail.1', verdict: 'PASS' };
    const second = { id: 'svc.drive.2', result: 'fail', service: 'Drive' };
    const parsed = parseResults({ Rules: [first, second] });

    expect(parsed.shape).toBe('rules-array');
    expect(parsed.error).toBeUndefined();
    expect(parsed.toArray()).toEqual([
      { id: 'svc.gmail.1', verdict: 'Pass', service: 'gmail', details: {}, raw: first },
      { id: 'svc.drive.2', verdict: 'Fail', service: 'Drive', details: {}, raw: second },
    ]);
  });

  it('should read only the first element of a Results array', () => {
    const parsed = parseResults({
      Results: [
        { Rules: [{ id: 'a.b.1', status: 'pass' }] },
        { Rules: [{ id: 'a.c.1', status: 'fail' }] },
      ],
    });

    expect(parsed.shape).toBe('nested-results');
    expect(parsed.toArray().map(rule => rule.id)).toEqual(['a.b.1']);
  });

  it('should read a top-level array', () => {
    const parsed = parseResults([{ id: 'a.meet.1', verdict: 'n/a' }]);
    expect(parsed.shape).toBe('top-level-array');
    expect(parsed.toArray().map(rule => [rule.service, rule.verdict])).toEqual([['meet', 'NotApplicable']]);
  });

  it('should read a flat findings collection with details', () => {
    const parsed = parseResults({
      findings: [
        {
          check_id: 'x.chat.1',
          outcome: 'failed',
          severity: 'High',
          description: 'External chat is restricted',
          documentation_url: 'https://docs.test/chat/1',
        },
      ],
    });

    expect(parsed.shape).toBe('flat-collection');
    const [rule] = parsed.toArray();
    expect(rule?.verdict).toBe('Fail');
    expect(rule?.details).toEqual({
      requirement: 'External chat is restricted',
      criticality: 'High',
      documentationUrl: 'https://docs.test/chat/1',
    });
  });

  it('should read grouped controls keyed by product', () => {
    const parsed = parseResults({
      Results: {
        gmail: [
          {
            GroupName: 'Mail Delegation',
            GroupReferenceURL: 'https://docs.test/gmail',
            Controls: [
              {
                'Control ID': 'GWS.GMAIL.1.1v0.5',
                Result: 'Pass',
                Requirement: 'Mail delegation should be disabled',
                Criticality: 'Should',
              },
            ],
          },
        ],
        calendar: [{ Controls: [{ 'Control ID': 'GWS.CALENDAR.2.1v0.5', Result: 'Warning' }] }],
        Summary: 'ignored',
      },
    });

    expect(parsed.shape).toBe('grouped-controls');
    const rules = parsed.toArray();
    expect(rules.map(rule => ({ id: rule.id, service: rule.service, verdict: rule.verdict, details: rule.details }))).toEqual([
      {
        id: 'GWS.GMAIL.1.1v0.5',
        service: 'gmail',
        verdict: 'Pass',
        details: {
          requirement: 'Mail delegation should be disabled',
          criticality: 'Should',
          documentationUrl: 'https://docs.test/gmail#11',
        },
      },
      { id: 'GWS.CALENDAR.2.1v0.5', service: 'calendar', verdict: 'NotApplicable', details: {} },
    ]);
  });

  it('should read a services map and attach the service name', () => {
    const parsed = parseResults({
      services: {
        gmail: { rules: [{ id: 'r1', verdict: 'pass' }] },
        drive: { checks: [{ id: 'r2', verdict: 'fail' }] },
        meta: 'not a service',
      },
    });

    expect(parsed.shape).toBe('service-map');
    expect(parsed.toArray().map(rule => [rule.id, rule.service, rule.verdict])).toEqual([
      ['r1', 'gmail', 'Pass'],
      ['r2', 'drive', 'Fail'],
    ]);
  });

  it('should fall back to any list of rule-like records', () => {
    const parsed = parseResults({
      metadata: { tool: 'scanner' },
      tags: ['a', 'b'],
      entries: [{ rule_id: 'x.sites.1', verdict: 'pass' }],
    });

    expect(parsed.shape).toBe('fallback-list');
    expect(parsed.toArray().map(rule => rule.id)).toEqual(['x.sites.1']);
  });

  it('should accept an empty array as a layout with no rules', () => {
    const parsed = parseResults([]);
    expect(parsed.shape).toBe('top-level-array');
    expect(parsed.error).toBeUndefined();
    expect(parsed.toArray()).toEqual([]);
  });
});

describe('unrecognized input', () => {
  it('should report an error and yield nothing', () => {
    const parsed = parseResults({ foo: 1 });

    expect(parsed.shape).toBeUndefined();
    expect(parsed.error).toBeInstanceOf(ParsingError);
    expect(parsed.error?.message).toBe('Unrecognized results layout (top-level object)');
    expect(parsed.warnings).toEqual([
      { code: 'unrecognized-shape', message: 'Unrecognized results layout (top-level object)' },
    ]);
    expect(parsed.toArray()).toEqual([]);
  });

  it('should name the kind of top-level value', () => {
    expect(parseResults('text').error?.message).toBe('Unrecognized results layout (top-level string)');
    expect(parseResults(null).error?.message).toBe('Unrecognized results layout (top-level null)');
    expect(parseResults(42).error?.message).toBe('Unrecognized results layout (top-level number)');
  });

  it('should only use the layouts it is given', () => {
    const parsed = parseResults({ Rules: [] }, [topLevelArrayShape]);
    expect(parsed.shape).toBeUndefined();
    expect(parsed.error).toBeInstanceOf(ParsingError);
  });

  it('should reject malformed JSON', () => {
    expect(() => parseResultsJson('{')).toThrow(ParsingError);
    expect(() => parseResultsJson('{')).toThrow(/^Invalid JSON: /);
  });

  it('should parse JSON text', () => {
    const parsed = parseResultsJson('[{"id": "svc.groups.1", "verdict": "pass"}]');
    expect(parsed.toArray().map(rule => rule.service)).toEqual(['groups']);
  });
});

describe('record normalization', () => {
  it('should drop unusable records and warn about odd verdicts', () => {
    const parsed = parseResults([
      'oops',
      { verdict: 'pass' },
      { id: '   ', verdict: 'pass' },
      { id: 'a.b.1', verdict: 'maybe' },
      { id: 7, verdict: 'pass' },
    ]);

    const rules = parsed.toArray();
    expect(rules.map(rule => [rule.id, rule.verdict, rule.service])).toEqual([
      ['a.b.1', 'Unknown', 'b'],
      ['7', 'Pass', 'Unknown'],
    ]);
    expect(parsed.droppedCount).toBe(3);
    expect(parsed.warnings).toEqual([
      { code: 'not-an-object', message: 'Record 0 is not an object', index: 0 },
      { code: 'missing-id', message: 'Record 1 has no rule identifier', index: 1 },
      { code: 'missing-id', message: 'Record 2 has no rule identifier', index: 2 },
      {
        code: 'unrecognized-verdict',
        message: 'Unrecognized verdict "maybe" for a.b.1',
        index: 3,
        ruleId: 'a.b.1',
      },
    ]);
  });

  it('should fill counters only as the sequence is consumed', () => {
    const parsed = parseResults([null, { id: 'a.b.1', verdict: 'pass' }]);
    expect(parsed.droppedCount).toBe(0);
    expect(parsed.warnings).toEqual([]);

    expect(parsed.toArray()).toHaveLength(1);
    expect(parsed.droppedCount).toBe(1);
  });

  it('should yield nothing on a second pass', () => {
    const parsed = parseResults([{ id: 'a.b.1', verdict: 'pass' }]);
    expect([...parsed]).toHaveLength(1);
    expect([...parsed]).toHaveLength(0);
  });

  it('should trim ids and follow id field order', () => {
    const parsed = parseResults([
      { id: '  a.b.2  ', verdict: 'pass' },
      { name: 'n.x.1', id: 'i.x.1', verdict: 'pass' },
    ]);
    expect(parsed.toArray().map(rule => rule.id)).toEqual(['a.b.2', 'i.x.1']);
  });

  it('should skip empty verdict fields in favour of later ones', () => {
    const parsed = parseResults([{ id: 'a.b.1', verdict: '', result: 'fail' }]);
    expect(parsed.toArray().map(rule => rule.verdict)).toEqual(['Fail']);
  });

  it('should treat a missing verdict as Unknown without a warning', () => {
    const parsed = parseResults([{ id: 'a.b.1' }]);
    expect(parsed.toArray().map(rule => rule.verdict)).toEqual(['Unknown']);
    expect(parsed.warnings).toEqual([]);
  });

  it('should prefer a service field over the id', () => {
    const parsed = parseResults([{ id: 'a.b.1', verdict: 'pass', product: 'Classroom' }]);
    expect(parsed.toArray().map(rule => rule.service)).toEqual(['Classroom']);
  });

  it('should identify parsed results', () => {
    expect(isParsedResults(parseResults([]))).toBe(true);
    expect(isParsedResults([])).toBe(false);
  });
});
