import { describe, it, expect, afterEach } from 'vitest';
import { TestProject, runCommand, lines, parseJSON } from '../helpers/test-utils.js';

describe('controlscore validate command', () => {
  let project: TestProject | null = null;

  afterEach(() => {
    if (project) {
      project.destroy();
      project = null;
    }
  });

  it('should describe the input and pass', async () => {
    project = TestProject.create({ fixture: 'basic' });

    const result = await runCommand(['validate', 'results.json', '-w', 'weights.yaml'], { cwd: project.dir });

    expect(result.exitCode).toBe(0);
    expect(lines(result.stdout)).toEqual([
      'Layout: rules-array',
      'Rules: 5 (1 dropped)',
      'Verdicts: 2 pass, 2 fail, 1 n/a, 0 unknown',
      'Services: drive, gmail',
      '✓ Input and tables are valid',
    ]);
    expect(result.stderr).toBe('⚠ [missing-id] Record 5 has no rule identifier');
  });

  it('should fail on warnings in strict mode', async () => {
    project = TestProject.create({ fixture: 'basic' });

    const result = await runCommand(['validate', 'results.json', '--strict'], { cwd: project.dir });

    expect(result.exitCode).toBe(1);
    expect(lines(result.stdout)).not.toContain('✓ Input and tables are valid');
    expect(lines(result.stderr)).toEqual([
      '⚠ [missing-id] Record 5 has no rule identifier',
      'Error: 1 warning(s) in strict mode',
    ]);
  });

  it('should output a JSON summary', async () => {
    project = TestProject.create({ fixture: 'basic' });

    const result = await runCommand(
      ['validate', 'results.json', '-w', 'weights.yaml', '-s', 'service_weights.yaml', '-c', 'compensating.yaml', '--json'],
      { cwd: project.dir }
    );

    expect(result.exitCode).toBe(0);
    expect(parseJSON<unknown>(result.stdout)).toEqual({
      valid: true,
      shape: 'rules-array',
      rules: 5,
      dropped: 1,
      services: ['drive', 'gmail'],
      verdicts: { Pass: 2, Fail: 2, NotApplicable: 1, Unknown: 0 },
      tables: { weights: 2, serviceWeights: 2, compensating: 1 },
      warnings: [{ code: 'missing-id', message: 'Record 5 has no rule identifier', index: 5 }],
    });
  });

  it('should count built-in service weights when no file is given', async () => {
    project = TestProject.create({ fixture: 'grouped' });

    const result = await runCommand(['validate', 'results.json', '--json'], { cwd: project.dir });
    const summary = parseJSON<{ shape: string; services: string[]; tables: Record<string, number> }>(result.stdout);

    expect(summary.shape).toBe('grouped-controls');
    expect(summary.services).toEqual(['calendar', 'gmail']);
    expect(summary.tables).toEqual({ weights: 0, serviceWeights: 9, compensating: 0 });
  });

  it('should report verdicts it could not read', async () => {
    project = TestProject.create();
    project.writeFile('odd.json', JSON.stringify([{ id: 'svc.chat.1', verdict: 'sort of' }]));

    const result = await runCommand(['validate', 'odd.json'], { cwd: project.dir });

    expect(result.exitCode).toBe(0);
    expect(lines(result.stdout)[2]).toBe('Verdicts: 0 pass, 0 fail, 0 n/a, 1 unknown');
    expect(result.stderr).toBe('⚠ [unrecognized-verdict] Unrecognized verdict "sort of" for svc.chat.1');
  });

  it('should reject an invalid compensating table', async () => {
    project = TestProject.create({ fixture: 'basic' });
    project.writeFile('bad.yaml', 'svc.a.1:\n  rationale: x\n  credit_fraction: 2\n');

    const result = await runCommand(['validate', 'results.json', '-c', 'bad.yaml'], { cwd: project.dir });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      `Error: ${project.path('bad.yaml')}: Credit fraction for compensating control 'svc.a.1' must be in (0, 1], got 2`
    );
  });

  it('should reject an unrecognized layout', async () => {
    project = TestProject.create();
    project.writeFile('odd.json', '"just text"');

    const result = await runCommand(['validate', 'odd.json'], { cwd: project.dir });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Error: Unrecognized results layout (top-level string)');
  });
});
