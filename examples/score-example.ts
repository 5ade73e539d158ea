#!/usr/bin/env node
/**
 * Example scoring a results file through the library API
 *
 * Run with: npx tsx examples/score-example.ts
 */

import { fileURLToPath } from 'node:url';
import { loadScoringTables } from '../src/config/tables.js';
import { formatPercent, toReport } from '../src/report.js';
import { computeScores, groupFailuresBySeverity, parseResultsJson } from '../src/scoring/index.js';
import { readResultsFile } from '../src/pipeline.js';

const dataFile = (name: string): string => fileURLToPath(new URL(`./data/${name}`, import.meta.url));

async function main(): Promise<void> {
  console.log('=== controlscore library demo ===\n');

  // 1. Load the three tables once; they are frozen and shared by every run
  const tables = await loadScoringTables({
    weightsFile: dataFile('weights.yaml'),
    serviceWeightsFile: dataFile('service_weights.yaml'),
    compensatingFile: dataFile('compensating.yaml'),
  });
  console.log('Loaded weights for', Object.keys(tables.weights).length, 'patterns');

  // 2. Parse, then score
  const parsed = parseResultsJson(await readResultsFile(dataFile('results.json')));
  if (parsed.error) throw parsed.error;
  console.log('Detected layout:', parsed.shape);

  const asOf = new Date();
  const result = computeScores(parsed, tables, { asOf });

  // 3. Per-service and overall
  for (const service of Object.values(result.perService)) {
    console.log(`  ${service.service.padEnd(10)} ${formatPercent(service.scorePercent)}`);
  }
  console.log('Overall:', formatPercent(result.overallScorePercent));

  // 4. Failures without compensating credit
  for (const [severity, failures] of Object.entries(groupFailuresBySeverity(result))) {
    console.log(`${severity}: ${failures.map(failure => failure.id).join(', ')}`);
  }

  // 5. The JSON report the CLI writes with --out
  console.log('\nReport summary:', JSON.stringify(toReport(result, { asOf }).summary, null, 2));
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
