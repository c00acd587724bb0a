import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RuleRepository, type RuleRepositoryOptions, type RuleTables } from '../lib/rule-repository';
import type { SubmissionLayout } from '../lib/types';

export function testTables(overrides: Partial<RuleTables> = {}): RuleTables {
  return {
    labels: {
      model: ['GLOBIOM', 'MAgPIE'],
      scenario: ['SSP2_NoMt_NoCC', 'SSP1_NoMt_NoCC'],
      region: ['USA', 'WLD', 'EUR'],
      variable: ['PROD', 'AREA'],
      item: ['Wheat', 'Rice'],
      unit: ['1000 t', '1000 ha'],
      year: ['2010', '2020', '2030'],
    },
    regionFixes: [{ from: 'United States', fix: 'USA' }],
    valueFixes: [{ from: 'N/A', fix: '0' }],
    ranges: [
      { variable: 'PROD', unit: '1000 t', min: 0, max: 1e9 },
      { variable: 'AREA', unit: '1000 ha', min: 0, max: 5000 },
    ],
    ...overrides,
  };
}

export function testRules(overrides: Partial<RuleTables> = {}, options: RuleRepositoryOptions = {}) {
  return RuleRepository.fromTables(testTables(overrides), options);
}

/** Scenario..Value in columns 1..7, comma separated, with a header row. */
export function testLayout(overrides: Partial<SubmissionLayout> = {}): SubmissionLayout {
  return {
    modelName: 'GLOBIOM',
    delimiter: ',',
    headerIncluded: true,
    linesToSkip: 0,
    scenariosToIgnore: [],
    columns: { scenario: 1, region: 2, variable: 3, item: 4, unit: 5, year: 6, value: 7 },
    ...overrides,
  };
}

export const HEADER = 'Scenario,Region,Variable,Item,Unit,Year,Value';

export function tempDir() {
  return mkdtempSync(join(tmpdir(), 'intake-'));
}

export function writeTempFile(dir: string, name: string, lines: string[]) {
  const path = join(dir, name);
  writeFileSync(path, lines.join('\n') + '\n');
  return path;
}
