import { describe, it, expect } from 'vitest';
import { CorrectionApplicator } from '../lib/corrections';
import { ValidationConflictError } from '../lib/errors';
import type { AcceptedRow, BadLabelRecord, UnknownLabelRecord } from '../lib/types';
import { testLayout, testRules } from './fixtures';

const columns = testLayout().columns;
const applicator = new CorrectionApplicator(testRules());

function accepted(lines: string[]): AcceptedRow[] {
  return lines.map((line, i) => ({ rowNumber: i + 2, line, fields: line.split(',') }));
}

const ROWS = accepted([
  'SSP2_NoMt_NoCC,USA,PROD,Wheat,1000 t,2020,123.4',
  'ssp2_nomt_nocc,usa,PROD,Wheat,1000 t,2030,N/A',
  'SSP2_NoMt_NoCC,Mars,PROD,Rice,1000 t,2020,1',
  'SSP2_NoMt_NoCC,USA,PROD,Rice,kt,2020,2000000000',
  'SSP2_NoMt_NoCC,USA,PROD,Rice,kt,2010,40',
]);

const BAD: BadLabelRecord[] = [
  { label: 'ssp2_nomt_nocc', column: 'Scenario', fix: 'SSP2_NoMt_NoCC' },
  { label: 'usa', column: 'Region', fix: 'USA' },
  { label: 'N/A', column: 'Value', fix: '0' },
];

function unknown(label: string, column: UnknownLabelRecord['column'], fix = '', override = false): UnknownLabelRecord {
  return { label, column, closestMatch: '', fix, override };
}

describe('CorrectionApplicator', () => {
  it('substitutes fixes, drops unresolved labels and re-checks fixed units', () => {
    const result = applicator.apply({
      modelName: 'GLOBIOM',
      columns,
      acceptedRows: ROWS,
      badLabels: BAD,
      unknownLabels: [unknown('Mars', 'Region'), unknown('kt', 'Unit', '1000 t')],
    });

    expect(result.records).toEqual([
      { model: 'GLOBIOM', scenario: 'SSP2_NoMt_NoCC', region: 'USA', variable: 'PROD', item: 'Wheat', unit: '1000 t', year: '2020', value: '123.4' },
      { model: 'GLOBIOM', scenario: 'SSP2_NoMt_NoCC', region: 'USA', variable: 'PROD', item: 'Wheat', unit: '1000 t', year: '2030', value: '0' },
      { model: 'GLOBIOM', scenario: 'SSP2_NoMt_NoCC', region: 'USA', variable: 'PROD', item: 'Rice', unit: '1000 t', year: '2010', value: '40' },
    ]);
    expect(result.unfiltered).toHaveLength(4);
    expect(result.hasNewIssues).toBe(true);
    expect(result.dropped.map((d) => [d.rowNumber, d.reason])).toEqual([
      [5, 'Value for variable PROD is greater than 1000000000 1000 t'],
    ]);
  });

  it('never emits a label from a drop set', () => {
    const result = applicator.apply({
      modelName: 'GLOBIOM',
      columns,
      acceptedRows: ROWS,
      badLabels: BAD,
      unknownLabels: [unknown('Mars', 'Region'), unknown('kt', 'Unit')],
    });
    expect(result.records.map((r) => r.region)).not.toContain('Mars');
    expect(result.records.some((r) => r.unit === 'kt')).toBe(false);
    expect(result.records).toHaveLength(2);
    expect(result.hasNewIssues).toBe(false);
  });

  it('keeps overridden labels as they are', () => {
    const result = applicator.apply({
      modelName: 'GLOBIOM',
      columns,
      acceptedRows: ROWS,
      badLabels: BAD,
      unknownLabels: [unknown('Mars', 'Region', '', true), unknown('kt', 'Unit', '', true)],
    });
    expect(result.records).toHaveLength(5);
    expect(result.records[2].region).toBe('Mars');
    expect(result.records[3].unit).toBe('kt');
    expect(result.hasNewIssues).toBe(false);
  });

  it('rejects a label that is both fixed and overridden', () => {
    const input = {
      modelName: 'GLOBIOM',
      columns,
      acceptedRows: ROWS,
      badLabels: BAD,
      unknownLabels: [unknown('kt', 'Unit', '1000 t', true)],
    };
    expect(() => applicator.apply(input)).toThrow(ValidationConflictError);
    try {
      applicator.apply(input);
    } catch (e) {
      expect(e instanceof ValidationConflictError && e.labels).toEqual(['Unit:kt']);
    }
  });

  it('reproduces canonical rows with no labels to apply', () => {
    const rows = accepted(['SSP2_NoMt_NoCC,USA,PROD,Wheat,1000 t,2020,123.4', 'SSP1_NoMt_NoCC,EUR,AREA,Rice,1000 ha,2010,7']);
    const result = applicator.apply({ modelName: 'GLOBIOM', columns, acceptedRows: rows, badLabels: [], unknownLabels: [] });
    expect(result.records.map((r) => [r.scenario, r.region, r.variable, r.item, r.unit, r.year, r.value])).toEqual(
      rows.map((r) => r.fields)
    );
    expect(result.records.every((r) => r.model === 'GLOBIOM')).toBe(true);
  });

  it('reads fields through the column assignments', () => {
    const rows = accepted(['2020,123.4,SSP2_NoMt_NoCC,USA,PROD,Wheat,1000 t']);
    const result = applicator.apply({
      modelName: 'GLOBIOM',
      columns: { scenario: 3, region: 4, variable: 5, item: 6, unit: 7, year: 1, value: 2 },
      acceptedRows: rows,
      badLabels: [],
      unknownLabels: [],
    });
    expect(result.records[0]).toEqual({
      model: 'GLOBIOM', scenario: 'SSP2_NoMt_NoCC', region: 'USA', variable: 'PROD', item: 'Wheat', unit: '1000 t', year: '2020', value: '123.4',
    });
  });
});
