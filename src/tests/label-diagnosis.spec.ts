import { describe, it, expect } from 'vitest';
import { LabelDiagnosisEngine, uniqueRecords } from '../lib/label-diagnosis';
import { RowDiagnosisEngine, type LabelRole } from '../lib/row-diagnosis';
import { testLayout, testRules, testTables } from './fixtures';

function seen(values: Partial<Record<LabelRole, string[]>>) {
  return {
    seen: {
      scenario: new Set(values.scenario ?? []),
      region: new Set(values.region ?? []),
      variable: new Set(values.variable ?? []),
      item: new Set(values.item ?? []),
      unit: new Set(values.unit ?? []),
      year: new Set(values.year ?? []),
    },
    fixedValues: new Set<string>(),
  };
}

describe('LabelDiagnosisEngine', () => {
  const engine = new LabelDiagnosisEngine(testRules());

  it('classifies bad and unknown labels per column', () => {
    const input = seen({
      scenario: ['SSP2_NoMt_NoCC', 'ssp2_nomt_nocc', 'SSP2'],
      region: ['USA', 'usa', 'United States', 'Mars'],
      variable: ['PROD'],
      item: ['Wheat', 'wheat'],
      unit: ['1000 t', 'kt'],
      year: ['2020', '2050'],
    });
    input.fixedValues.add('N/A');
    const result = engine.run(input);

    expect(result.badLabels).toEqual([
      { label: 'ssp2_nomt_nocc', column: 'Scenario', fix: 'SSP2_NoMt_NoCC' },
      { label: 'United States', column: 'Region', fix: 'USA' },
      { label: 'usa', column: 'Region', fix: 'USA' },
      { label: 'wheat', column: 'Item', fix: 'Wheat' },
      { label: 'N/A', column: 'Value', fix: '0' },
    ]);
    expect(result.unknownLabels).toEqual([
      { label: 'SSP2', column: 'Scenario', closestMatch: 'SSP2_NoMt_NoCC', fix: '', override: false },
      { label: 'Mars', column: 'Region', closestMatch: 'EUR', fix: '', override: false },
      { label: 'kt', column: 'Unit', closestMatch: '1000 t', fix: '', override: false },
    ]);
    expect(result.unknownYears).toEqual(new Set(['2050']));
  });

  it('produces nothing for canonical values', () => {
    const result = engine.run(
      seen({
        scenario: ['SSP2_NoMt_NoCC'],
        region: ['USA', 'EUR'],
        variable: ['PROD', 'AREA'],
        item: ['Rice'],
        unit: ['1000 ha'],
        year: ['2010'],
      })
    );
    expect(result.badLabels).toEqual([]);
    expect(result.unknownLabels).toEqual([]);
    expect(result.unknownYears.size).toBe(0);
  });

  it('suggests the full scenario name for an abbreviated one in an accepted row', () => {
    const tables = testTables();
    const rules = testRules({ labels: { ...tables.labels, scenario: ['SSP2_NoMt_NoCC'], region: ['USA'] } });
    const rows = new RowDiagnosisEngine(rules, testLayout({ headerIncluded: false }), 7).run([
      'SSP2,USA,PROD,Wheat,1000 t,2020,123.4',
    ]);
    expect(rows.counts.accepted).toBe(1);
    const result = new LabelDiagnosisEngine(rules).run(rows);
    expect(result.unknownLabels).toEqual([
      { label: 'SSP2', column: 'Scenario', closestMatch: 'SSP2_NoMt_NoCC', fix: '', override: false },
    ]);
  });

  it('leaves years out of the unknown labels', () => {
    const result = engine.run(seen({ year: ['1999'] }));
    expect(result.unknownLabels).toEqual([]);
    expect([...result.unknownYears]).toEqual(['1999']);
  });
});

describe('uniqueRecords', () => {
  it('keeps one of each value-equal record', () => {
    const a = { label: 'usa', column: 'Region', fix: 'USA' };
    const b = { label: 'usa', column: 'Region', fix: 'USA' };
    const c = { label: 'usa', column: 'Region', fix: 'WLD' };
    expect(uniqueRecords([a, b, c])).toEqual([a, c]);
  });
});
