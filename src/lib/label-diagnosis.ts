import * as logger from 'firebase-functions/logger';
import type { RuleRepository } from './rule-repository';
import type { LabelRole, RowDiagnosis } from './row-diagnosis';
import { LABEL_COLUMNS, type BadLabelRecord, type LabelColumn, type UnknownLabelRecord } from './types';

export interface LabelDiagnosis {
  badLabels: BadLabelRecord[];
  unknownLabels: UnknownLabelRecord[];
  unknownYears: Set<string>;
}

// Categories that go through correct / bad / unknown classification
const CLASSIFIED: Exclude<LabelRole, 'year'>[] = ['scenario', 'region', 'variable', 'item', 'unit'];
const COLUMN_ORDER: LabelColumn[] = ['Scenario', 'Region', 'Variable', 'Item', 'Unit', 'Year', 'Value'];

/** Drop value-equal records, keeping the first of each. */
export function uniqueRecords<T extends object>(records: readonly T[]): T[] {
  const byKey = new Map<string, T>();
  for (const r of records) {
    const key = JSON.stringify(Object.values(r));
    if (!byKey.has(key)) byKey.set(key, r);
  }
  return [...byKey.values()];
}

export function sortByColumnThenLabel<T extends { column: LabelColumn; label: string }>(records: T[]): T[] {
  return records.sort((a, b) => {
    const byColumn = COLUMN_ORDER.indexOf(a.column) - COLUMN_ORDER.indexOf(b.column);
    if (byColumn !== 0) return byColumn;
    return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
  });
}

export class LabelDiagnosisEngine {
  constructor(private readonly rules: RuleRepository) {}

  run(rows: Pick<RowDiagnosis, 'seen' | 'fixedValues'>): LabelDiagnosis {
    const bad: BadLabelRecord[] = [];
    const unknown: UnknownLabelRecord[] = [];

    for (const role of CLASSIFIED) {
      const column = LABEL_COLUMNS[role];
      for (const label of rows.seen[role]) {
        if (this.rules.isValid(role, label)) continue;

        const canonical = this.rules.matchCaseInsensitive(role, label);
        if (canonical !== null) {
          bad.push(Object.freeze({ label, column, fix: canonical }));
          continue;
        }

        if (role === 'region') {
          const fix = this.rules.fixForRegion(label);
          if (fix !== null) {
            bad.push(Object.freeze({ label, column, fix }));
            continue;
          }
        }

        unknown.push(
          Object.freeze({
            label,
            column,
            closestMatch: this.rules.fuzzyClosest(role, label) ?? '',
            fix: '',
            override: false,
          })
        );
      }
    }

    for (const value of rows.fixedValues) {
      const fix = this.rules.fixForValue(value);
      if (fix !== null) bad.push(Object.freeze({ label: value, column: 'Value', fix }));
    }

    const unknownYears = new Set([...rows.seen.year].filter((y) => !this.rules.isValid('year', y)));

    const badLabels = sortByColumnThenLabel(uniqueRecords(bad));
    const unknownLabels = sortByColumnThenLabel(uniqueRecords(unknown));
    logger.info('Label diagnosis finished', {
      badLabels: badLabels.length,
      unknownLabels: unknownLabels.length,
      unknownYears: unknownYears.size,
    });
    return { badLabels, unknownLabels, unknownYears };
  }
}
