/*
  Correction applicator
  -------------------------------------
  Turns accepted rows into processed records:
    1. per-column substitution maps from bad-label fixes and fixed unknown labels
    2. per-column drop sets from unknown labels with no fix and no override
    3. substitute, then drop rows that still carry a dropped label
    4. rows whose variable or unit came from an unknown-label fix were never
       range-checked, so check them now; failures are dropped and flagged
*/

import * as logger from 'firebase-functions/logger';
import { cleanField } from './delimited';
import { ValidationConflictError } from './errors';
import type { RuleRepository } from './rule-repository';
import {
  COLUMN_ROLES,
  LABEL_COLUMNS,
  type AcceptedRow,
  type BadLabelRecord,
  type ColumnAssignments,
  type LabelColumn,
  type ProcessedRecord,
  type UnknownLabelRecord,
} from './types';

export interface DroppedRecord {
  rowNumber: number;
  record: ProcessedRecord;
  reason: string;
}

export interface CorrectionResult {
  /** Records that survived label drops, before the range re-check. */
  unfiltered: ProcessedRecord[];
  records: ProcessedRecord[];
  hasNewIssues: boolean;
  /** Rows removed by the range re-check. */
  dropped: DroppedRecord[];
}

export interface CorrectionInput {
  modelName: string;
  columns: ColumnAssignments;
  acceptedRows: readonly AcceptedRow[];
  badLabels: readonly BadLabelRecord[];
  unknownLabels: readonly UnknownLabelRecord[];
}

type ColumnMap<V> = Map<LabelColumn, V>;

function perColumn<V>(make: () => V): ColumnMap<V> {
  return new Map(COLUMN_ROLES.map((role) => [LABEL_COLUMNS[role], make()]));
}

/** Unknown labels that carry both a fix and an override. */
export function conflictingLabels(unknownLabels: readonly UnknownLabelRecord[]): UnknownLabelRecord[] {
  return unknownLabels.filter((u) => u.fix !== '' && u.override);
}

export function assertNoConflicts(unknownLabels: readonly UnknownLabelRecord[]) {
  const conflicts = conflictingLabels(unknownLabels);
  if (conflicts.length > 0) {
    throw new ValidationConflictError(
      'Unknown labels cannot be both fixed and overridden',
      conflicts.map((c) => `${c.column}:${c.label}`)
    );
  }
}

export class CorrectionApplicator {
  constructor(private readonly rules: RuleRepository) {}

  apply(input: CorrectionInput): CorrectionResult {
    assertNoConflicts(input.unknownLabels);

    const substitutions = perColumn(() => new Map<string, string>());
    const unknownFixes = perColumn(() => new Set<string>());
    const drops = perColumn(() => new Set<string>());

    for (const b of input.badLabels) substitutions.get(b.column)?.set(b.label, b.fix);
    for (const u of input.unknownLabels) {
      if (u.fix !== '') {
        substitutions.get(u.column)?.set(u.label, u.fix);
        unknownFixes.get(u.column)?.add(u.label);
      } else if (!u.override) {
        drops.get(u.column)?.add(u.label);
      }
    }

    const unfiltered: ProcessedRecord[] = [];
    const records: ProcessedRecord[] = [];
    const dropped: DroppedRecord[] = [];
    let droppedLabels = 0;

    rows: for (const row of input.acceptedRows) {
      const original: Record<LabelColumn, string> = {
        Scenario: '', Region: '', Variable: '', Item: '', Unit: '', Year: '', Value: '',
      };
      const fixed: Record<LabelColumn, string> = { ...original };
      for (const role of COLUMN_ROLES) {
        const column = LABEL_COLUMNS[role];
        const raw = cleanField(row.fields[input.columns[role] - 1] ?? '');
        const value = substitutions.get(column)?.get(raw) ?? raw;
        if (drops.get(column)?.has(value)) {
          droppedLabels++;
          continue rows;
        }
        original[column] = raw;
        fixed[column] = value;
      }

      const record: ProcessedRecord = {
        model: input.modelName,
        scenario: fixed.Scenario,
        region: fixed.Region,
        variable: fixed.Variable,
        item: fixed.Item,
        unit: fixed.Unit,
        year: fixed.Year,
        value: fixed.Value,
      };
      unfiltered.push(record);

      const needsRecheck =
        unknownFixes.get('Variable')?.has(original.Variable) || unknownFixes.get('Unit')?.has(original.Unit);
      if (needsRecheck) {
        const reason = this.rangeIssue(record);
        if (reason) {
          dropped.push({ rowNumber: row.rowNumber, record, reason });
          continue;
        }
      }
      records.push(record);
    }

    logger.info('Corrections applied', {
      records: records.length,
      droppedLabels,
      droppedOutOfRange: dropped.length,
    });
    return { unfiltered, records, hasNewIssues: dropped.length > 0, dropped };
  }

  private rangeIssue(record: ProcessedRecord): string | null {
    const { min, max } = this.rules.rangeFor(record.variable, record.unit);
    const n = Number(record.value);
    if (n < min) return `Value for variable ${record.variable} is smaller than ${min} ${record.unit}`;
    if (n > max) return `Value for variable ${record.variable} is greater than ${max} ${record.unit}`;
    return null;
  }
}
