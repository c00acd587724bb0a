/*
  Row diagnosis
  -------------------------------------
  One pass over every line of a submission. Each data row lands in exactly one
  bucket, tested in this order:
    1. structural issue   (width, empty field, non-integer year, bad or out-of-range value)
    2. ignored scenario   (raw scenario in the ignore list)
    3. duplicate          (raw line already seen in this run)
    4. accepted
  Skipped lines and the header row are outside every bucket but still consume
  row numbers (1-based over the raw file).

  Bucket rows are handed to a RowSink as they are found; only accepted rows,
  the per-category seen labels and the duplicate multiset stay in memory. The
  multiset holds one entry per distinct line that reached the duplicate check.
*/

import * as logger from 'firebase-functions/logger';
import { cleanField, isInteger, isNumeric, splitLine } from './delimited';
import { ConfigurationError, InvariantViolationError } from './errors';
import { validateLayout } from './layout';
import type { RuleRepository } from './rule-repository';
import {
  COLUMN_ROLES,
  LABEL_COLUMNS,
  type AcceptedRow,
  type ColumnRole,
  type DiagnosisCounts,
  type DuplicateRow,
  type IgnoredScenarioRow,
  type StructuralIssueRow,
  type SubmissionLayout,
} from './types';

export type LabelRole = Exclude<ColumnRole, 'value'>;

export const LABEL_ROLES: readonly LabelRole[] = ['scenario', 'region', 'variable', 'item', 'unit', 'year'];

export interface RowSink {
  structural(row: StructuralIssueRow): void;
  ignored(row: IgnoredScenarioRow): void;
  duplicate(row: DuplicateRow): void;
  accepted(row: AcceptedRow): void;
}

export const nullSink: RowSink = {
  structural() {},
  ignored() {},
  duplicate() {},
  accepted() {},
};

/** Keeps every bucket in memory. Meant for small inputs and tests. */
export class MemorySink implements RowSink {
  readonly structuralRows: StructuralIssueRow[] = [];
  readonly ignoredRows: IgnoredScenarioRow[] = [];
  readonly duplicateRows: DuplicateRow[] = [];
  readonly acceptedRows: AcceptedRow[] = [];

  structural(row: StructuralIssueRow) { this.structuralRows.push(row); }
  ignored(row: IgnoredScenarioRow) { this.ignoredRows.push(row); }
  duplicate(row: DuplicateRow) { this.duplicateRows.push(row); }
  accepted(row: AcceptedRow) { this.acceptedRows.push(row); }
}

export interface RowDiagnosis {
  counts: DiagnosisCounts;
  acceptedRows: AcceptedRow[];
  /** Distinct cleaned values of accepted rows, per label column. */
  seen: Record<LabelRole, Set<string>>;
  /** Distinct accepted value tokens that have a value-fix entry. */
  fixedValues: Set<string>;
  /** Entries in the duplicate multiset at the end of the run. */
  distinctRows: number;
}

const PROGRESS_EVERY = 100_000;

export class RowDiagnosisEngine {
  private readonly index: Record<ColumnRole, number>;
  private readonly ignore: ReadonlySet<string>;

  constructor(
    private readonly rules: RuleRepository,
    private readonly layout: SubmissionLayout,
    private readonly expectedColumnCount: number,
    private readonly sink: RowSink = nullSink
  ) {
    validateLayout(layout);
    const c = layout.columns;
    this.index = {
      scenario: c.scenario - 1,
      region: c.region - 1,
      variable: c.variable - 1,
      item: c.item - 1,
      unit: c.unit - 1,
      year: c.year - 1,
      value: c.value - 1,
    };
    this.ignore = new Set(layout.scenariosToIgnore);

    if (expectedColumnCount > 0) {
      for (const role of COLUMN_ROLES) {
        if (c[role] > expectedColumnCount) {
          throw new ConfigurationError(`${LABEL_COLUMNS[role]} column is beyond the ${expectedColumnCount} columns of the file`);
        }
      }
    }
  }

  run(lines: Iterable<string>): RowDiagnosis {
    const counts: DiagnosisCounts = { structuralIssues: 0, ignoredScenario: 0, duplicates: 0, accepted: 0 };
    const acceptedRows: AcceptedRow[] = [];
    const seen: Record<LabelRole, Set<string>> = {
      scenario: new Set(),
      region: new Set(),
      variable: new Set(),
      item: new Set(),
      unit: new Set(),
      year: new Set(),
    };
    const fixedValues = new Set<string>();
    const occurrences = new Map<string, number>();
    const { linesToSkip, headerIncluded } = this.layout;

    let rowNumber = 0;
    for (const line of lines) {
      rowNumber++;
      if (rowNumber <= linesToSkip) continue;
      if (headerIncluded && rowNumber === linesToSkip + 1) continue;

      const fields = splitLine(line, this.layout.delimiter);

      const reason = this.structuralIssue(fields);
      if (reason) {
        counts.structuralIssues++;
        this.sink.structural({ rowNumber, fields, reason });
        continue;
      }

      if (this.ignore.has(fields[this.index.scenario])) {
        counts.ignoredScenario++;
        this.sink.ignored({ rowNumber, fields });
        continue;
      }

      const occurrence = (occurrences.get(line) ?? 0) + 1;
      occurrences.set(line, occurrence);
      if (occurrence > 1) {
        counts.duplicates++;
        this.sink.duplicate({ rowNumber, line, occurrence });
        continue;
      }

      counts.accepted++;
      const row = { rowNumber, line, fields };
      acceptedRows.push(row);
      this.sink.accepted(row);
      for (const role of LABEL_ROLES) seen[role].add(cleanField(fields[this.index[role]]));

      const value = cleanField(fields[this.index.value]);
      if (this.checkAcceptedValue(value, rowNumber)) fixedValues.add(value);

      if (rowNumber % PROGRESS_EVERY === 0) logger.info(`Diagnosed ${rowNumber} rows...`);
    }

    logger.info('Row diagnosis finished', { rows: rowNumber, ...counts, distinctRows: occurrences.size });
    return { counts, acceptedRows, seen, fixedValues, distinctRows: occurrences.size };
  }

  /** Reason text for the first structural problem of a row, or null. */
  structuralIssue(fields: string[]): string | null {
    if (fields.length !== this.expectedColumnCount) return 'Mismatched number of fields';

    for (const role of LABEL_ROLES) {
      if (cleanField(fields[this.index[role]]) === '') return `Empty ${role} field`;
    }

    if (!isInteger(cleanField(fields[this.index.year]))) return 'Non-integer year field';

    const raw = cleanField(fields[this.index.value]);
    const value = this.rules.fixForValue(raw) ?? raw;
    if (!isNumeric(value)) return 'Non-numeric value field';

    // bad variable/unit spellings are fixed later, so range-check their canonical form
    const variableField = cleanField(fields[this.index.variable]);
    const unitField = cleanField(fields[this.index.unit]);
    const variable = this.rules.matchCaseInsensitive('variable', variableField) ?? variableField;
    const unit = this.rules.matchCaseInsensitive('unit', unitField) ?? unitField;
    const { min, max } = this.rules.rangeFor(variable, unit);
    const n = Number(value);
    if (n < min) return `Value for variable ${variable} is smaller than ${min} ${unit}`;
    if (n > max) return `Value for variable ${variable} is greater than ${max} ${unit}`;
    return null;
  }

  /** True when the value goes through the value-fix table. */
  private checkAcceptedValue(value: string, rowNumber: number): boolean {
    const fixed = this.rules.fixForValue(value);
    if (!isNumeric(fixed ?? value)) {
      throw new InvariantViolationError(`Accepted row ${rowNumber} has non-numeric value "${value}"`);
    }
    return fixed !== null;
  }
}
