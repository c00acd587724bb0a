import { closeSync, mkdirSync, openSync, writeFileSync, writeSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import dayjs from 'dayjs';
import * as logger from 'firebase-functions/logger';
import { toCsv } from './delimited';
import type { RowSink } from './row-diagnosis';
import {
  PROCESSED_FIELDS,
  type AcceptedRow,
  type DuplicateRow,
  type IgnoredScenarioRow,
  type ProcessedRecord,
  type StructuralIssueRow,
} from './types';

export const STRUCTURAL_ISSUES_FILE = 'Rows With Structural Issue.csv';
export const IGNORED_SCENARIO_FILE = 'Records With An Ignored Scenario.csv';
export const DUPLICATES_FILE = 'Duplicate Records.csv';
export const ACCEPTED_FILE = 'Accepted Records.csv';
export const FILTERED_OUTPUT_FILE = 'Filtered Output Data.csv';

export interface DiagnosisFiles {
  structuralIssues: string;
  ignoredScenario: string;
  duplicates: string;
  accepted: string;
}

/**
 * Row sink that streams each bucket to its CSV file in `outDir`.
 * Structural rows are padded to the widest sample row so the reason
 * always lands in the same column. Call close() once the run is over.
 */
export class ReportWriter implements RowSink {
  readonly files: DiagnosisFiles;
  private readonly fds: Record<keyof DiagnosisFiles, number>;
  private closed = false;

  constructor(outDir: string, private readonly largestColumnCount: number) {
    mkdirSync(outDir, { recursive: true });
    this.files = {
      structuralIssues: join(outDir, STRUCTURAL_ISSUES_FILE),
      ignoredScenario: join(outDir, IGNORED_SCENARIO_FILE),
      duplicates: join(outDir, DUPLICATES_FILE),
      accepted: join(outDir, ACCEPTED_FILE),
    };
    this.fds = {
      structuralIssues: openSync(this.files.structuralIssues, 'w'),
      ignoredScenario: openSync(this.files.ignoredScenario, 'w'),
      duplicates: openSync(this.files.duplicates, 'w'),
      accepted: openSync(this.files.accepted, 'w'),
    };
  }

  structural(row: StructuralIssueRow) {
    const width = Math.max(this.largestColumnCount, row.fields.length);
    const padded = [...row.fields, ...Array<string>(width - row.fields.length).fill('')];
    writeSync(this.fds.structuralIssues, toCsv([[String(row.rowNumber), ...padded, row.reason]]));
  }

  ignored(row: IgnoredScenarioRow) {
    writeSync(this.fds.ignoredScenario, toCsv([[String(row.rowNumber), ...row.fields]]));
  }

  duplicate(row: DuplicateRow) {
    writeSync(this.fds.duplicates, toCsv([[String(row.rowNumber), row.line, String(row.occurrence)]]));
  }

  accepted(row: AcceptedRow) {
    writeSync(this.fds.accepted, `${row.line}\n`);
  }

  close(): DiagnosisFiles {
    if (!this.closed) {
      this.closed = true;
      for (const fd of Object.values(this.fds)) closeSync(fd);
    }
    return this.files;
  }
}

export function processedFileName(inputPath: string, now: Date = new Date()) {
  const stem = basename(inputPath, extname(inputPath));
  return `${stem}_${dayjs(now).format('MMDDYYYY_HHmmss')}.csv`;
}

export function recordsToCsv(records: readonly ProcessedRecord[]) {
  return toCsv(records.map((r) => PROCESSED_FIELDS.map((f) => r[f])));
}

/** Writes the 8-column processed output, no header; returns its path. */
export function writeProcessedOutput(
  records: readonly ProcessedRecord[],
  outDir: string,
  inputPath: string,
  now: Date = new Date()
) {
  mkdirSync(outDir, { recursive: true });
  const path = join(outDir, processedFileName(inputPath, now));
  writeFileSync(path, recordsToCsv(records));
  logger.info('Processed output written', { path, records: records.length });
  return path;
}

export function writeFilteredOutput(records: readonly ProcessedRecord[], outDir: string) {
  mkdirSync(outDir, { recursive: true });
  const path = join(outDir, FILTERED_OUTPUT_FILE);
  writeFileSync(path, recordsToCsv(records));
  logger.info('Filtered output written', { path, records: records.length });
  return path;
}
