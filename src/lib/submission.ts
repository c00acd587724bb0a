import * as logger from 'firebase-functions/logger';
import { intakeConfig } from './config';
import { CorrectionApplicator, assertNoConflicts, type DroppedRecord } from './corrections';
import { DELIMITER_NAMES, readLines } from './delimited';
import { ConfigurationError } from './errors';
import { FormatInferenceEngine, type FormatInferenceOptions } from './format-inference';
import { LabelDiagnosisEngine } from './label-diagnosis';
import { parseLinesToSkip, parseScenariosToIgnore, validateLayout as checkLayout } from './layout';
import {
  ReportWriter,
  writeFilteredOutput,
  writeProcessedOutput,
  type DiagnosisFiles,
} from './report-writer';
import { RowDiagnosisEngine, type RowDiagnosis } from './row-diagnosis';
import type { RuleRepository } from './rule-repository';
import {
  PROCESSED_FIELDS,
  type ColumnRole,
  type DiagnosisResult,
  type ProcessedRecord,
  type SubmissionLayout,
  type UnknownLabelRecord,
} from './types';

export interface SubmissionDiagnosis extends DiagnosisResult {
  files: DiagnosisFiles;
  /** Layout the diagnosis ran with. */
  layout: SubmissionLayout;
  distinctRows: number;
}

export interface CorrectionReport {
  records: ProcessedRecord[];
  hasNewIssues: boolean;
  dropped: DroppedRecord[];
  processedPath: string;
  /** Only written when the range re-check removed rows. */
  filteredPath: string | null;
  overrideCount: number;
  uniqueValues: Record<keyof ProcessedRecord, string[]>;
}

function snapshot(layout: SubmissionLayout): SubmissionLayout {
  return { ...layout, scenariosToIgnore: [...layout.scenariosToIgnore], columns: { ...layout.columns } };
}

function uniqueValues(records: readonly ProcessedRecord[]): Record<keyof ProcessedRecord, string[]> {
  const sets = new Map(PROCESSED_FIELDS.map((f) => [f, new Set<string>()]));
  for (const r of records) for (const f of PROCESSED_FIELDS) sets.get(f)?.add(r[f]);
  const sorted = (f: keyof ProcessedRecord) => [...(sets.get(f) ?? [])].sort();
  return {
    model: sorted('model'),
    scenario: sorted('scenario'),
    region: sorted('region'),
    variable: sorted('variable'),
    item: sorted('item'),
    unit: sorted('unit'),
    year: sorted('year'),
    value: sorted('value'),
  };
}

/**
 * One submission from upload to processed output. Holds the inferred layout,
 * the last diagnosis and the last set of unknown-label decisions.
 *
 * Usage:
 *   const s = Submission.open('upload.csv', rules);
 *   s.setScenariosToIgnore('SSP5');
 *   const d = s.diagnose('out');
 *   const resolved = d.unknownLabels.map((u) => ({ ...u, fix: u.closestMatch }));
 *   s.applyCorrections(resolved, 'out');
 */
export class Submission {
  private diagnosis: SubmissionDiagnosis | null = null;
  private resolvedUnknowns: UnknownLabelRecord[] = [];

  private constructor(
    readonly inputPath: string,
    private readonly rules: RuleRepository,
    readonly inference: FormatInferenceEngine
  ) {}

  static open(path: string, rules: RuleRepository, options: FormatInferenceOptions = {}) {
    const submission = new Submission(path, rules, FormatInferenceEngine.fromFile(path, rules, options));
    submission.guessLayout();
    return submission;
  }

  get layout(): SubmissionLayout {
    return this.inference.layout;
  }

  get lastDiagnosis(): SubmissionDiagnosis | null {
    return this.diagnosis;
  }

  /** Delimiter, header, lines to skip, then column roles; each step may fail on its own. */
  guessLayout() {
    const guessed = {
      delimiter: this.inference.guessDelimiter(),
      header: this.inference.guessHeaderPresence(),
      linesToSkip: this.inference.guessLinesToSkip(),
      columns: this.inference.guessColumnRoles(),
    };
    logger.info('Layout guessed', {
      path: this.inputPath,
      ...guessed,
      delimiterName: DELIMITER_NAMES[this.layout.delimiter] ?? this.layout.delimiter,
    });
    return guessed;
  }

  setDelimiter(delimiter: string) {
    this.inference.setDelimiter(delimiter);
    this.inference.guessColumnRoles();
  }

  setLinesToSkip(value: number | string) {
    this.inference.setLinesToSkip(parseLinesToSkip(value));
    this.inference.guessColumnRoles();
  }

  setHeaderIncluded(included: boolean) {
    this.layout.headerIncluded = included;
  }

  setModelName(name: string) {
    this.layout.modelName = name.trim();
  }

  setScenariosToIgnore(text: string) {
    this.layout.scenariosToIgnore = parseScenariosToIgnore(text);
  }

  /** 1-based ordinal; 0 clears the assignment. */
  assignColumn(role: ColumnRole, ordinal: number) {
    if (!Number.isInteger(ordinal) || ordinal < 0) {
      throw new ConfigurationError(`Invalid column ${ordinal} for ${role}`);
    }
    this.layout.columns[role] = ordinal;
  }

  validateLayout() {
    checkLayout(this.layout);
  }

  inputPreview() {
    return this.inference.inputPreview();
  }

  outputPreview() {
    return this.inference.outputPreview();
  }

  diagnose(outDir: string = intakeConfig.outputDir): SubmissionDiagnosis {
    this.validateLayout();
    const layout = snapshot(this.layout);
    const writer = new ReportWriter(outDir, this.inference.largestColumnCount);
    const engine = new RowDiagnosisEngine(this.rules, layout, this.inference.expectedColumnCount, writer);

    let rows: RowDiagnosis;
    try {
      rows = engine.run(readLines(this.inputPath));
    } finally {
      writer.close();
    }

    const labels = new LabelDiagnosisEngine(this.rules).run(rows);
    this.diagnosis = {
      counts: rows.counts,
      badLabels: labels.badLabels,
      unknownLabels: labels.unknownLabels,
      unknownYears: labels.unknownYears,
      acceptedRows: rows.acceptedRows,
      files: writer.files,
      layout,
      distinctRows: rows.distinctRows,
    };
    this.resolvedUnknowns = labels.unknownLabels;
    return this.diagnosis;
  }

  validateUnknownLabels(records: readonly UnknownLabelRecord[]) {
    assertNoConflicts(records);
  }

  applyCorrections(
    unknownLabels?: readonly UnknownLabelRecord[],
    outDir: string = intakeConfig.outputDir
  ): CorrectionReport {
    const diagnosis = this.diagnosis;
    if (!diagnosis) throw new ConfigurationError('Run diagnosis before applying corrections');
    const resolved = [...(unknownLabels ?? diagnosis.unknownLabels)];
    this.validateUnknownLabels(resolved);

    const result = new CorrectionApplicator(this.rules).apply({
      modelName: diagnosis.layout.modelName,
      columns: diagnosis.layout.columns,
      acceptedRows: diagnosis.acceptedRows,
      badLabels: diagnosis.badLabels,
      unknownLabels: resolved,
    });
    this.resolvedUnknowns = resolved;

    const processedPath = writeProcessedOutput(result.unfiltered, outDir, this.inputPath);
    const filteredPath = result.hasNewIssues ? writeFilteredOutput(result.records, outDir) : null;
    if (result.hasNewIssues) {
      logger.warn('Corrected labels put values out of range', { dropped: result.dropped.length });
    }

    return {
      records: result.records,
      hasNewIssues: result.hasNewIssues,
      dropped: result.dropped,
      processedPath,
      filteredPath,
      overrideCount: resolved.filter((u) => u.override).length,
      uniqueValues: uniqueValues(result.records),
    };
  }

  /** `label,column,closestMatch` for every overridden unknown label. */
  overrideRequests(records: readonly UnknownLabelRecord[] = this.resolvedUnknowns): string[] {
    return records.filter((u) => u.override).map((u) => `${u.label},${u.column},${u.closestMatch}`);
  }
}
