import * as logger from 'firebase-functions/logger';
import { intakeConfig } from './config';
import {
  SUPPORTED_DELIMITERS,
  type LeadingSample,
  cleanField,
  isInteger,
  isNumeric,
  mostFrequentCount,
  readLeadingSample,
  readLineWindow,
  sniffDelimiter,
  sniffHeader,
  splitLine,
  splitText,
} from './delimited';
import type { RuleRepository } from './rule-repository';
import type { ColumnAssignments, ColumnRole, SubmissionLayout } from './types';

export interface FormatInferenceOptions {
  /** Leading lines kept for inference. */
  sampleSize?: number;
  /** Line count of the whole file, when the caller knows it. Defaults to the sample length. */
  totalLines?: number;
}

/** Reads `size` lines starting at 0-based line `start`. */
export type LineWindowReader = (start: number, size: number) => string[];

const PREVIEW_ROWS = 3;
const OUTPUT_PREVIEW_HEADER = ['Model', 'Scenario', 'Region', 'Variable', 'Item', 'Unit', 'Year', 'Value'];
// Header cell text that marks a column role on its own
const ROLE_HEADERS: [Exclude<ColumnRole, 'year' | 'value'>, string][] = [
  ['scenario', 'Scenario'],
  ['region', 'Region'],
  ['variable', 'Variable'],
  ['item', 'Item'],
  ['unit', 'Unit'],
];

export function emptyAssignments(): ColumnAssignments {
  return { scenario: 0, region: 0, variable: 0, item: 0, unit: 0, year: 0, value: 0 };
}

export function emptyLayout(): SubmissionLayout {
  return {
    modelName: '',
    delimiter: '',
    headerIncluded: false,
    linesToSkip: 0,
    scenariosToIgnore: [],
    columns: emptyAssignments(),
  };
}

/**
 * Guesses how a submission is laid out from a bounded leading sample.
 *
 * The leading sample is captured once. Changing the delimiter or the lines to
 * skip goes through setDelimiter / setLinesToSkip, which reset the column roles
 * they invalidate and call resample() to rebuild the parsed sample. A skip that
 * reaches past the captured lines reads the window after it from the source.
 * Every guess returns false and leaves the layout untouched when it fails.
 */
export class FormatInferenceEngine {
  readonly layout: SubmissionLayout = emptyLayout();
  readonly sampleSize: number;
  readonly totalLines: number;
  private readonly topmost: readonly string[];
  private readonly readWindow: LineWindowReader;
  private nonSkipped: string[] = [];
  private parsed: string[][] = [];
  private columnCounts: number[] = [];

  constructor(
    private readonly rules: RuleRepository,
    lines: readonly string[],
    options: FormatInferenceOptions = {},
    readWindow?: LineWindowReader
  ) {
    this.sampleSize = options.sampleSize ?? intakeConfig.sampleLines;
    this.topmost = Object.freeze(lines.slice(0, this.sampleSize));
    this.totalLines = options.totalLines ?? lines.length;
    this.readWindow = readWindow ?? ((start, size) => lines.slice(start, start + size));
    this.resample();
  }

  static fromFile(path: string, rules: RuleRepository, options: FormatInferenceOptions = {}) {
    const sampleSize = options.sampleSize ?? intakeConfig.sampleLines;
    let sample: LeadingSample;
    try {
      sample = readLeadingSample(path, sampleSize);
    } catch (e: unknown) {
      throw new Error(`Error when opening file ${path}`, { cause: e });
    }
    const readWindow: LineWindowReader = (start, size) => {
      try {
        return readLineWindow(path, start, size);
      } catch (e: unknown) {
        throw new Error(`Error when opening file ${path}`, { cause: e });
      }
    };
    return new FormatInferenceEngine(rules, sample.lines, { sampleSize, totalLines: sample.totalLines }, readWindow);
  }

  static fromText(text: string, rules: RuleRepository, options: FormatInferenceOptions = {}) {
    const lines = splitText(text);
    return new FormatInferenceEngine(rules, lines, { totalLines: lines.length, ...options });
  }

  /** Non-skipped sample rows whose width matches the most frequent width. */
  get parsedSample(): readonly string[][] {
    return this.parsed;
  }

  get expectedColumnCount() {
    return mostFrequentCount(this.columnCounts);
  }

  get largestColumnCount() {
    return this.columnCounts.reduce((a, b) => Math.max(a, b), 0);
  }

  /** Rebuild the non-skipped slice and the parsed sample from the captured lines. */
  resample() {
    const skip = this.layout.linesToSkip;
    const captured = skip + this.sampleSize <= this.topmost.length || this.topmost.length >= this.totalLines;
    this.nonSkipped = captured
      ? this.topmost.slice(skip, skip + this.sampleSize)
      : this.readWindow(skip, this.sampleSize);
    const rows = this.nonSkipped.map((line) => splitLine(line, this.layout.delimiter));
    this.columnCounts = rows.map((r) => r.length);
    const width = this.expectedColumnCount;
    this.parsed = rows.filter((r) => r.length === width);
  }

  resetColumnRoles() {
    this.layout.columns = emptyAssignments();
  }

  setDelimiter(delimiter: string) {
    this.layout.delimiter = delimiter;
    this.resetColumnRoles();
    this.resample();
  }

  setLinesToSkip(lines: number) {
    this.layout.linesToSkip = lines;
    // nothing left to assign when the whole file is skipped
    if (lines > this.totalLines) this.resetColumnRoles();
    this.resample();
  }

  guessDelimiter(candidates: readonly string[] = SUPPORTED_DELIMITERS): boolean {
    const delimiter = sniffDelimiter(this.topmost, candidates);
    if (delimiter === null) {
      logger.info('Delimiter guess inconclusive', { candidates: candidates.length });
      return false;
    }
    this.setDelimiter(delimiter);
    return true;
  }

  guessHeaderPresence(): boolean {
    const delimiter = this.layout.delimiter || sniffDelimiter(this.topmost, SUPPORTED_DELIMITERS);
    if (!delimiter) return false;
    const hasHeader = sniffHeader(this.topmost, delimiter);
    if (hasHeader === null) return false;
    this.layout.headerIncluded = hasHeader;
    return true;
  }

  guessLinesToSkip(): boolean {
    if (this.topmost.length === 0) return true;
    const counts = this.topmost.map((line) => splitLine(line, this.layout.delimiter).length);
    const clean = mostFrequentCount(counts);

    let count = 0;
    for (const c of counts) {
      if (c === clean) break;
      count++;
    }

    if (count > this.sampleSize * 0.9) {
      this.setLinesToSkip(0);
      return false;
    }
    this.setLinesToSkip(count);
    return true;
  }

  /**
   * Walk the parsed sample column by column; the first cell in a column that
   * satisfies a role heuristic decides the column and ends the search there.
   */
  guessColumnRoles(): boolean {
    const rows = this.parsed;
    const ncols = rows.length > 0 ? rows[0].length : 0;
    if (rows.length === 0 || ncols === 0) return false;

    let guessedSomething = false;
    for (let col = 0; col < ncols; col++) {
      for (const row of rows) {
        if (this.guessCell(cleanField(row[col]), col + 1)) {
          guessedSomething = true;
          break;
        }
      }
    }
    return guessedSomething;
  }

  private guessCell(cell: string, ordinal: number): boolean {
    if (this.rules.isValid('model', cell)) {
      this.layout.modelName = cell;
      return true;
    }
    for (const [role, header] of ROLE_HEADERS) {
      if (cell === header || this.rules.isValid(role, cell)) {
        this.layout.columns[role] = ordinal;
        return true;
      }
    }
    if (isInteger(cell)) {
      const year = Number(cell);
      if (year > 1000 && year < 9999) {
        this.layout.columns.year = ordinal;
        return true;
      }
    }
    if (isNumeric(cell)) {
      this.layout.columns.value = ordinal;
      return true;
    }
    return false;
  }

  /** First rows of the parsed sample under a header row, always PREVIEW_ROWS tall. */
  inputPreview(): string[][] {
    let table = this.parsed.slice(0, PREVIEW_ROWS).map((r) => [...r]);
    if (table.length === 0) return Array.from({ length: PREVIEW_ROWS }, () => ['']);

    const ncols = table[0].length;
    while (table.length < PREVIEW_ROWS) table.push(Array<string>(ncols).fill(''));

    if (this.layout.headerIncluded) {
      table[0] = table[0].map((cell, i) => `${String.fromCharCode(97 + i)})  ${cell}`);
    } else {
      const header = Array.from({ length: ncols }, (_, i) => `Column ${i + 1}`);
      table = [header, ...table.slice(0, PREVIEW_ROWS - 1)];
    }
    return table;
  }

  /** The canonical 8-column layout the assignments would produce, over the input preview. */
  outputPreview(): string[][] {
    const input = this.inputPreview();
    const { modelName, columns } = this.layout;
    const rows: string[][] = [OUTPUT_PREVIEW_HEADER];
    for (let r = 1; r < PREVIEW_ROWS; r++) {
      const cell = (ordinal: number) => (ordinal === 0 ? '' : input[r][ordinal - 1] ?? '');
      rows.push([
        modelName,
        cell(columns.scenario),
        cell(columns.region),
        cell(columns.variable),
        cell(columns.item),
        cell(columns.unit),
        cell(columns.year),
        cell(columns.value),
      ]);
    }
    return rows;
  }
}
