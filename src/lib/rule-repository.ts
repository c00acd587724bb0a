/*
  Rule repository
  -------------------------------------
  Controlled vocabulary for submissions, loaded once from a rule workbook:
  - canonical label tables (model, scenario, region, variable, item, unit, year)
  - fix tables (region fixes, value fixes)
  - value range constraints per (variable, unit)

  A loaded repository is immutable and is passed by reference to every
  diagnosis component.

  Usage (sketch):
    const rules = RuleRepository.load('workingdir/RuleTables.xlsx');
    rules.matchCaseInsensitive('scenario', 'ssp2_nomt_nocc'); // 'SSP2_NoMt_NoCC'
    rules.fuzzyClosest('region', 'US');                      // nearest region
    rules.rangeFor('PROD', '1000 t');                        // { min, max }
*/

import { readFileSync } from 'node:fs';
import levenshtein from 'js-levenshtein';
import * as XLSX from 'xlsx';
import * as logger from 'firebase-functions/logger';
import { intakeConfig } from './config';
import { RuleLoadError } from './errors';
import type { Category, ValueRange } from './types';

// --------------------------
// Types
// --------------------------
export interface RangeRule {
  variable: string;
  unit: string;
  min: number;
  max: number;
}

export interface FixRule {
  from: string;
  fix: string;
}

export interface RuleTables {
  labels: Record<Category, string[]>;
  regionFixes: FixRule[];
  valueFixes: FixRule[];
  ranges: RangeRule[];
}

export interface RuleRepositoryOptions {
  /** Minimum similarity (0..1) for fuzzyClosest to return a suggestion. */
  fuzzyCutoff?: number;
}

// Sheet name -> label column, in the order categories are declared
const LABEL_SHEETS: [Category, string, string][] = [
  ['model', 'ModelTable', 'Model'],
  ['scenario', 'ScenarioTable', 'Scenario'],
  ['region', 'RegionTable', 'Region'],
  ['variable', 'VariableTable', 'Variable'],
  ['item', 'ItemTable', 'Item'],
  ['unit', 'UnitTable', 'Unit'],
  ['year', 'YearTable', 'Year'],
];

const UNBOUNDED: ValueRange = Object.freeze({ min: -Infinity, max: Infinity });

// --------------------------
// Helpers
// --------------------------
type SheetRow = Record<string, unknown>;

function cellText(v: unknown): string {
  if (v === undefined || v === null) return '';
  return String(v);
}

function cellNumber(v: unknown, fallback: number, where: string): number {
  const text = cellText(v).trim();
  if (text === '') return fallback;
  const n = Number(text);
  if (Number.isNaN(n)) throw new RuleLoadError(`Non-numeric bound "${text}" in ${where}`, 'VariableUnitValueTable');
  return n;
}

function readSheet(wb: XLSX.WorkBook, sheet: string, columns: string[]): SheetRow[] {
  const ws = wb.Sheets[sheet];
  if (!ws) throw new RuleLoadError(`Rule workbook is missing sheet ${sheet}`, sheet);
  const rows = XLSX.utils.sheet_to_json<SheetRow>(ws, { raw: true, defval: '' });
  const header = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 })[0] ?? [];
  const present = new Set(header.map(cellText));
  for (const col of columns) {
    if (!present.has(col)) throw new RuleLoadError(`Sheet ${sheet} has no "${col}" column`, sheet);
  }
  return rows;
}

export function byCategory<T>(fn: (category: Category) => T): Record<Category, T> {
  return {
    model: fn('model'),
    scenario: fn('scenario'),
    region: fn('region'),
    variable: fn('variable'),
    item: fn('item'),
    unit: fn('unit'),
    year: fn('year'),
  };
}

function rangeKey(variable: string, unit: string) {
  return `${variable}\u0000${unit}`;
}

/** 1.0 for identical strings, towards 0.0 as they diverge. */
export function similarity(a: string, b: string) {
  const L = Math.max(a.length, b.length);
  if (L === 0) return 1;
  return 1 - levenshtein(a, b) / L;
}

export function tablesFromWorkbook(wb: XLSX.WorkBook): RuleTables {
  const sheets = new Map<Category, string[]>();
  for (const [category, sheet, column] of LABEL_SHEETS) {
    sheets.set(category, readSheet(wb, sheet, [column]).map((r) => cellText(r[column])).filter((v) => v !== ''));
  }
  const labels = byCategory((category) => sheets.get(category) ?? []);

  const regionFixes = readSheet(wb, 'RegionFixTable', ['Region', 'Fix'])
    .map((r) => ({ from: cellText(r.Region), fix: cellText(r.Fix) }))
    .filter((f) => f.from !== '');
  const valueFixes = readSheet(wb, 'ValueFixTable', ['Value', 'Fix'])
    .map((r) => ({ from: cellText(r.Value), fix: cellText(r.Fix) }))
    .filter((f) => f.from !== '');
  const ranges = readSheet(wb, 'VariableUnitValueTable', ['Variable', 'Unit', 'Minimum Value', 'Maximum Value'])
    .filter((r) => cellText(r.Variable) !== '')
    .map((r, i) => ({
      variable: cellText(r.Variable),
      unit: cellText(r.Unit),
      min: cellNumber(r['Minimum Value'], -Infinity, `VariableUnitValueTable row ${i + 2}`),
      max: cellNumber(r['Maximum Value'], Infinity, `VariableUnitValueTable row ${i + 2}`),
    }));

  return {
    labels,
    regionFixes,
    valueFixes,
    ranges,
  };
}

// --------------------------
// RuleRepository
// --------------------------
export class RuleRepository {
  private readonly canonical: Record<Category, ReadonlySet<string>>;
  private readonly lowered: Record<Category, ReadonlyMap<string, string>>;
  private readonly sorted: Record<Category, readonly string[]>;
  private readonly regionFixes: ReadonlyMap<string, string>;
  private readonly valueFixes: ReadonlyMap<string, string>;
  private readonly ranges: ReadonlyMap<string, ValueRange>;
  readonly fuzzyCutoff: number;

  private constructor(tables: RuleTables, options: RuleRepositoryOptions) {
    this.canonical = Object.freeze(byCategory((c) => new Set(tables.labels[c])));
    this.lowered = Object.freeze(
      byCategory((c) => {
        const lower = new Map<string, string>();
        // first spelling in table order wins on a case collision
        for (const v of tables.labels[c]) if (!lower.has(v.toLowerCase())) lower.set(v.toLowerCase(), v);
        return lower;
      })
    );
    this.sorted = Object.freeze(byCategory((c) => Object.freeze([...new Set(tables.labels[c])].sort())));
    this.regionFixes = new Map(tables.regionFixes.map((f) => [f.from.toLowerCase(), f.fix]));
    this.valueFixes = new Map(tables.valueFixes.map((f) => [f.from.toLowerCase(), f.fix]));
    this.ranges = new Map(tables.ranges.map((r) => [rangeKey(r.variable, r.unit), Object.freeze({ min: r.min, max: r.max })]));
    this.fuzzyCutoff = options.fuzzyCutoff ?? intakeConfig.fuzzyCutoff;
    Object.freeze(this);
  }

  static fromTables(tables: RuleTables, options: RuleRepositoryOptions = {}) {
    return new RuleRepository(tables, options);
  }

  /** Read a rule workbook from a path or an in-memory buffer. */
  static load(source: string | Buffer = intakeConfig.rulesPath, options: RuleRepositoryOptions = {}) {
    let buf: Buffer;
    if (typeof source === 'string') {
      try {
        buf = readFileSync(source);
      } catch (e: unknown) {
        throw new RuleLoadError(`Unable to read rule workbook ${source}: ${e instanceof Error ? e.message : String(e)}`);
      }
    } else {
      buf = source;
    }

    let wb: XLSX.WorkBook;
    try {
      wb = XLSX.read(buf, { type: 'buffer' });
    } catch (e: unknown) {
      throw new RuleLoadError(`Malformed rule workbook: ${e instanceof Error ? e.message : String(e)}`);
    }

    const tables = tablesFromWorkbook(wb);
    logger.info('Rule tables loaded', {
      ...byCategory((c) => tables.labels[c].length),
      regionFixes: tables.regionFixes.length,
      valueFixes: tables.valueFixes.length,
      ranges: tables.ranges.length,
    });
    return new RuleRepository(tables, options);
  }

  values(category: Category): readonly string[] {
    return this.sorted[category];
  }

  isValid(category: Category, value: string) {
    return this.canonical[category].has(value);
  }

  matchCaseInsensitive(category: Category, value: string): string | null {
    return this.lowered[category].get(value.toLowerCase()) ?? null;
  }

  /**
   * Canonical value with the closest spelling. Ties go to the lexicographically
   * smallest candidate. Null only for an empty table or a score below the cutoff.
   */
  fuzzyClosest(category: Category, value: string): string | null {
    let best: { cand: string; score: number } | null = null;
    for (const cand of this.sorted[category]) {
      const score = similarity(value, cand);
      // sorted iteration: strictly greater keeps the smallest candidate on ties
      if (!best || score > best.score) best = { cand, score };
    }
    if (!best || best.score < this.fuzzyCutoff) return null;
    return best.cand;
  }

  fixForValue(token: string): string | null {
    return this.valueFixes.get(token.toLowerCase()) ?? null;
  }

  fixForRegion(region: string): string | null {
    return this.regionFixes.get(region.toLowerCase()) ?? null;
  }

  rangeFor(variable: string, unit: string): ValueRange {
    return this.ranges.get(rangeKey(variable, unit)) ?? UNBOUNDED;
  }
}
