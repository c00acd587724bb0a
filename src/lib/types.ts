export type Category = 'model' | 'scenario' | 'region' | 'variable' | 'item' | 'unit' | 'year';
export type ColumnRole = 'scenario' | 'region' | 'variable' | 'item' | 'unit' | 'year' | 'value';
export type LabelColumn = 'Scenario' | 'Region' | 'Variable' | 'Item' | 'Unit' | 'Year' | 'Value';
export type RowBucket = 'structural' | 'ignored' | 'duplicate' | 'accepted';

export const COLUMN_ROLES: readonly ColumnRole[] = ['scenario', 'region', 'variable', 'item', 'unit', 'year', 'value'];

export const LABEL_COLUMNS: Record<ColumnRole, LabelColumn> = {
  scenario: 'Scenario',
  region: 'Region',
  variable: 'Variable',
  item: 'Item',
  unit: 'Unit',
  year: 'Year',
  value: 'Value',
};

// 1-based column ordinals, 0 = unassigned
export type ColumnAssignments = Record<ColumnRole, number>;

export interface SubmissionLayout {
  modelName: string;
  delimiter: string;
  headerIncluded: boolean;
  linesToSkip: number;
  scenariosToIgnore: string[];
  columns: ColumnAssignments;
}

export interface ValueRange {
  min: number;
  max: number;
}

export interface BadLabelRecord {
  readonly label: string;
  readonly column: LabelColumn;
  readonly fix: string;
}

export interface UnknownLabelRecord {
  readonly label: string;
  readonly column: LabelColumn;
  readonly closestMatch: string;
  readonly fix: string;
  readonly override: boolean;
}

export interface StructuralIssueRow {
  rowNumber: number;
  fields: string[];
  reason: string;
}

export interface IgnoredScenarioRow {
  rowNumber: number;
  fields: string[];
}

export interface DuplicateRow {
  rowNumber: number;
  line: string;
  occurrence: number;
}

export interface AcceptedRow {
  rowNumber: number;
  line: string;
  fields: string[];
}

export interface DiagnosisCounts {
  structuralIssues: number;
  ignoredScenario: number;
  duplicates: number;
  accepted: number;
}

export interface DiagnosisResult {
  counts: DiagnosisCounts;
  badLabels: BadLabelRecord[];
  unknownLabels: UnknownLabelRecord[];
  unknownYears: Set<string>;
  acceptedRows: AcceptedRow[];
}

export interface ProcessedRecord {
  model: string;
  scenario: string;
  region: string;
  variable: string;
  item: string;
  unit: string;
  year: string;
  value: string;
}

export const PROCESSED_FIELDS: readonly (keyof ProcessedRecord)[] = [
  'model', 'scenario', 'region', 'variable', 'item', 'unit', 'year', 'value',
];
