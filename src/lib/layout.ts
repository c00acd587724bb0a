import { ConfigurationError } from './errors';
import { COLUMN_ROLES, LABEL_COLUMNS, type SubmissionLayout } from './types';

/** Throws the first problem that keeps a layout from being diagnosed. */
export function validateLayout(layout: SubmissionLayout) {
  if (layout.modelName.length === 0) throw new ConfigurationError('Model name is empty');
  if (layout.delimiter.length === 0) throw new ConfigurationError('Delimiter is empty');
  if (!Number.isInteger(layout.linesToSkip)) throw new ConfigurationError('Invalid number of lines');
  if (layout.linesToSkip < 0) throw new ConfigurationError('Number of lines cannot be negative');

  for (const role of COLUMN_ROLES) {
    const ordinal = layout.columns[role];
    if (!Number.isInteger(ordinal) || ordinal <= 0) {
      throw new ConfigurationError(`${LABEL_COLUMNS[role]} column is empty`);
    }
  }

  const assigned = new Set(COLUMN_ROLES.map((role) => layout.columns[role]));
  if (assigned.size < COLUMN_ROLES.length) throw new ConfigurationError('Output data has duplicate columns');
}

export function parseLinesToSkip(input: number | string): number {
  const text = String(input).trim();
  if (!/^[-+]?\d+$/.test(text)) throw new ConfigurationError('Invalid number of lines');
  const n = Number(text);
  if (n < 0) throw new ConfigurationError('Number of lines cannot be negative');
  return n;
}

/** "a, b ,c" -> ['a', 'b', 'c']; blank input means nothing is ignored. */
export function parseScenariosToIgnore(text: string): string[] {
  const value = text.trim();
  if (value === '') return [];
  return value.split(',').map((s) => s.trim());
}
