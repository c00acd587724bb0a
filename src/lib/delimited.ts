/*
  Delimited text helpers
  ----------------------
  - Line reading (whole text, leading sample, or a synchronous line stream over a file)
  - Row splitting via csv-parse with quoting disabled, so a row splits on every delimiter
  - Column-count statistics used to pick the "clean" row shape
  - Delimiter / header sniffing over a sample
*/

import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import validator from 'validator';

export const SUPPORTED_DELIMITERS = [',', ';', '\t', '|', ' '] as const;
export const DELIMITER_NAMES: Record<string, string> = {
  ',': 'comma',
  ';': 'semicolon',
  '\t': 'tab',
  '|': 'pipe',
  ' ': 'space',
};

// Sniffer preference when several candidates are equally consistent
const PREFERRED_DELIMITERS = [',', '\t', ';', ' ', ':'];
const READ_CHUNK_BYTES = 64 * 1024;
const QUOTES_AND_SPACE = /^['"`\s]+|['"`\s]+$/g;

export function splitLine(line: string, delimiter: string): string[] {
  if (!delimiter) return [line];
  const records: string[][] = parse(line, {
    delimiter,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: false,
  });
  return records[0] ?? [''];
}

export function splitText(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Strip surrounding quote characters and whitespace from a cell. */
export function cleanField(value: string) {
  return value.replace(QUOTES_AND_SPACE, '');
}

/** A float token that also parses to a finite number. */
export function isNumeric(value: string) {
  const v = value.trim();
  return v !== '' && validator.isFloat(v) && Number.isFinite(Number(v));
}

export function isInteger(value: string) {
  const v = value.trim();
  return v !== '' && validator.isInt(v);
}

/**
 * Synchronous line stream over a file. Lines are yielded without their
 * terminator; a trailing newline does not produce an extra empty line.
 */
export function* readLines(path: string): Generator<string> {
  const fd = openSync(path, 'r');
  try {
    const decoder = new StringDecoder('utf8');
    const buf = Buffer.alloc(READ_CHUNK_BYTES);
    let leftover = '';
    let n: number;
    while ((n = readSync(fd, buf, 0, buf.length, null)) > 0) {
      const text = leftover + decoder.write(buf.subarray(0, n));
      const parts = text.split('\n');
      leftover = parts.pop() ?? '';
      for (const part of parts) yield part.endsWith('\r') ? part.slice(0, -1) : part;
    }
    leftover += decoder.end();
    if (leftover !== '') yield leftover.endsWith('\r') ? leftover.slice(0, -1) : leftover;
  } finally {
    closeSync(fd);
  }
}

export interface LeadingSample {
  lines: string[];
  totalLines: number;
}

/** Up to `limit` lines starting at 0-based line `start`; the rest of the file is not read. */
export function readLineWindow(path: string, start: number, limit: number): string[] {
  const lines: string[] = [];
  if (limit <= 0) return lines;
  let index = 0;
  for (const line of readLines(path)) {
    if (index >= start) lines.push(line);
    index++;
    if (lines.length >= limit) break;
  }
  return lines;
}

/** Keep the first `limit` lines of a file and count the rest without holding them. */
export function readLeadingSample(path: string, limit: number): LeadingSample {
  const lines: string[] = [];
  let totalLines = 0;
  for (const line of readLines(path)) {
    if (lines.length < limit) lines.push(line);
    totalLines++;
  }
  return { lines, totalLines };
}

/** Most frequent value; ties go to the smallest count. 0 for no input. */
export function mostFrequentCount(counts: Iterable<number>): number {
  const tally = new Map<number, number>();
  for (const c of counts) tally.set(c, (tally.get(c) ?? 0) + 1);
  let best = 0;
  let bestTally = 0;
  for (const [count, n] of tally) {
    if (n > bestTally || (n === bestTally && count < best)) {
      best = count;
      bestTally = n;
    }
  }
  return best;
}

function countOccurrences(line: string, ch: string) {
  let n = 0;
  for (let i = line.indexOf(ch); i !== -1; i = line.indexOf(ch, i + 1)) n++;
  return n;
}

/**
 * Pick the candidate whose per-line frequency is the most consistent across the
 * sample, examining it in chunks of 10 lines. Null when nothing qualifies.
 */
export function sniffDelimiter(lines: readonly string[], candidates: readonly string[]): string | null {
  const data = lines.filter((l) => l !== '');
  if (data.length === 0 || candidates.length === 0) return null;

  const chunkLength = Math.min(10, data.length);
  const frequency = new Map<string, Map<number, number>>();
  const delims = new Map<string, [number, number]>();
  let iteration = 0;

  for (let start = 0, end = chunkLength; start < data.length; start = end, end += chunkLength) {
    iteration++;
    for (const line of data.slice(start, end)) {
      for (const ch of candidates) {
        const meta = frequency.get(ch) ?? new Map<number, number>();
        const freq = countOccurrences(line, ch);
        meta.set(freq, (meta.get(freq) ?? 0) + 1);
        frequency.set(ch, meta);
      }
    }

    // (frequency, lines showing it minus lines that don't) per character
    const modes = new Map<string, [number, number]>();
    for (const [ch, meta] of frequency) {
      const items = [...meta.entries()];
      if (items.length === 1 && items[0][0] === 0) continue;
      let best = items[0];
      for (const item of items) if (item[1] > best[1]) best = item;
      const rest = items.reduce((sum, item) => (item === best ? sum : sum + item[1]), 0);
      modes.set(ch, [best[0], best[1] - rest]);
    }

    const total = Math.min(chunkLength * iteration, data.length);
    let consistency = 1.0;
    while (delims.size === 0 && consistency >= 0.9) {
      for (const [ch, [freq, count]] of modes) {
        if (freq > 0 && count > 0 && count / total >= consistency) delims.set(ch, [freq, count]);
      }
      consistency -= 0.01;
    }

    if (delims.size === 1) return [...delims.keys()][0];
  }

  if (delims.size === 0) return null;
  for (const d of PREFERRED_DELIMITERS) if (delims.has(d)) return d;

  let winner: string | null = null;
  let top: [number, number] = [-1, -1];
  for (const [ch, mode] of delims) {
    if (mode[0] > top[0] || (mode[0] === top[0] && mode[1] > top[1])) {
      winner = ch;
      top = mode;
    }
  }
  return winner;
}

type ColumnShape = 'numeric' | number;

/**
 * Header heuristic: learn each column's shape (numeric, or a fixed length) from
 * up to 21 rows after the first, then let every column with a stable shape vote
 * on whether the first row breaks it. Null when there is nothing to compare.
 */
export function sniffHeader(lines: readonly string[], delimiter: string): boolean | null {
  if (lines.length < 2) return null;
  const header = splitLine(lines[0], delimiter);
  const width = header.length;
  const shapes = new Map<number, ColumnShape | null>();
  for (let i = 0; i < width; i++) shapes.set(i, null);

  let checked = 0;
  for (const line of lines.slice(1)) {
    if (checked > 20) break;
    checked++;
    const row = splitLine(line, delimiter);
    if (row.length !== width) continue;
    for (const col of [...shapes.keys()]) {
      const shape: ColumnShape = isNumeric(row[col]) ? 'numeric' : row[col].length;
      const known = shapes.get(col);
      if (known === null) shapes.set(col, shape);
      else if (known !== shape) shapes.delete(col);
    }
  }

  let votes = 0;
  for (const [col, shape] of shapes) {
    if (shape === null) continue;
    if (typeof shape === 'number') votes += header[col].length !== shape ? 1 : -1;
    else votes += isNumeric(header[col]) ? -1 : 1;
  }
  return votes > 0;
}

export function toCsv(rows: readonly (readonly string[])[]): string {
  if (rows.length === 0) return '';
  return stringify(rows.map((r) => [...r]));
}
