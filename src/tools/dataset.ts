/**
 * Dataset Loader
 *
 * Reads the CSV behind the analysis tools. The file is read again on every
 * `load()` so edits on disk show up in the next tool call.
 */

import fs from 'fs';
import path from 'path';
import { DatasetError, describeCause } from '../core/errors.js';

export type Cell = string | null;
export type RecordValue = string | number | null;

export interface Dataset {
  path: string;
  /** Lower-cased header names, in file order. */
  columns: string[];
  rows: Cell[][];
}

// =============================================================================
// CSV PARSING
// =============================================================================

function parseRow(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current);
  return result;
}

/**
 * Split CSV text into a header row and data rows. Empty fields become null;
 * blank lines are skipped.
 */
export function parseCSV(csvString: string): { headers: string[]; rows: Cell[][] } {
  const lines = csvString
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(line => line.trim() !== '');

  if (lines.length === 0) {
    return { headers: [], rows: [] };
  }

  const headers = parseRow(lines[0]).map(h => h.trim());
  const rows = lines.slice(1).map(line => {
    const fields = parseRow(line);
    return headers.map((_, index): Cell => {
      const field = fields[index];
      return field === undefined || field === '' ? null : field;
    });
  });

  return { headers, rows };
}

// =============================================================================
// VALUE HELPERS
// =============================================================================

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function toNumber(cell: Cell): number | null {
  if (cell === null) return null;
  const trimmed = cell.trim();
  return NUMERIC.test(trimmed) ? Number(trimmed) : null;
}

export function isBlank(cell: Cell): boolean {
  return cell === null || cell.trim() === '';
}

export function columnIndex(dataset: Dataset, column: string): number {
  return dataset.columns.indexOf(column);
}

/**
 * A column is numeric when it has at least one value and every non-empty
 * value parses as a number.
 */
export function isNumericColumn(dataset: Dataset, index: number): boolean {
  let seen = false;
  for (const row of dataset.rows) {
    const cell = row[index];
    if (isBlank(cell)) continue;
    if (toNumber(cell) === null) return false;
    seen = true;
  }
  return seen;
}

export function toRecord(dataset: Dataset, row: Cell[], numericColumns: ReadonlySet<number>): Record<string, RecordValue> {
  const record: Record<string, RecordValue> = {};
  dataset.columns.forEach((column, index) => {
    const cell = row[index];
    record[column] = numericColumns.has(index) ? toNumber(cell) : cell;
  });
  return record;
}

export function numericColumnSet(dataset: Dataset): Set<number> {
  const numeric = new Set<number>();
  dataset.columns.forEach((_, index) => {
    if (isNumericColumn(dataset, index)) numeric.add(index);
  });
  return numeric;
}

// =============================================================================
// LOADER
// =============================================================================

export interface DatasetLoaderOptions {
  readFile?: (file: string) => string;
  exists?: (file: string) => boolean;
}

export class DatasetLoader {
  readonly path: string;
  private readonly readFile: (file: string) => string;
  private readonly exists: (file: string) => boolean;

  constructor(dataPath: string, options: DatasetLoaderOptions = {}) {
    this.path = path.resolve(dataPath);
    this.readFile = options.readFile ?? (file => fs.readFileSync(file, 'utf8'));
    this.exists = options.exists ?? (file => fs.existsSync(file));
  }

  load(): Dataset {
    if (!this.exists(this.path)) {
      throw new DatasetError('DATASET_NOT_FOUND', `Data file not found at ${this.path}`, this.path);
    }

    let text: string;
    try {
      text = this.readFile(this.path);
    } catch (error) {
      throw new DatasetError(
        'DATASET_UNREADABLE',
        `Failed to read dataset: ${describeCause(error)}`,
        this.path,
        error
      );
    }

    const { headers, rows } = parseCSV(text);
    if (headers.length === 0) {
      throw new DatasetError('DATASET_EMPTY', 'Failed to read dataset: no columns to parse from file', this.path);
    }

    return {
      path: this.path,
      columns: headers.map(h => h.toLowerCase()),
      rows,
    };
  }
}
