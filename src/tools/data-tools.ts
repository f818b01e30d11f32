/**
 * Dataset Analysis Tools
 *
 * The four operations the reasoning service may call. Each returns a text
 * envelope holding one JSON payload and never throws: load failures, bad
 * arguments and unknown columns come back as `{ ok: false, status: "error" }`.
 *
 * `validate_data_tool` also drives the per-turn gate. When it reports a
 * problem, every analysis tool called later in the same turn answers
 * `status: "halted"` without reading the dataset.
 */

import { z } from 'zod';
import type { ToolEnvelope } from '../core/types.js';
import { DatasetError, describeCause } from '../core/errors.js';
import { errorMeta, type StructuredLogger } from '../logging/logger.js';
import {
  columnIndex,
  isBlank,
  numericColumnSet,
  toNumber,
  toRecord,
  type Cell,
  type Dataset,
  type DatasetLoader,
  type RecordValue,
} from './dataset.js';
import type { TurnGuard } from './turn-guard.js';

export const REQUIRED_COLUMNS = ['products', 'revenue'] as const;
export const MAX_EXAMPLES = 5;

export interface DataToolDefinition {
  name: string;
  version: string;
  description: string;
  /** Argument shape advertised to the reasoning service. */
  inputShape: z.ZodRawShape;
  /** Analysis tools are refused once validation has failed this turn. */
  gated: boolean;
  execute(input: Record<string, unknown>): Promise<ToolEnvelope>;
}

export interface DataToolsContext {
  loader: DatasetLoader;
  guard: TurnGuard;
  logger: StructuredLogger;
}

type Payload = Record<string, unknown>;

export function envelope(payload: Payload, pretty = false): ToolEnvelope {
  return {
    content: [{ type: 'text', text: pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload) }],
  };
}

function failure(error: string): Payload {
  return { ok: false, status: 'error', error };
}

function success(result: Payload, dataset: Dataset, column: number): Payload {
  return {
    ok: true,
    status: 'success',
    result,
    metadata: {
      rows_analyzed: dataset.rows.length,
      non_null_values: dataset.rows.filter(row => row[column] !== null).length,
    },
  };
}

type Loaded = { ok: true; dataset: Dataset } | { ok: false; payload: Payload };

function loadDataset(context: DataToolsContext, tool: string): Loaded {
  try {
    return { ok: true, dataset: context.loader.load() };
  } catch (error) {
    if (error instanceof DatasetError) {
      context.logger.warn('dataset_load_failed', { tool, path: error.path, error: errorMeta(error) });
      return { ok: false, payload: failure(error.message) };
    }
    context.logger.failure('dataset_load_unexpected', error, { tool });
    return { ok: false, payload: failure(`Unexpected: ${describeCause(error)}`) };
  }
}

// =============================================================================
// INPUT SCHEMAS
// =============================================================================

const totalShape = {
  column: z.string().optional().describe('Numeric column to sum (default "revenue")'),
};

const topNShape = {
  column: z.string().optional().describe('Column to rank by (default "revenue")'),
  n: z.union([z.number(), z.string()]).optional().describe('How many rows to return (default 5)'),
};

const filterShape = {
  column: z.string().optional().describe('Column to match on (default "products")'),
  value: z.union([z.string(), z.number()]).optional().describe('Value to match, case-insensitive'),
};

function parseInput<S extends z.ZodRawShape>(
  shape: S,
  input: Record<string, unknown>
): { ok: true; args: z.infer<z.ZodObject<S>> } | { ok: false; payload: Payload } {
  const parsed = z.object(shape).safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    return { ok: false, payload: failure(`Invalid input: ${detail}`) };
  }
  return { ok: true, args: parsed.data };
}

function parseCount(raw: number | string | undefined): number | null {
  if (raw === undefined) return 5;
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? raw : null;
  }
  const text = raw.trim();
  return /^[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}

// =============================================================================
// OPERATIONS
// =============================================================================

export function validateDataset(dataset: Dataset): Payload {
  const missing = REQUIRED_COLUMNS.filter(c => !dataset.columns.includes(c)).sort();
  if (missing.length > 0) {
    return {
      ok: false,
      status: 'insufficient',
      error: `Missing columns: ${missing.join(', ')}`,
      columns: dataset.columns,
      rows: dataset.rows.length,
    };
  }

  if (dataset.rows.length === 0) {
    return { ok: false, status: 'insufficient', error: 'No rows in dataset.' };
  }

  const products = columnIndex(dataset, 'products');
  const revenue = columnIndex(dataset, 'revenue');

  const missingSummary: Record<string, { count: number; examples: Array<{ index: number; products: Cell; value: Cell }> }> = {};
  dataset.columns.forEach((column, c) => {
    const blankRows = dataset.rows
      .map((row, index) => ({ row, index }))
      .filter(({ row }) => isBlank(row[c]));
    if (blankRows.length === 0) return;

    missingSummary[column] = {
      count: blankRows.length,
      examples: blankRows.slice(0, MAX_EXAMPLES).map(({ row, index }) => ({
        index,
        products: row[products],
        value: row[c],
      })),
    };
  });

  const negativeRows = dataset.rows
    .map((row, index) => ({ row, index, amount: toNumber(row[revenue]) }))
    .filter(({ amount }) => amount !== null && amount < 0);
  const negativeExamples = negativeRows.slice(0, MAX_EXAMPLES).map(({ row, index, amount }) => ({
    index,
    products: row[products],
    revenue: amount,
  }));

  const issues: string[] = [];
  const columnsWithGaps = Object.keys(missingSummary);
  if (columnsWithGaps.length > 0) {
    issues.push(`Missing values present in columns: ${columnsWithGaps.join(', ')}`);
  }
  if (negativeRows.length > 0) {
    issues.push(`${negativeRows.length} rows have negative revenue (examples included)`);
  }

  const ok = issues.length === 0;
  return {
    ok,
    status: ok ? 'valid' : 'insufficient',
    columns: dataset.columns,
    rows: dataset.rows.length,
    issues,
    missing_summary: missingSummary,
    negative_revenue_examples: negativeExamples,
  };
}

export function calculateTotal(dataset: Dataset, column: string): Payload {
  const c = columnIndex(dataset, column);
  if (c === -1) {
    return failure(`Column '${column}' not found. Available: ${dataset.columns.join(', ')}`);
  }

  const total = dataset.rows.reduce((sum, row) => sum + (toNumber(row[c]) ?? 0), 0);
  return success({ intent: 'aggregation', column, total }, dataset, c);
}

export function topN(dataset: Dataset, column: string, n: number): Payload {
  const c = columnIndex(dataset, column);
  if (c === -1) {
    return failure(`Column '${column}' not found. Available columns: ${dataset.columns.join(', ')}`);
  }

  const numeric = numericColumnSet(dataset);
  const key = (row: Cell[]): number | string | null => (numeric.has(c) ? toNumber(row[c]) : row[c]);

  const sorted = [...dataset.rows].sort((a, b) => {
    const left = key(a);
    const right = key(b);
    if (left === null && right === null) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    if (typeof left === 'number' && typeof right === 'number') return right - left;
    return String(right).localeCompare(String(left));
  });

  const rows: Array<Record<string, RecordValue>> = sorted.slice(0, n).map(row => toRecord(dataset, row, numeric));
  return success({ intent: 'top_n', column, n, rows }, dataset, c);
}

/**
 * Resolve `product` against `products` and the reverse, when the requested
 * name itself is not a column.
 */
export function resolveColumn(dataset: Dataset, column: string): string {
  if (dataset.columns.includes(column)) return column;
  if (column.endsWith('s') && dataset.columns.includes(column.slice(0, -1))) {
    return column.slice(0, -1);
  }
  if (dataset.columns.includes(`${column}s`)) {
    return `${column}s`;
  }
  return column;
}

export function filterByValue(dataset: Dataset, requested: string, value: string | number): Payload {
  const column = resolveColumn(dataset, requested);
  const c = columnIndex(dataset, column);
  if (c === -1) {
    return failure(`Column '${column}' not found. Available: ${dataset.columns.join(', ')}`);
  }

  const target = String(value).toLowerCase();
  const matches = dataset.rows.filter(row => {
    const cell = row[c];
    return cell !== null && cell.toLowerCase() === target;
  });

  const revenue = columnIndex(dataset, 'revenue');
  const total = revenue === -1 ? 0 : matches.reduce((sum, row) => sum + (toNumber(row[revenue]) ?? 0), 0);

  const numeric = numericColumnSet(dataset);
  const rows = matches.map(row => toRecord(dataset, row, numeric));

  return success({ intent: 'filter', column, value, count: rows.length, total, rows }, dataset, c);
}

// =============================================================================
// TOOL DEFINITIONS
// =============================================================================

type ToolSpec = Omit<DataToolDefinition, 'execute'> & {
  body(input: Record<string, unknown>): Payload;
};

export function createDataTools(context: DataToolsContext): DataToolDefinition[] {
  const { guard, logger } = context;

  function halted(tool: string): Payload | null {
    const trip = guard.halted;
    if (trip === null) return null;
    logger.info('tool_halted', { tool, turn: guard.currentTurn, reason: trip.reason });
    return {
      ok: false,
      status: 'halted',
      error: `Dataset failed validation; analysis halted for this turn. ${trip.reason}`,
      issues: trip.issues,
    };
  }

  function run(spec: ToolSpec, input: Record<string, unknown>): Promise<ToolEnvelope> {
    const started = Date.now();
    let payload: Payload;
    try {
      payload = (spec.gated ? halted(spec.name) : null) ?? spec.body(input);
    } catch (error) {
      logger.failure('tool_unexpected_error', error, { tool: spec.name });
      payload = failure(`Unexpected: ${describeCause(error)}`);
    }

    const ok = payload.ok === true;
    logger.toolCalled(spec.name, Date.now() - started, ok);
    if (!ok) {
      logger.info('tool_failed', { tool: spec.name, status: payload.status, reason: payload.error });
    }
    return Promise.resolve(envelope(payload, ok || payload.status === 'insufficient'));
  }

  const specs: ToolSpec[] = [
    {
      name: 'validate_data_tool',
      version: '1.0.0',
      description:
        "Validate the loaded dataset before any analysis. Checks that the 'products' and 'revenue' columns " +
        'exist, reports empty cells per column with examples, and rows with negative revenue. Call it first; ' +
        'when it reports problems, do not call the analysis tools and report the issues instead.',
      inputShape: {},
      gated: false,
      body: () => {
        const loaded = loadDataset(context, 'validate_data_tool');
        if (!loaded.ok) {
          guard.halt(String(loaded.payload.error));
          return loaded.payload;
        }

        const payload = validateDataset(loaded.dataset);
        if (payload.ok !== true) {
          const issues = Array.isArray(payload.issues) ? payload.issues.map(String) : [];
          guard.halt(typeof payload.error === 'string' ? payload.error : issues.join('; '), issues);
        }
        return payload;
      },
    },
    {
      name: 'calculate_total_tool',
      version: '1.0.0',
      description:
        "Sum a numeric column, usually 'revenue'. Use for totals and aggregate values. Non-numeric cells " +
        'are ignored. Returns the total, the number of rows analyzed and the count of non-null entries.',
      inputShape: totalShape,
      gated: true,
      body: input => {
        const parsed = parseInput(totalShape, input);
        if (!parsed.ok) return parsed.payload;

        const loaded = loadDataset(context, 'calculate_total_tool');
        if (!loaded.ok) return loaded.payload;

        return calculateTotal(loaded.dataset, parsed.args.column ?? 'revenue');
      },
    },
    {
      name: 'get_top_n_tool',
      version: '1.0.0',
      description:
        "Return the N rows with the highest values in a column such as 'revenue', sorted descending. " +
        "Input: {'column': str, 'n': int}. Missing values sort last. Use for rankings, not totals or filters.",
      inputShape: topNShape,
      gated: true,
      body: input => {
        const parsed = parseInput(topNShape, input);
        if (!parsed.ok) return parsed.payload;

        const n = parseCount(parsed.args.n);
        if (n === null) return failure("'n' must be an integer.");
        if (n < 0) return failure("'n' must not be negative.");

        const loaded = loadDataset(context, 'get_top_n_tool');
        if (!loaded.ok) return loaded.payload;

        return topN(loaded.dataset, parsed.args.column ?? 'revenue', n);
      },
    },
    {
      name: 'filter_by_value_tool',
      version: '1.0.0',
      description:
        "Return the rows whose column equals a value (case-insensitive), e.g. all 'Mango' products. " +
        "Input: {'column': str, 'value': str}. Also sums 'revenue' over the matching rows. " +
        'Equality only: no patterns or numeric comparisons.',
      inputShape: filterShape,
      gated: true,
      body: input => {
        const parsed = parseInput(filterShape, input);
        if (!parsed.ok) return parsed.payload;

        const column = parsed.args.column ?? 'products';
        const value = parsed.args.value;
        if (!column || value === undefined) {
          return failure("Both 'column' and 'value' are required.");
        }

        const loaded = loadDataset(context, 'filter_by_value_tool');
        if (!loaded.ok) return loaded.payload;

        return filterByValue(loaded.dataset, column, value);
      },
    },
  ];

  return specs.map(spec => ({
    name: spec.name,
    version: spec.version,
    description: spec.description,
    inputShape: spec.inputShape,
    gated: spec.gated,
    execute: (input: Record<string, unknown>) => run(spec, input),
  }));
}
