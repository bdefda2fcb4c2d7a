import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { MapItem } from './types';
import { InputValidationError, type InputIssue } from './errors';

// ==========================================
// SCHEMAS
// ==========================================

const IdSchema = z
  .union([z.string().refine((value) => value.trim().length > 0, 'id must not be empty'), z.number().finite()])
  .transform((value) => String(value));

const PointRecordSchema = z
  .object({
    id: IdSchema,
    x: z.number({ invalid_type_error: 'x must be a number' }).finite('x must be finite'),
    y: z.number({ invalid_type_error: 'y must be a number' }).finite('y must be finite'),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

// ==========================================
// TYPES
// ==========================================

export type InputFormat = 'json' | 'jsonl';

export type RawRow = {
  /** 1-based array position, or line number for JSONL */
  row: number;
  value: unknown;
};

export type SkippedRow = {
  row: number;
  id?: string;
  reason: string;
};

export type IngestResult = {
  items: MapItem[];
  skipped: SkippedRow[];
};

// ==========================================
// PARSING
// ==========================================

export function detectFormat(filePath: string): InputFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.jsonl' || ext === '.ndjson' ? 'jsonl' : 'json';
}

export function parseInputText(text: string, format: InputFormat): RawRow[] {
  if (format === 'jsonl') {
    const rows: RawRow[] = [];
    const issues: InputIssue[] = [];
    text.split(/\r?\n/).forEach((line, i) => {
      if (!line.trim()) return;
      try {
        rows.push({ row: i + 1, value: JSON.parse(line) });
      } catch (error) {
        issues.push({ row: i + 1, reason: `invalid JSON (${error instanceof Error ? error.message : String(error)})` });
      }
    });
    if (issues.length > 0) throw new InputValidationError(issues, { format });
    return rows;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InputValidationError(
      [{ row: 0, reason: `invalid JSON (${error instanceof Error ? error.message : String(error)})` }],
      { format }
    );
  }

  const list = Array.isArray(parsed)
    ? parsed
    : parsed !== null && typeof parsed === 'object' && 'items' in parsed && Array.isArray(parsed.items)
      ? parsed.items
      : null;
  if (!list) {
    throw new InputValidationError([{ row: 0, reason: 'expected an array of records or an object with an "items" array' }], { format });
  }
  return list.map((value: unknown, i: number) => ({ row: i + 1, value }));
}

function peekId(value: unknown): string | undefined {
  if (value === null || typeof value !== 'object' || !('id' in value)) return undefined;
  const id = value.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

function isMissing(value: unknown, key: 'x' | 'y'): boolean {
  if (value === null || typeof value !== 'object') return false;
  if (!(key in value)) return true;
  const record: Record<string, unknown> = { ...value };
  return record[key] === null || record[key] === undefined;
}

/**
 * Validates raw rows into items.
 *
 * Rows missing a coordinate are skipped and reported. Every other problem
 * (non-numeric or non-finite coordinates, bad or duplicate ids) is collected
 * and thrown together as one InputValidationError.
 */
export function parseRecords(rows: readonly RawRow[]): IngestResult {
  const items: MapItem[] = [];
  const skipped: SkippedRow[] = [];
  const issues: InputIssue[] = [];
  const seen = new Map<string, number>();

  for (const { row, value } of rows) {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      issues.push({ row, reason: 'record is not an object' });
      continue;
    }

    const missing = (['x', 'y'] as const).filter((key) => isMissing(value, key));
    if (missing.length > 0) {
      skipped.push({ row, id: peekId(value), reason: `missing ${missing.join(' and ')}` });
      continue;
    }

    const result = PointRecordSchema.safeParse(value);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join(', ');
      issues.push({ row, id: peekId(value), reason });
      continue;
    }

    const { id, x, y, metadata, ...extras } = result.data;
    const firstRow = seen.get(id);
    if (firstRow !== undefined) {
      issues.push({ row, id, reason: `duplicate id (first seen at row ${firstRow})` });
      continue;
    }
    seen.set(id, row);
    items.push({ id, x, y, metadata: Object.freeze({ ...extras, ...metadata }) });
  }

  if (issues.length > 0) throw new InputValidationError(issues, { rows: rows.length });
  return { items, skipped };
}

// ==========================================
// FILE BOUNDARY
// ==========================================

export async function loadItems(filePath: string, format: InputFormat = detectFormat(filePath)): Promise<IngestResult> {
  const text = await fs.readFile(filePath, 'utf-8');
  return parseRecords(parseInputText(text, format));
}
