/**
 * CSV Utilities for product list uploads
 *
 * Streaming parse (csv-parse) plus row cleaning:
 * - the name and brand columns are detected from the header row
 * - rows with a blank name are dropped
 * - rows repeating an earlier normalized name + brand are dropped
 */

import { createReadStream } from 'fs';
import { parse, type Parser } from 'csv-parse';
import { z } from 'zod';
import { DEFAULT_PUNCTUATION } from '../matching/constants';
import { normalizeText } from '../matching/normalizeQuery';
import type { Query } from '../matching/types';
import { AppError } from './AppError';

// ============================================
// Column Detection
// ============================================

export const NAME_COLUMNS = ['name', 'product', 'query', 'item', 'title', 'label'] as const;
export const BRAND_COLUMNS = ['brand', 'brands', 'maker', 'manufacturer'] as const;

export interface CsvColumns {
  name: string;
  brand?: string;
}

/**
 * Picks the name and brand columns, in preference order, from a header row.
 * Header comparison is case-insensitive; the returned names are the headers
 * as they appear in the file. Without a known name column the first column
 * holds the names.
 *
 * @returns null for an empty header row
 */
export function detectColumns(headers: readonly string[]): CsvColumns | null {
  const byLowerCase = new Map<string, string>();
  for (const header of headers) {
    const key = header.trim().toLowerCase();
    if (!byLowerCase.has(key)) {
      byLowerCase.set(key, header);
    }
  }

  const pick = (candidates: readonly string[]): string | undefined =>
    candidates.map((candidate) => byLowerCase.get(candidate)).find((header) => header !== undefined);

  const name = pick(NAME_COLUMNS) ?? headers[0];
  if (name === undefined) {
    return null;
  }

  const brand = pick(BRAND_COLUMNS);
  return { name, brand: brand === name ? undefined : brand };
}

// ============================================
// Row Cleaning
// ============================================

export interface CsvCleaningStats {
  totalRows: number;
  acceptedRows: number;
  droppedBlank: number;
  droppedDuplicates: number;
}

const recordSchema = z.record(z.string(), z.string());

export type CsvRecord = z.infer<typeof recordSchema>;

/**
 * Turns parsed records into queries one at a time, so that the caller can
 * stream a file of any length.
 */
export class CsvQueryCleaner {
  private columns: CsvColumns | null = null;
  private readonly seen = new Set<string>();
  private rowNumber = 0;
  private droppedBlank = 0;
  private droppedDuplicates = 0;

  constructor(private readonly punctuation: string = DEFAULT_PUNCTUATION) {}

  /**
   * @returns the query for this row, or null when the row is dropped
   * @throws AppError (400) when the file has no header row
   */
  accept(record: unknown): Query | null {
    this.rowNumber++;

    const parsed = recordSchema.safeParse(record);
    if (!parsed.success) {
      this.droppedBlank++;
      return null;
    }

    const columns = this.resolveColumns(parsed.data);
    const rawText = (parsed.data[columns.name] ?? '').trim();
    const brand = columns.brand ? (parsed.data[columns.brand] ?? '').trim() : '';

    if (!rawText) {
      this.droppedBlank++;
      return null;
    }

    const key = `${normalizeText(rawText, this.punctuation)}|${normalizeText(brand, this.punctuation)}`;
    if (this.seen.has(key)) {
      this.droppedDuplicates++;
      return null;
    }
    this.seen.add(key);

    return { id: `row-${this.rowNumber}`, rawText, brand: brand || undefined };
  }

  stats(): CsvCleaningStats {
    return {
      totalRows: this.rowNumber,
      acceptedRows: this.seen.size,
      droppedBlank: this.droppedBlank,
      droppedDuplicates: this.droppedDuplicates,
    };
  }

  private resolveColumns(record: CsvRecord): CsvColumns {
    if (!this.columns) {
      this.columns = detectColumns(Object.keys(record));
      if (!this.columns) {
        throw AppError.badRequest('CSV file has no header row');
      }
    }
    return this.columns;
  }
}

// ============================================
// Streaming Parser
// ============================================

/**
 * Opens a CSV file as an async iterable of header-keyed records.
 */
export function createCsvRecordStream(filePath: string): Parser {
  const parser = parse({
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  // pipe() does not forward source errors
  const source = createReadStream(filePath);
  source.on('error', (error) => parser.destroy(error));

  return source.pipe(parser);
}
