/**
 * CSV Rows
 *
 * readCsvRows loads an input file in header mode. CsvRowSink appends
 * one line per flushed row so a crash after row N leaves rows 1..N on
 * disk; reopening the same path resumes from the keys already written.
 */

import { existsSync } from "fs";
import { appendFile, readFile, writeFile } from "fs/promises";
import Papa from "papaparse";
import type { BatchSink } from "../batch/driver";
import { defaultRowKey, ENRICHMENT_COLUMNS, type BatchRow } from "../batch/rows";

const NEWLINE = "\n";

export function parseCsv(text: string): { fields: string[]; rows: BatchRow[] } {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  for (const error of result.errors) {
    console.warn(`[CSV] Row ${error.row ?? "?"}: ${error.message}`);
  }

  const fields = result.meta.fields ?? [];
  const rows = result.data.map((record) => {
    const row: BatchRow = {};
    for (const field of fields) {
      const value = record[field];
      row[field] = typeof value === "string" ? value : "";
    }
    return row;
  });

  return { fields, rows };
}

export async function readCsvRows(path: string): Promise<BatchRow[]> {
  const text = await readFile(path, "utf8");
  return parseCsv(text).rows;
}

export function formatCsvLine(fields: readonly string[], row: BatchRow): string {
  return Papa.unparse([fields.map((field) => row[field] ?? "")], { newline: NEWLINE }) + NEWLINE;
}

// ============================================================================
// Sink
// ============================================================================

function withEnrichmentColumns(fields: string[]): string[] {
  const present = new Set(fields);
  return [...fields, ...ENRICHMENT_COLUMNS.filter((column) => !present.has(column))];
}

export interface CsvRowSinkOptions {
  keyOf?: (row: BatchRow, index: number) => string;
  /**
   * Column order; defaults to the existing header, else the first row's
   * keys followed by any enrichment columns it lacks
   */
  fields?: readonly string[];
}

export class CsvRowSink implements BatchSink<BatchRow> {
  private fields?: string[];
  private existingKeys = new Set<string>();
  private written = 0;

  constructor(
    readonly path: string,
    private readonly options: CsvRowSinkOptions = {}
  ) {
    this.fields = options.fields ? [...options.fields] : undefined;
  }

  async completedKeys(): Promise<ReadonlySet<string>> {
    if (!existsSync(this.path)) {
      return this.existingKeys;
    }

    const { fields, rows } = parseCsv(await readFile(this.path, "utf8"));
    if (fields.length > 0) {
      this.fields = fields;
    }

    const keyOf = this.options.keyOf ?? defaultRowKey;
    this.existingKeys = new Set(rows.map((row, index) => keyOf(row, index)));
    this.written = rows.length;

    if (rows.length > 0) {
      console.log(`[CSV] Resuming ${this.path}: ${rows.length} rows already written`);
    }
    return this.existingKeys;
  }

  async write(_key: string, row: BatchRow): Promise<void> {
    const fields = this.fields ?? withEnrichmentColumns(Object.keys(row));
    this.fields = fields;

    if (this.written === 0) {
      await writeFile(this.path, Papa.unparse([fields], { newline: NEWLINE }) + NEWLINE, "utf8");
    }

    await appendFile(this.path, formatCsvLine(fields, row), "utf8");
    this.written++;
  }

  async close(): Promise<void> {
    // appendFile leaves no handle open
  }

  get rowsWritten(): number {
    return this.written;
  }
}
