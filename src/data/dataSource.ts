/**
 * Dataset sources
 *
 * A data source hands out the three reconciliation tables as raw string rows.
 * `loadRecordSets` turns those rows into typed records; values that cannot be
 * parsed become null instead of failing the batch.
 */

import { createReadStream } from 'fs';
import { access, stat } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { parseAmount, parseFlexibleDate, parseText } from '../matching';
import type {
  LabelledMismatchRecord,
  PurchaseOrderRecord,
  RawInvoiceLine,
  RecordSets,
} from '../matching';
import { logger } from '../utils';
import { ConfigurationError } from '../utils/errors';

// ============================================
// Types
// ============================================

export type TableName = 'invoices' | 'po_grn' | 'labelled_mismatches';

export type RawRow = Record<string, string>;

export interface DataSource {
  /** Stable identity, used as the resource-cache key */
  readonly id: string;
  readTable(table: TableName): Promise<RawRow[]>;
}

export const TABLE_COLUMNS: Readonly<Record<TableName, readonly string[]>> = {
  invoices: [
    'invoice_id',
    'vendor_id',
    'vendor_name',
    'currency',
    'line_item_number',
    'quantity',
    'unit_price',
    'line_total',
    'invoice_date',
  ],
  po_grn: ['po_number', 'vendor_id', 'vendor_name', 'currency', 'po_total', 'po_date', 'grn_number', 'grn_date'],
  labelled_mismatches: ['invoice_id', 'po_number', 'mismatch_type', 'difference'],
};

// ============================================
// CSV directory source
// ============================================

const rawRowSchema = z.record(z.string(), z.string().optional());

function padRow(row: Record<string, string | undefined>, header: readonly string[]): RawRow {
  const padded: RawRow = {};
  for (const column of header) {
    padded[column] = row[column] ?? '';
  }
  return padded;
}

/**
 * Reads `<table>.csv` files from one directory.
 */
export class CsvDirectoryDataSource implements DataSource {
  public readonly id: string;

  constructor(private readonly directory: string) {
    this.id = `csv:${path.resolve(directory)}`;
  }

  fileFor(table: TableName): string {
    return path.join(this.directory, `${table}.csv`);
  }

  async readTable(table: TableName): Promise<RawRow[]> {
    const filePath = this.fileFor(table);

    try {
      await access(filePath);
    } catch {
      throw new ConfigurationError(`Dataset file not found: ${filePath}`);
    }

    let header: string[] = [];
    const parser = createReadStream(filePath).pipe(
      parse({
        columns: (columns: string[]) => {
          header = columns.map((column) => column.toLowerCase().trim());
          return header;
        },
        // Short rows keep their leading fields; the missing trailing ones read as empty
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
      })
    );

    const rows: RawRow[] = [];
    try {
      for await (const record of parser) {
        const parsed = rawRowSchema.safeParse(record);
        if (parsed.success) {
          rows.push(padRow(parsed.data, header));
        }
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Dataset file unreadable: ${filePath} (${reason})`);
    }

    return rows;
  }
}

/**
 * @throws ConfigurationError when the directory does not exist
 */
export async function openCsvDirectory(directory: string): Promise<CsvDirectoryDataSource> {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new ConfigurationError(`Dataset path is not a directory: ${directory}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Dataset directory not found: ${directory}`);
  }
  return new CsvDirectoryDataSource(directory);
}

// ============================================
// Row → record mapping
// ============================================

const requiredText = z.string().trim().min(1);
const optionalText = z
  .string()
  .optional()
  .transform((value) => parseText(value));
const numeric = z
  .string()
  .optional()
  .transform((value) => parseAmount(value));
const date = z
  .string()
  .optional()
  .transform((value) => parseFlexibleDate(value));

const invoiceLineSchema = z
  .object({
    invoice_id: requiredText,
    vendor_id: requiredText,
    vendor_name: optionalText,
    currency: requiredText,
    line_item_number: optionalText,
    quantity: numeric,
    unit_price: numeric,
    line_total: numeric,
    invoice_date: optionalText,
  })
  .transform(
    (row): RawInvoiceLine => ({
      invoiceId: row.invoice_id,
      vendorId: row.vendor_id,
      vendorName: row.vendor_name,
      currency: row.currency,
      lineItemNumber: row.line_item_number,
      quantity: row.quantity,
      unitPrice: row.unit_price,
      lineTotal: row.line_total,
      invoiceDate: row.invoice_date,
    })
  );

const purchaseOrderSchema = z
  .object({
    po_number: requiredText,
    vendor_id: requiredText,
    vendor_name: optionalText,
    currency: requiredText,
    po_total: numeric,
    po_date: date,
    grn_number: optionalText,
    grn_date: date,
  })
  .transform(
    (row): PurchaseOrderRecord => ({
      poNumber: row.po_number,
      vendorId: row.vendor_id,
      vendorName: row.vendor_name,
      currency: row.currency,
      poTotal: row.po_total,
      poDate: row.po_date,
      grnNumber: row.grn_number,
      grnDate: row.grn_date,
    })
  );

const mismatchSchema = z
  .object({
    invoice_id: requiredText,
    po_number: optionalText,
    mismatch_type: optionalText,
    difference: numeric,
  })
  .transform(
    (row): LabelledMismatchRecord => ({
      invoiceId: row.invoice_id,
      poNumber: row.po_number,
      mismatchType: row.mismatch_type,
      difference: row.difference,
    })
  );

function mapRows<T>(table: TableName, rows: readonly RawRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const records: T[] = [];
  let skipped = 0;

  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} ${table} row(s) missing required identifiers`);
  }

  return records;
}

function assertColumns(table: TableName, rows: readonly RawRow[]): void {
  if (rows.length === 0) return;
  const missing = TABLE_COLUMNS[table].filter((column) => !(column in rows[0]));
  if (missing.length > 0) {
    throw new ConfigurationError(`Table '${table}' is missing columns: ${missing.join(', ')}`);
  }
}

/**
 * Reads and types all three tables.
 *
 * @throws ConfigurationError when a table is missing, unreadable or lacks columns
 */
export async function loadRecordSets(source: DataSource): Promise<RecordSets> {
  const [invoiceRows, poRows, mismatchRows] = await Promise.all([
    source.readTable('invoices'),
    source.readTable('po_grn'),
    source.readTable('labelled_mismatches'),
  ]);

  assertColumns('invoices', invoiceRows);
  assertColumns('po_grn', poRows);
  assertColumns('labelled_mismatches', mismatchRows);

  const records: RecordSets = {
    invoiceLines: mapRows('invoices', invoiceRows, invoiceLineSchema),
    purchaseOrders: mapRows('po_grn', poRows, purchaseOrderSchema),
    mismatches: mapRows('labelled_mismatches', mismatchRows, mismatchSchema),
  };

  logger.debug(
    `Loaded ${records.invoiceLines.length} invoice lines, ${records.purchaseOrders.length} PO/GRN records, ${records.mismatches.length} labelled mismatches from ${source.id}`
  );

  return records;
}
