/**
 * Record Normalization
 *
 * Turns loosely-typed source values into the engine's records and collapses
 * invoice lines into one row per invoice.
 */

import { logger } from '../utils';
import { parseFlexibleDate } from './dateParsing';
import type { AggregatedInvoice, RawInvoiceLine } from './types';

// ============================================
// Value Parsing
// ============================================

/**
 * Parses a numeric source value.
 * Handles: "1234.56", "$1,234.56", "€ 99", "-500.00", "(250.00)"
 *
 * @returns The number, or null when the value is empty or malformed
 */
export function parseAmount(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value.trim() === '') {
    return null;
  }

  let cleaned = value.replace(/[$€£¥,\s]/g, '').trim();

  // Accounting negatives
  const parenthesised = cleaned.match(/^\((.*)\)$/);
  if (parenthesised) {
    cleaned = `-${parenthesised[1]}`;
  }

  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(cleaned)) {
    return null;
  }

  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

/**
 * Trims a text value; blank becomes null.
 */
export function parseText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

// ============================================
// Aggregation
// ============================================

interface InvoiceGroup {
  invoiceId: string;
  vendorId: string;
  vendorName: string | null;
  currency: string;
  total: number;
  lineCount: number;
  maxQty: number | null;
  unitPriceSum: number;
  unitPriceCount: number;
  invoiceDate: Date | null;
}

function groupKey(line: RawInvoiceLine): string {
  return JSON.stringify([line.invoiceId, line.vendorId, line.vendorName, line.currency]);
}

/**
 * Collapses invoice lines into one aggregated invoice per
 * (invoiceId, vendorId, vendorName, currency).
 *
 * - invoiceTotal: sum of parseable line totals
 * - maxQty: largest parseable quantity, null when none
 * - avgUnitPrice: mean of parseable unit prices, null when none
 * - invoiceDate: first line date that parses
 *
 * Groups come out in the order their first line was seen. An invoiceId that
 * lands in more than one group is logged but kept.
 *
 * @example
 * aggregateInvoiceLines([
 *   { invoiceId: 'INV001', lineTotal: 60, ... },
 *   { invoiceId: 'INV001', lineTotal: 40, ... },
 * ]) // [{ invoiceId: 'INV001', invoiceTotal: 100, lineCount: 2, ... }]
 */
export function aggregateInvoiceLines(lines: readonly RawInvoiceLine[]): AggregatedInvoice[] {
  const groups = new Map<string, InvoiceGroup>();

  for (const line of lines) {
    const key = groupKey(line);
    let group = groups.get(key);

    if (!group) {
      group = {
        invoiceId: line.invoiceId,
        vendorId: line.vendorId,
        vendorName: line.vendorName,
        currency: line.currency,
        total: 0,
        lineCount: 0,
        maxQty: null,
        unitPriceSum: 0,
        unitPriceCount: 0,
        invoiceDate: null,
      };
      groups.set(key, group);
    }

    group.lineCount++;

    if (line.lineTotal !== null) {
      group.total += line.lineTotal;
    }

    if (line.quantity !== null) {
      group.maxQty = group.maxQty === null ? line.quantity : Math.max(group.maxQty, line.quantity);
    }

    if (line.unitPrice !== null) {
      group.unitPriceSum += line.unitPrice;
      group.unitPriceCount++;
    }

    if (group.invoiceDate === null) {
      group.invoiceDate = parseFlexibleDate(line.invoiceDate);
    }
  }

  const seen = new Map<string, number>();
  const aggregated: AggregatedInvoice[] = [];

  for (const group of groups.values()) {
    seen.set(group.invoiceId, (seen.get(group.invoiceId) ?? 0) + 1);

    aggregated.push({
      invoiceId: group.invoiceId,
      vendorId: group.vendorId,
      vendorName: group.vendorName,
      currency: group.currency,
      invoiceTotal: group.total,
      lineCount: group.lineCount,
      maxQty: group.maxQty,
      avgUnitPrice: group.unitPriceCount > 0 ? group.unitPriceSum / group.unitPriceCount : null,
      invoiceDate: group.invoiceDate,
    });
  }

  const duplicated = [...seen.entries()].filter(([, count]) => count > 1).map(([id]) => id);
  if (duplicated.length > 0) {
    logger.warn(`Invoice ids spread across several vendor/currency keys: ${duplicated.join(', ')}`);
  }

  return aggregated;
}

export default aggregateInvoiceLines;
