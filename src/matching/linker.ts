/**
 * Invoice → PO Linker
 *
 * Each invoice id maps to a single candidate PO number. The invoice is linked
 * to the purchase order with that number only when vendor and currency agree
 * exactly; otherwise it is carried forward with `po: null`.
 */

import { logger } from '../utils';
import { INVOICE_PREFIX, PO_PREFIX } from './constants';
import type { AggregatedInvoice, LinkedPair, PurchaseOrderRecord } from './types';

/**
 * Maps an invoice id onto the PO number it is expected to reference.
 *
 * @example
 * toCandidatePo('INV0012') // 'PO0012'
 * toCandidatePo('XYZ99')   // 'XYZ99'
 */
export function toCandidatePo(invoiceId: string): string {
  if (invoiceId.startsWith(INVOICE_PREFIX)) {
    return PO_PREFIX + invoiceId.slice(INVOICE_PREFIX.length);
  }
  return invoiceId;
}

function linkKey(poNumber: string, vendorId: string, currency: string): string {
  return JSON.stringify([poNumber, vendorId, currency]);
}

/**
 * Indexes the PO catalog by (poNumber, vendorId, currency).
 * When a key repeats, the first record wins.
 */
export function indexPurchaseOrders(
  purchaseOrders: readonly PurchaseOrderRecord[]
): Map<string, PurchaseOrderRecord> {
  const index = new Map<string, PurchaseOrderRecord>();
  for (const po of purchaseOrders) {
    const key = linkKey(po.poNumber, po.vendorId, po.currency);
    if (!index.has(key)) {
      index.set(key, po);
    }
  }
  return index;
}

/**
 * Links every aggregated invoice to its purchase order, preserving input order.
 */
export function buildLinks(
  invoices: readonly AggregatedInvoice[],
  purchaseOrders: readonly PurchaseOrderRecord[]
): LinkedPair[] {
  const index = indexPurchaseOrders(purchaseOrders);

  const pairs = invoices.map((invoice): LinkedPair => {
    const candidatePo = toCandidatePo(invoice.invoiceId);
    const po = index.get(linkKey(candidatePo, invoice.vendorId, invoice.currency)) ?? null;
    return { invoice, candidatePo, po };
  });

  const linked = pairs.filter((pair) => pair.po !== null).length;
  const total = pairs.length;
  const pct = (count: number): string => (total === 0 ? '0.0' : ((count / total) * 100).toFixed(1));

  logger.info(`Linked ${linked}/${total} invoices to a PO (${pct(linked)}%), ${total - linked} without a PO (${pct(total - linked)}%)`);

  return pairs;
}

export default buildLinks;
