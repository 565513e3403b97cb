/**
 * Vendor Name Similarity
 *
 * Token-set Jaccard similarity between the vendor name on an invoice and the
 * vendor name on its purchase order. Word order does not matter, and
 * case and surrounding whitespace are ignored.
 */

import natural from 'natural';

// Splits on whitespace runs; empty tokens are discarded
const tokenizer = new natural.RegexpTokenizer({ pattern: /\s+/ });

/**
 * @returns Similarity from 0 to 1
 *
 * @example
 * calculateVendorSimilarity('Acme Supplies Ltd', 'acme supplies ltd') // 1
 * calculateVendorSimilarity('Acme Supplies Ltd', 'Acme Supplies')     // 0.666...
 * calculateVendorSimilarity('Acme Co', 'Globex Inc')                  // 0
 * calculateVendorSimilarity(null, 'Acme')                              // 0
 */
export function calculateVendorSimilarity(
  a: string | null | undefined,
  b: string | null | undefined
): number {
  if (a === null || a === undefined || b === null || b === undefined) {
    return 0;
  }

  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();

  if (left === right) {
    return 1;
  }

  const tokensA = new Set(tokenizer.tokenize(left));
  const tokensB = new Set(tokenizer.tokenize(right));
  const union = new Set([...tokensA, ...tokensB]);

  if (union.size === 0) {
    return 0;
  }

  let common = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) common++;
  }

  return common / union.size;
}

export default calculateVendorSimilarity;
