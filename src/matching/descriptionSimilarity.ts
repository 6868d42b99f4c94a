/**
 * Description Similarity for Reconciliation
 *
 * Ledger memos and bank narratives rarely agree verbatim, but they tend to
 * share words (payee, invoice number, cheque number). Similarity is the
 * token overlap ratio (Jaccard index) of the two lowercased word sets:
 *
 *   |A ∩ B| / |A ∪ B|
 */

import natural from 'natural';

// Splits on anything that is not a Unicode letter, digit or underscore
const tokenizer = new natural.RegexpTokenizer({ pattern: /[^\p{L}\p{N}_]+/u });

/**
 * Lowercased, de-duplicated word tokens of a description.
 *
 * @example
 * tokenize('ACH Payment - Acme Corp.') // Set { 'ach', 'payment', 'acme', 'corp' }
 * tokenize('Müller GmbH')               // Set { 'müller', 'gmbh' }
 */
export function tokenize(description: string): Set<string> {
  if (!description) {
    return new Set();
  }

  return new Set(tokenizer.tokenize(description.toLowerCase()));
}

/**
 * Token overlap ratio from 0 to 1, case-insensitive.
 *
 * @example
 * calculateDescriptionSimilarity('Acme Corp invoice 42', 'ACME CORP') // 0.5
 * calculateDescriptionSimilarity('Rent', 'Payroll') // 0
 */
export function calculateDescriptionSimilarity(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);

  if (tokensA.size === 0 || tokensB.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) {
      intersection++;
    }
  }

  const union = tokensA.size + tokensB.size - intersection;
  return intersection / union;
}

export default calculateDescriptionSimilarity;
