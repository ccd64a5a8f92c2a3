// src/services/dedup-utils.ts: content addressing and near-duplicate helpers
import crypto from 'crypto';
import { jaccardTokens, tokenize } from './providers/retrieval-vector-utils';

/**
 * Canonical form used for content identity: NFKC, typographic quotes and dashes folded,
 * lower case, whitespace collapsed, no space before closing punctuation or after opening brackets.
 */
export function canonicalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(/[‘’‛]/g, "'")
    .replace(/[“”‟]/g, '"')
    .replace(/[‒-―]/g, '-')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?)\]}])/g, '$1')
    .replace(/([([{])\s+/g, '$1')
    .trim();
}

export function computeContentId(text: string, documentId: string): string {
  return crypto
    .createHash('sha256')
    .update(`${canonicalizeText(text)}\u0000${documentId}`)
    .digest('hex');
}

/** Token-set Jaccard on canonicalized text. */
export function textSimilarity(a: string, b: string): number {
  return jaccardTokens(tokenize(canonicalizeText(a)), tokenize(canonicalizeText(b)));
}
