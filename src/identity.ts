import { decodeText } from './codec.js';
import { RoundtripError } from './shared/errors.js';
import type { Identities, PolynomialDocument, RootValues } from './types.js';

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse decimal text into a float. Surrounding whitespace is allowed; anything
 * else that is not a plain decimal or exponent literal is rejected.
 */
export function parseRootText(text: string, name = 'root'): number {
  const trimmed = text.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new RoundtripError('NUMBER_ERROR', `Decoded ${name} is not a number: ${JSON.stringify(text)}`, { name, text });
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new RoundtripError('NUMBER_ERROR', `Decoded ${name} is out of range: ${trimmed}`, { name, text });
  }
  return value;
}

export function recoverRoots(doc: PolynomialDocument): RootValues {
  return {
    alpha: parseRootText(decodeText(doc.roots_base64.alpha), 'alpha'),
    beta: parseRootText(decodeText(doc.roots_base64.beta), 'beta'),
  };
}

/**
 * Evaluate Vieta's relations for `a·x² + b·x + c = 0`:
 * alpha + beta = -b/a and alpha·beta = c/a, hence c = a·(alpha·beta).
 */
export function computeIdentities(a: number, b: number, alpha: number, beta: number): Identities {
  const sum = alpha + beta;
  const expectedSum = -b / a;
  const product = alpha * beta;
  const c = a * product;
  if (!Number.isFinite(c)) {
    throw new RoundtripError('NUMBER_ERROR', `Computed c is out of range: ${c}`, { a, alpha, beta });
  }
  return {
    sum,
    expectedSum,
    sumMatches: sum === expectedSum,
    product,
    c,
  };
}
