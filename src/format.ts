import type { Identities, PolynomialDocument, RootValues } from './types.js';

export function formatC(c: number | null): string {
  return c === null ? 'null' : JSON.stringify(c);
}

export function formatDecoded(doc: PolynomialDocument, roots: RootValues): string[] {
  const { a, b, c, form } = doc.polynomial;
  return [
    'Decoded polynomial and roots:',
    `  Form: ${form}`,
    `  a = ${a}, b = ${b}, c = ${formatC(c)}`,
    `  alpha (root 1) = ${roots.alpha}`,
    `  beta  (root 2) = ${roots.beta}`,
  ];
}

export function formatIdentities(identities: Identities): string[] {
  return [
    'Computed values:',
    `  alpha + beta = ${identities.sum} (should equal -b/a = ${identities.expectedSum})${identities.sumMatches ? '' : ' [mismatch]'}`,
    `  alpha * beta = ${identities.product} (this equals c/a)`,
    `  Computed constant c = ${identities.c}`,
  ];
}

export function formatDiagnostics(doc: PolynomialDocument, roots: RootValues, identities: Identities): string[] {
  return [...formatDecoded(doc, roots), '', ...formatIdentities(identities)];
}
