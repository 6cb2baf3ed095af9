import { encodeText } from './codec.js';
import { RoundtripError } from './shared/errors.js';
import type { PolynomialDocument, PolynomialRecord, RecordInput } from './types.js';

export const POLYNOMIAL_FORM = 'ax^2 + bx + c = 0';

/**
 * The demonstration inputs. Note that roots 2 and 5 do not satisfy
 * `alpha + beta = -b/a` for a=2, b=-7; the run reports that as it is.
 */
export const DEFAULT_INPUT: Readonly<RecordInput> = Object.freeze({
  a: 2,
  b: -7,
  alpha: '2',
  beta: '5',
});

/**
 * Build a fresh record with `c` unset.
 *
 * @param input - Overrides for {@link DEFAULT_INPUT}.
 */
export function buildRecord(input: Partial<RecordInput> = {}): PolynomialRecord {
  const merged: RecordInput = { ...DEFAULT_INPUT, ...input };
  if (!Number.isInteger(merged.a) || !Number.isInteger(merged.b)) {
    throw new RoundtripError('BAD_INPUT', 'Coefficients a and b must be integers', { a: merged.a, b: merged.b });
  }
  if (merged.a === 0) {
    throw new RoundtripError('BAD_INPUT', 'Coefficient a must be non-zero for a quadratic', { a: merged.a });
  }
  return {
    a: merged.a,
    b: merged.b,
    c: null,
    form: POLYNOMIAL_FORM,
    alpha: merged.alpha,
    beta: merged.beta,
  };
}

export function toDocument(record: PolynomialRecord): PolynomialDocument {
  return {
    polynomial: { a: record.a, b: record.b, c: record.c, form: record.form },
    roots_base64: { alpha: encodeText(record.alpha), beta: encodeText(record.beta) },
  };
}
