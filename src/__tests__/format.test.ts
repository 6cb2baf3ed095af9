import { describe, it, expect } from 'vitest';
import { formatC, formatDiagnostics } from '../format.js';
import { computeIdentities } from '../identity.js';
import { buildRecord, toDocument } from '../record.js';

describe('formatDiagnostics', () => {
  it('shows a null c as null', () => {
    expect(formatC(null)).toBe('null');
    expect(formatC(20)).toBe('20');
  });

  it('renders the decoded values and identity checks', () => {
    const doc = toDocument(buildRecord());
    const lines = formatDiagnostics(doc, { alpha: 2, beta: 5 }, computeIdentities(2, -7, 2, 5));
    expect(lines).toEqual([
      'Decoded polynomial and roots:',
      '  Form: ax^2 + bx + c = 0',
      '  a = 2, b = -7, c = null',
      '  alpha (root 1) = 2',
      '  beta  (root 2) = 5',
      '',
      'Computed values:',
      '  alpha + beta = 7 (should equal -b/a = 3.5) [mismatch]',
      '  alpha * beta = 10 (this equals c/a)',
      '  Computed constant c = 20',
    ]);
  });

  it('omits the mismatch marker when the sum agrees', () => {
    const lines = formatDiagnostics(toDocument(buildRecord({ a: 1 })), { alpha: 2, beta: 5 }, computeIdentities(1, -7, 2, 5));
    expect(lines).toContain('  alpha + beta = 7 (should equal -b/a = 7)');
  });
});
