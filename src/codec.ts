import { RoundtripError } from './shared/errors.js';

// RFC 4648 §4 alphabet, padded, no line breaks. The sextet before the padding
// must leave its unused low bits zero (§3.5), so every input has one decoding.
const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/][AQgw]==|[A-Za-z0-9+/]{2}[AEIMQUYcgkosw048]=)?$/;

export function isBase64(encoded: string): boolean {
  return BASE64_RE.test(encoded);
}

export function encodeBytes(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode standard padded base64. Buffer's own decoder skips characters it
 * does not recognise, so the input is checked against the alphabet first.
 */
export function decodeBytes(encoded: string): Uint8Array {
  if (encoded.length % 4 !== 0) {
    throw new RoundtripError('FORMAT_ERROR', `Invalid base64 length ${encoded.length}: must be a multiple of 4`, { encoded });
  }
  if (!isBase64(encoded)) {
    throw new RoundtripError('FORMAT_ERROR', 'Invalid base64: unexpected character, misplaced padding or non-zero trailing bits', { encoded });
  }
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

export function encodeText(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

export function decodeText(encoded: string): string {
  return Buffer.from(decodeBytes(encoded)).toString('utf8');
}
