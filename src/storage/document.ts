import { promises as fs } from 'node:fs';
import { describeIssues, polynomialDocumentSchema, type PolynomialDocument } from '../schema.js';
import { RoundtripError, errnoCode } from '../shared/errors.js';

/** Two-space indented JSON with a trailing newline. */
export function serializeDocument(doc: PolynomialDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function parseDocument(text: string, path?: string): PolynomialDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new RoundtripError('PARSE_ERROR', `Malformed JSON${path ? ` in ${path}` : ''}: ${e instanceof Error ? e.message : String(e)}`, { path });
  }
  const result = polynomialDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new RoundtripError('PARSE_ERROR', `Document does not match the polynomial schema${path ? `: ${path}` : ''}`, {
      path,
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

/** Replace the file at `path` with the serialized document. */
export async function writeDocument(path: string, doc: PolynomialDocument): Promise<void> {
  try {
    await fs.writeFile(path, serializeDocument(doc), 'utf8');
  } catch (e) {
    throw new RoundtripError('IO_ERROR', `Cannot write ${path}: ${e instanceof Error ? e.message : String(e)}`, { path, errno: errnoCode(e) });
  }
}

export async function readDocument(path: string): Promise<PolynomialDocument> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (e) {
    throw new RoundtripError('IO_ERROR', `Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`, { path, errno: errnoCode(e) });
  }
  return parseDocument(text, path);
}
