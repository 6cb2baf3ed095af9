/**
 * Public types for the polynomial round trip.
 */

import type { PolynomialDocument } from './schema.js';

export type { PolynomialDocument } from './schema.js';

/** Literal inputs the record builder starts from. */
export interface RecordInput {
  a: number;
  b: number;
  /** First root, as decimal text. */
  alpha: string;
  /** Second root, as decimal text. */
  beta: string;
}

/**
 * In-memory record of `a·x² + b·x + c = 0`. Roots stay as text until they are
 * decoded from the persisted document.
 */
export interface PolynomialRecord {
  a: number;
  b: number;
  c: number | null;
  form: string;
  alpha: string;
  beta: string;
}

export interface RootValues {
  alpha: number;
  beta: number;
}

/**
 * Vieta's identities evaluated for the decoded roots. Nothing here is
 * asserted: `sumMatches` only reports whether `alpha + beta` equals `-b/a`.
 */
export interface Identities {
  sum: number;
  expectedSum: number;
  sumMatches: boolean;
  product: number;
  c: number;
}

export type Stage = 'start' | 'built' | 'written' | 'read' | 'decoded' | 'computed' | 'rewritten' | 'end';

export interface Logger {
  info(message: string): void;
  debug(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface RoundtripOptions {
  /** Document path; relative paths resolve against `cwd`. Defaults to `polynomial.json`. */
  file?: string;
  cwd?: string;
  debug?: boolean;
  /** Overrides for the builder's literal inputs. */
  input?: Partial<RecordInput>;
  logger?: Logger;
}

export interface RoundtripConfig {
  path: string;
  debug: boolean;
}

export interface RoundtripReport {
  path: string;
  /** Document as first written, with `c` still null. */
  initial: PolynomialDocument;
  /** Document as read back from disk. */
  loaded: PolynomialDocument;
  roots: RootValues;
  identities: Identities;
  /** Document as finally written, with `c` populated. */
  updated: PolynomialDocument;
  stages: Stage[];
}
