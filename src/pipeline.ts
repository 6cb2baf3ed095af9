import { resolveConfig } from './config.js';
import { formatDiagnostics } from './format.js';
import { computeIdentities, recoverRoots } from './identity.js';
import { createConsoleLogger } from './logger.js';
import { buildRecord, toDocument } from './record.js';
import { readDocument, writeDocument } from './storage/document.js';
import type { PolynomialDocument, RoundtripOptions, RoundtripReport, Stage } from './types.js';

/** Deep copy of `doc` with `polynomial.c` set; every other key is kept as loaded. */
export function applyComputedC(doc: PolynomialDocument, c: number): PolynomialDocument {
  const updated = structuredClone(doc);
  updated.polynomial.c = c;
  return updated;
}

/**
 * Run the round trip once: build, write, read back, decode the roots,
 * derive `c` and rewrite the document in place.
 *
 * Any failure rejects with a {@link RoundtripError}; nothing is retried.
 */
export async function runRoundtrip(options: RoundtripOptions = {}): Promise<RoundtripReport> {
  const config = resolveConfig({ file: options.file, cwd: options.cwd, debug: options.debug });
  const logger = options.logger ?? createConsoleLogger({ debug: config.debug });
  const stages: Stage[] = [];
  const enter = (stage: Stage) => {
    stages.push(stage);
    logger.debug(`stage ${stage}`, { path: config.path });
  };

  enter('start');
  const record = buildRecord(options.input);
  const initial = toDocument(record);
  enter('built');

  await writeDocument(config.path, initial);
  logger.info(`JSON written to ${config.path}`);
  enter('written');

  const loaded = await readDocument(config.path);
  enter('read');

  const roots = recoverRoots(loaded);
  enter('decoded');

  const { a, b } = loaded.polynomial;
  const identities = computeIdentities(a, b, roots.alpha, roots.beta);
  for (const line of formatDiagnostics(loaded, roots, identities)) logger.info(line);
  enter('computed');

  const updated = applyComputedC(loaded, identities.c);
  await writeDocument(config.path, updated);
  logger.info('');
  logger.info(`Updated JSON with computed c written to ${config.path}`);
  enter('rewritten');

  enter('end');
  return { path: config.path, initial, loaded, roots, identities, updated, stages };
}
