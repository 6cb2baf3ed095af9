export { runRoundtrip, applyComputedC } from './pipeline.js';
export { buildRecord, toDocument, DEFAULT_INPUT, POLYNOMIAL_FORM } from './record.js';
export { encodeText, decodeText, encodeBytes, decodeBytes, isBase64 } from './codec.js';
export { serializeDocument, parseDocument, writeDocument, readDocument } from './storage/document.js';
export { recoverRoots, computeIdentities, parseRootText } from './identity.js';
export { formatDiagnostics, formatC } from './format.js';
export { resolveConfig, DEFAULT_FILE } from './config.js';
export { createConsoleLogger } from './logger.js';
export { reportFailure } from './failure.js';
export { polynomialDocumentSchema } from './schema.js';
export { RoundtripError, exitCodeFor, toRoundtripError } from './shared/errors.js';
export type { ErrorCode } from './shared/errors.js';
export type * from './types.js';
