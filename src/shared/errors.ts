export type ErrorCode = 'IO_ERROR' | 'PARSE_ERROR' | 'FORMAT_ERROR' | 'NUMBER_ERROR' | 'BAD_INPUT' | 'INTERNAL';

const ERROR_CODES: readonly ErrorCode[] = ['IO_ERROR', 'PARSE_ERROR', 'FORMAT_ERROR', 'NUMBER_ERROR', 'BAD_INPUT', 'INTERNAL'];

export class RoundtripError extends Error {
	code: ErrorCode;
	exitCode: number;
	details?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, exitCode?: number) {
		super(message);
		this.name = 'RoundtripError';
		this.code = code;
		this.details = details;
		this.exitCode = exitCode ?? exitCodeFor(code);
	}
}

/** sysexits(3) status for each error code. */
export function exitCodeFor(code: ErrorCode): number {
	if (code === 'IO_ERROR') return 74;
	if (code === 'PARSE_ERROR' || code === 'FORMAT_ERROR' || code === 'NUMBER_ERROR') return 65;
	if (code === 'BAD_INPUT') return 64;
	return 70;
}

export function toRoundtripError(e: unknown): RoundtripError {
	if (e instanceof RoundtripError) return e;
	if (e instanceof Error) {
		const code = normalizeCode(Reflect.get(e, 'code'));
		return new RoundtripError(code, e.message || 'Internal error', { cause: e.name });
	}
	return new RoundtripError('INTERNAL', typeof e === 'string' ? e : 'Internal error');
}

function normalizeCode(code: unknown): ErrorCode {
	return ERROR_CODES.find((c) => c === code) ?? 'INTERNAL';
}

/** Node's errno code (ENOENT, EACCES, ...) when the value carries one. */
export function errnoCode(e: unknown): string | undefined {
	if (!(e instanceof Error)) return undefined;
	const code = Reflect.get(e, 'code');
	return typeof code === 'string' ? code : undefined;
}
