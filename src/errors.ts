export type ErrorKind =
	| "lex"
	| "parse"
	| "syntax"
	| "name"
	| "type"
	| "arity"
	| "resource";

export interface LispError {
	readonly kind: ErrorKind;
	readonly message: string;
}

export type Result<T> =
	| { ok: true; value: T }
	| { ok: false; error: LispError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string): Result<T> {
	return { ok: false, error: { kind, message } };
}

// Line printed by the read-loop for a failed expression.
export function formatError(error: LispError): string {
	return `Error: ${error.message}`;
}
