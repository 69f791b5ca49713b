/**
 * arxml-access — Error taxonomy
 *
 * Every failure the document-access layer reports is a `DocumentError`
 * subclass carrying a `kind` discriminant, so callers can either
 * `instanceof` the class or switch on `error.kind`. Underlying causes
 * (parse errors, I/O errors) travel in the standard `cause` property.
 *
 * An attribute that is absent during an edit or delete is not an error;
 * the editor reports it through its return value.
 */

export type DocumentErrorKind = 'NotFound' | 'MalformedDocument' | 'WriteFailure' | 'InvalidQuery' | 'NoDocumentLoaded' | 'NoOutputPath';

export abstract class DocumentError extends Error {
	abstract readonly kind: DocumentErrorKind;
}

/** The load path does not exist. */
export class NotFoundError extends DocumentError {
	readonly kind = 'NotFound';
	readonly path: string;

	constructor(path: string, options?: ErrorOptions) {
		super(`File ${path} not found`, options);
		this.name = 'NotFoundError';
		this.path = path;
	}
}

/** The file could not be decoded or is not well-formed XML. */
export class MalformedDocumentError extends DocumentError {
	readonly kind = 'MalformedDocument';
	readonly path: string;

	constructor(path: string, reason: string, options?: ErrorOptions) {
		super(`Invalid XML file ${path}: ${reason}`, options);
		this.name = 'MalformedDocumentError';
		this.path = path;
	}
}

/** Serializing, creating directories or writing bytes failed. */
export class WriteFailureError extends DocumentError {
	readonly kind = 'WriteFailure';
	readonly path: string;

	constructor(path: string, cause: unknown) {
		super(`Failed to write file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = 'WriteFailureError';
		this.path = path;
	}
}

/** A path expression outside the supported subset. */
export class InvalidQueryError extends DocumentError {
	readonly kind = 'InvalidQuery';
	readonly expression: string;

	constructor(expression: string, reason: string) {
		super(`Invalid path expression ${JSON.stringify(expression)}: ${reason}`);
		this.name = 'InvalidQueryError';
		this.expression = expression;
	}
}

export class NoDocumentLoadedError extends DocumentError {
	readonly kind = 'NoDocumentLoaded';

	constructor() {
		super('No ARXML file loaded');
		this.name = 'NoDocumentLoadedError';
	}
}

export class NoOutputPathError extends DocumentError {
	readonly kind = 'NoOutputPath';

	constructor() {
		super('No output path specified');
		this.name = 'NoOutputPathError';
	}
}

/** Narrows `value` to a `DocumentError`, optionally of one kind. */
export function isDocumentError(value: unknown, kind?: DocumentErrorKind): value is DocumentError {
	return value instanceof DocumentError && (kind === undefined || value.kind === kind);
}
