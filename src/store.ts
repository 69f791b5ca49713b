/**
 * arxml-access — Document store
 *
 * Reads files into trees and writes trees back to files.
 *
 * Reading decodes by the usual XML rules: a UTF-8 BOM wins, otherwise the
 * declaration's `encoding` names the charset, otherwise UTF-8. Writing uses
 * one fixed output encoding, ISO-8859-1 unless configured otherwise, which
 * is what AUTOSAR tooling exchanges.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { Document } from './types.ts';
import { parse, ParseError } from './parser.ts';
import { serialize } from './serialize.ts';
import type { OutputEncoding } from './serialize.ts';
import { MalformedDocumentError, NotFoundError, WriteFailureError } from './errors.ts';

export interface DocumentStore {
	/**
	 * @throws {NotFoundError} when `path` does not exist.
	 * @throws {MalformedDocumentError} when the content cannot be decoded or parsed.
	 */
	read(path: string): Document;
	/**
	 * Creates missing parent directories, then writes the document.
	 * @throws {WriteFailureError} wrapping the underlying cause.
	 */
	write(document: Document, path: string): void;
}

export interface FileStoreOptions {
	/** Encoding of written files. Defaults to `'ISO-8859-1'`. */
	encoding?: OutputEncoding;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const LATIN1_LABELS = new Set(['iso-8859-1', 'iso8859-1', 'iso_8859-1', 'latin1', 'latin-1', 'l1', 'cp819', 'ibm819']);
const UTF8_LABELS = new Set(['utf-8', 'utf8', 'us-ascii', 'ascii']);

const DECLARED_ENCODING = /^<\?xml\s[^>]*?encoding\s*=\s*(["'])([A-Za-z0-9._-]+)\1/;

const BUFFER_ENCODING: Readonly<Record<OutputEncoding, BufferEncoding>> = {
	'ISO-8859-1': 'latin1',
	'UTF-8': 'utf8',
};

function hasPrefix(bytes: Buffer, ...prefix: number[]): boolean {
	return bytes.length >= prefix.length && prefix.every((b, i) => bytes[i] === b);
}

/**
 * Decodes file bytes to text. Returns the failure reason as a string so the
 * caller can attach the path.
 */
function decode(bytes: Buffer): { text: string } | { reason: string } {
	if (hasPrefix(bytes, 0xef, 0xbb, 0xbf)) return decodeUtf8(bytes.subarray(3));
	if (hasPrefix(bytes, 0xfe, 0xff) || hasPrefix(bytes, 0xff, 0xfe)) return { reason: 'UTF-16 documents are not supported' };

	// The declaration is ASCII, so a Latin-1 view of the head is enough to read it
	const declared = DECLARED_ENCODING.exec(bytes.subarray(0, 512).toString('latin1'))?.[2];
	const label = (declared ?? 'UTF-8').toLowerCase();
	if (LATIN1_LABELS.has(label)) return { text: bytes.toString('latin1') };
	if (UTF8_LABELS.has(label)) return decodeUtf8(bytes);
	return { reason: `unsupported encoding ${JSON.stringify(declared)}` };
}

function decodeUtf8(bytes: Uint8Array): { text: string } | { reason: string } {
	try {
		return { text: new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes) };
	} catch {
		return { reason: 'content is not valid UTF-8' };
	}
}

function errorCode(err: unknown): string | undefined {
	return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

// ---------------------------------------------------------------------------
// File store
// ---------------------------------------------------------------------------

/** Synchronous `node:fs` implementation. */
export class FileDocumentStore implements DocumentStore {
	readonly encoding: OutputEncoding;

	constructor(options: FileStoreOptions = {}) {
		this.encoding = options.encoding ?? 'ISO-8859-1';
	}

	read(path: string): Document {
		let bytes: Buffer;
		try {
			bytes = readFileSync(path);
		} catch (err) {
			const code = errorCode(err);
			if (code === 'ENOENT' || code === 'ENOTDIR') throw new NotFoundError(path, { cause: err });
			throw err;
		}

		const decoded = decode(bytes);
		if ('reason' in decoded) throw new MalformedDocumentError(path, decoded.reason);

		let document: Document;
		try {
			document = parse(decoded.text);
		} catch (err) {
			if (err instanceof ParseError) throw new MalformedDocumentError(path, err.message, { cause: err });
			throw err;
		}
		document.path = path;
		return document;
	}

	write(document: Document, path: string): void {
		try {
			const text = serialize(document, { encoding: this.encoding });
			const dir = dirname(path);
			if (dir !== '.') mkdirSync(dir, { recursive: true });
			writeFileSync(path, Buffer.from(text, BUFFER_ENCODING[this.encoding]));
		} catch (err) {
			throw new WriteFailureError(path, err);
		}
		document.path = path;
	}
}
