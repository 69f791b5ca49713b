/**
 * Test helpers — strict accessors that throw instead of returning
 * `undefined`, and an in-memory `DocumentStore` so context tests never
 * touch the file system.
 */
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parse, ParseError } from '../src/parser.ts';
import { serialize } from '../src/serialize.ts';
import { rootElement as _rootElement, child, textContent } from '../src/query.ts';
import { MalformedDocumentError, NotFoundError } from '../src/errors.ts';
import type { DocumentStore } from '../src/store.ts';
import type { Document, Element } from '../src/types.ts';

/** Returns the root element, throwing if absent. */
export function rootElement(doc: Document): Element {
	const el = _rootElement(doc);
	if (el === undefined) throw new Error('Document has no root element');
	return el;
}

/** Returns the item at `index`, throwing if the list is too short. */
export function nth<T>(items: readonly T[], index: number): T {
	const item = items[index];
	if (item === undefined) throw new Error(`Expected at least ${index + 1} items, got ${items.length}`);
	return item;
}

/** Text of the `SHORT-NAME` child, the identifier every ARXML element carries. */
export function shortName(el: Element): string {
	const name = child(el, 'SHORT-NAME');
	if (name === undefined) throw new Error(`<${el.tag}> has no SHORT-NAME`);
	return textContent(name);
}

/**
 * Files held as strings. Writes use the same ISO-8859-1 serialization as
 * the file store; `writes` records every target in order.
 */
export class MemoryStore implements DocumentStore {
	readonly files = new Map<string, string>();
	readonly writes: string[] = [];

	constructor(files: Record<string, string> = {}) {
		for (const [path, xml] of Object.entries(files)) this.files.set(path, xml);
	}

	read(path: string): Document {
		const xml = this.files.get(path);
		if (xml === undefined) throw new NotFoundError(path);
		let document: Document;
		try {
			document = parse(xml);
		} catch (err) {
			if (err instanceof ParseError) throw new MalformedDocumentError(path, err.message, { cause: err });
			throw err;
		}
		document.path = path;
		return document;
	}

	write(document: Document, path: string): void {
		this.files.set(path, serialize(document, { encoding: 'ISO-8859-1' }));
		this.writes.push(path);
		document.path = path;
	}
}

/** A fresh temporary directory and a function that removes it. */
export function tempDir(): { dir: string; cleanup: () => void } {
	const dir = mkdtempSync(join(tmpdir(), 'arxml-access-'));
	return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
