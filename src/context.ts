/**
 * arxml-access — Document context
 *
 * Holds at most one document and orchestrates finds, batch edits and saves
 * through the store, query engine and editor it was built with.
 *
 * Lifecycle
 * ─────────
 *   empty ──load/attach──▶ loaded ──load/attach/find/edit/save──▶ loaded
 *
 * • Every operation but `load` and `attach` requires a document and throws
 *   `NoDocumentLoadedError` otherwise.
 * • The default save target is the last explicit save path, falling back
 *   to the path the document was loaded from. `load` forgets the previous
 *   save path.
 * • Batches are not atomic: nodes edited before a failure stay edited.
 */

import type { Document, Element } from './types.ts';
import type { DocumentStore } from './store.ts';
import type { QueryEngine } from './query.ts';
import type { AttributeEditor } from './editor.ts';
import type { BatchOperation, DocumentEventListener, DocumentEvent } from './events.ts';
import type { ElementInfo } from './query.ts';
import { elementInfo, elements, listTags } from './query.ts';
import { NoDocumentLoadedError, NoOutputPathError } from './errors.ts';

/** The three capabilities a context delegates to. */
export interface Capabilities {
	store: DocumentStore;
	query: QueryEngine;
	editor: AttributeEditor;
}

export interface ContextOptions {
	/** Receives a structured event after each load, save and batch. */
	onEvent?: DocumentEventListener;
}

export type ContextState = 'empty' | 'loaded';

export class DocumentContext {
	private readonly store: DocumentStore;
	private readonly query: QueryEngine;
	private readonly editor: AttributeEditor;
	private readonly onEvent: DocumentEventListener | undefined;

	private current: Document | null = null;
	private loadedFrom: string | null = null;
	private savedTo: string | null = null;

	constructor(capabilities: Capabilities, options: ContextOptions = {}) {
		this.store = capabilities.store;
		this.query = capabilities.query;
		this.editor = capabilities.editor;
		this.onEvent = options.onEvent;
	}

	// -------------------------------------------------------------------------
	// State
	// -------------------------------------------------------------------------

	get state(): ContextState {
		return this.current === null ? 'empty' : 'loaded';
	}

	/** The held document, or `null` while empty. */
	get document(): Document | null {
		return this.current;
	}

	/** Path the held document was loaded from. */
	get sourcePath(): string | null {
		return this.loadedFrom;
	}

	/** Where `save()` without an argument writes, or `null` if nowhere. */
	get outputPath(): string | null {
		return this.savedTo ?? this.loadedFrom;
	}

	// -------------------------------------------------------------------------
	// Load / save
	// -------------------------------------------------------------------------

	/** Reads `path`, replacing any held document. */
	load(path: string): void {
		const document = this.store.read(path);
		this.hold(document, path);
	}

	/**
	 * Holds a document that did not come through the store, e.g. one built
	 * with `parse()`. Its own `path` becomes the default save target.
	 */
	attach(document: Document): void {
		this.hold(document, document.path);
	}

	/**
	 * Writes the document to `outputPath`, or to the default target when it
	 * is omitted or empty. An explicit path becomes the new default.
	 */
	save(outputPath?: string): void {
		const document = this.require();
		const explicit = outputPath === undefined || outputPath === '' ? null : outputPath;
		const target = explicit ?? this.outputPath;
		if (target === null) throw new NoOutputPathError();
		this.store.write(document, target);
		if (explicit !== null) this.savedTo = explicit;
		this.emit({ type: 'saved', path: target });
	}

	// -------------------------------------------------------------------------
	// Finds
	// -------------------------------------------------------------------------

	findByTag(tag: string): Element[] {
		return this.query.findByTag(this.require(), tag);
	}

	findByPath(expression: string): Element[] {
		return this.query.findByPath(this.require(), expression);
	}

	findByAttribute(name: string, value: string): Element[] {
		return this.query.findByAttribute(this.require(), name, value);
	}

	listTags(): string[] {
		return listTags(this.require());
	}

	elementInfo(node: Element): ElementInfo {
		this.require();
		return elementInfo(node);
	}

	// -------------------------------------------------------------------------
	// Batch edits
	// -------------------------------------------------------------------------

	/** Sets the attribute on every node. Returns `nodes.length`. */
	addToNodes(nodes: readonly Element[], name: string, value: string): number {
		return this.batch('add', nodes, name, (node) => {
			this.editor.add(node, name, value);
			return true;
		});
	}

	/** Overwrites the attribute where present. Returns how many nodes had it. */
	editInNodes(nodes: readonly Element[], name: string, value: string): number {
		return this.batch('edit', nodes, name, (node) => this.editor.edit(node, name, value));
	}

	/** Removes the attribute where present. Returns how many nodes had it. */
	deleteFromNodes(nodes: readonly Element[], name: string): number {
		return this.batch('delete', nodes, name, (node) => this.editor.delete(node, name));
	}

	addByTag(tag: string, name: string, value: string): number {
		return this.addToNodes(this.findByTag(tag), name, value);
	}

	editByTag(tag: string, name: string, value: string): number {
		return this.editInNodes(this.findByTag(tag), name, value);
	}

	deleteByTag(tag: string, name: string): number {
		return this.deleteFromNodes(this.findByTag(tag), name);
	}

	// -------------------------------------------------------------------------
	// Internals
	// -------------------------------------------------------------------------

	private hold(document: Document, path: string | null): void {
		this.current = document;
		this.loadedFrom = path;
		this.savedTo = null;
		this.emit({ type: 'loaded', path, elementCount: [...elements(document)].length });
	}

	private batch(operation: BatchOperation, nodes: readonly Element[], attribute: string, apply: (node: Element) => boolean): number {
		this.require();
		let affected = 0;
		for (const node of nodes) {
			if (apply(node)) affected++;
		}
		this.emit({ type: 'batch', operation, attribute, selected: nodes.length, affected });
		return affected;
	}

	private require(): Document {
		if (this.current === null) throw new NoDocumentLoadedError();
		return this.current;
	}

	private emit(event: DocumentEvent): void {
		this.onEvent?.(event);
	}
}
