/**
 * arxml-access — Node model
 *
 * The tree is a discriminated union rooted at `Node`. Unlike a read-only
 * parse result, elements are edited in place: attribute maps and child
 * arrays are mutable so that batch edits never copy the tree.
 *
 *   Node
 *   ├── Document
 *   ├── Element
 *   ├── Text
 *   ├── CData
 *   ├── Comment
 *   ├── ProcessingInstruction
 *   ├── DocumentType
 *   └── XmlDeclaration
 */

// ---------------------------------------------------------------------------
// Discriminant
// ---------------------------------------------------------------------------

/** All legal values of `node.type`. */
export type NodeType = 'document' | 'element' | 'text' | 'cdata' | 'comment' | 'processing-instruction' | 'doctype' | 'xml-declaration';

/** Common root of every XML node. */
export interface Node {
	readonly type: NodeType;
}

// ---------------------------------------------------------------------------
// Prolog nodes
// ---------------------------------------------------------------------------

/**
 * The XML declaration: `<?xml version="1.0" encoding="UTF-8"?>`.
 * Appears at most once, as the first child of a `Document`.
 */
export interface XmlDeclaration extends Node {
	readonly type: 'xml-declaration';
	readonly version: string;
	/** Declared character encoding as written, or `null` if absent. */
	readonly encoding: string | null;
	readonly standalone: boolean | null;
}

/** A `<!DOCTYPE …>` declaration. The internal subset is kept verbatim. */
export interface DocumentType extends Node {
	readonly type: 'doctype';
	readonly name: string;
	readonly publicId: string | null;
	readonly systemId: string | null;
	readonly internalSubset: string | null;
}

/** A processing instruction: `<?target data?>`. */
export interface ProcessingInstruction extends Node {
	readonly type: 'processing-instruction';
	readonly target: string;
	readonly data: string;
}

/** An XML comment: `<!-- … -->`. */
export interface Comment extends Node {
	readonly type: 'comment';
	readonly value: string;
}

// ---------------------------------------------------------------------------
// Content nodes
// ---------------------------------------------------------------------------

/** A CDATA section: `<![CDATA[ … ]]>`. */
export interface CData extends Node {
	readonly type: 'cdata';
	readonly value: string;
}

/** A run of character data with entity references expanded. */
export interface Text extends Node {
	readonly type: 'text';
	readonly value: string;
}

/**
 * An element: `<SHORT-NAME>…</SHORT-NAME>`.
 *
 * `tag` is the qualified name exactly as written in the source
 * (`AR-PACKAGE`, `ar:AR-PACKAGE`); `name`, `prefix` and `namespace` are its
 * parts after namespace resolution.
 *
 * `attributes` is keyed by the qualified attribute name as written
 * (`UUID`, `xsi:schemaLocation`, `xmlns`). A `Map` keeps insertion order and
 * guarantees unique names.
 */
export interface Element extends Node {
	readonly type: 'element';
	readonly tag: string;
	readonly name: string;
	readonly prefix: string | null;
	readonly namespace: string | null;
	readonly attributes: Map<string, string>;
	readonly children: ChildNode[];
}

// ---------------------------------------------------------------------------
// Union aliases used in the tree
// ---------------------------------------------------------------------------

/** All node types that may appear as children of an `Element`. */
export type ChildNode = Element | Text | CData | Comment | ProcessingInstruction;

/** All node types that may appear as direct children of a `Document`. */
export type DocumentChild = XmlDeclaration | DocumentType | Element | Comment | ProcessingInstruction;

/**
 * A loaded tree. `path` is the file it was read from or last written to,
 * `null` for a tree that only ever lived in memory.
 */
export interface Document extends Node {
	readonly type: 'document';
	readonly children: DocumentChild[];
	path: string | null;
}

/** Union of every possible XML node type. */
export type AnyNode = Document | Element | Text | CData | Comment | ProcessingInstruction | DocumentType | XmlDeclaration;

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isDocument(node: Node): node is Document {
	return node.type === 'document';
}

export function isElement(node: Node): node is Element {
	return node.type === 'element';
}

export function isText(node: Node): node is Text {
	return node.type === 'text';
}

export function isCData(node: Node): node is CData {
	return node.type === 'cdata';
}

export function isComment(node: Node): node is Comment {
	return node.type === 'comment';
}

export function isProcessingInstruction(node: Node): node is ProcessingInstruction {
	return node.type === 'processing-instruction';
}

export function isDocumentType(node: Node): node is DocumentType {
	return node.type === 'doctype';
}

export function isXmlDeclaration(node: Node): node is XmlDeclaration {
	return node.type === 'xml-declaration';
}
