/**
 * arxml-access — Tree queries
 *
 * Two layers live here:
 *
 * • Small tree helpers (`rootElement`, `textContent`, `childElements`, …)
 *   used throughout the package and by callers walking results.
 * • The `QueryEngine` contract and its default implementation, which the
 *   document context delegates every find to.
 *
 * All traversals are depth-first, pre-order ("document order").
 */

import { isElement, isText, isCData } from './types.ts';
import type { AnyNode, Document, Element } from './types.ts';
import { compilePath, evaluatePath } from './path.ts';

// ---------------------------------------------------------------------------
// Tree helpers
// ---------------------------------------------------------------------------

/**
 * Concatenated text of a node and its descendants, like the DOM's
 * `textContent`. Comments, PIs and prolog nodes contribute nothing.
 */
export function textContent(node: AnyNode): string {
	switch (node.type) {
		case 'text':
		case 'cdata':
			return node.value;
		case 'element':
			return node.children.map((c) => textContent(c)).join('');
		case 'document':
			return node.children.map((c) => textContent(c)).join('');
		default:
			return '';
	}
}

/** Text held directly by `el` (its Text and CData children), without descendants. */
export function ownText(el: Element): string {
	let text = '';
	for (const c of el.children) {
		if (isText(c) || isCData(c)) text += c.value;
	}
	return text;
}

/** The root element of a `Document`, or `undefined` if there is none. */
export function rootElement(doc: Document): Element | undefined {
	return doc.children.find(isElement);
}

/** All direct child elements of `el`. */
export function childElements(el: Element): Element[] {
	return el.children.filter(isElement);
}

/** First direct child element whose tag is `tag`. */
export function child(el: Element, tag: string): Element | undefined {
	return el.children.find((c): c is Element => isElement(c) && c.tag === tag);
}

/** All direct child elements whose tag is `tag`. */
export function children(el: Element, tag: string): Element[] {
	return el.children.filter((c): c is Element => isElement(c) && c.tag === tag);
}

/** Every element in the subtree of `node`, the element itself first. */
export function* elements(node: Document | Element): Generator<Element> {
	if (isElement(node)) yield node;
	for (const c of node.children) {
		if (isElement(c)) yield* elements(c);
	}
}

/** All elements below `node` (not `node` itself) whose tag is `tag`. */
export function descendants(node: Document | Element, tag: string): Element[] {
	const results: Element[] = [];
	for (const c of node.children) {
		if (!isElement(c)) continue;
		if (c.tag === tag) results.push(c);
		results.push(...descendants(c, tag));
	}
	return results;
}

/** Value of attribute `name` on `el`, or `undefined` when absent. */
export function attr(el: Element, name: string): string | undefined {
	return el.attributes.get(name);
}

/** `{namespace}local` for namespaced elements, the plain local name otherwise. */
export function clarkName(el: Element): string {
	return el.namespace === null ? el.name : `{${el.namespace}}${el.name}`;
}

/** A flat summary of one element. */
export interface ElementInfo {
	tag: string;
	attributes: Record<string, string>;
	/** Own text trimmed, or `null` when there is none. */
	text: string | null;
	childCount: number;
}

export function elementInfo(el: Element): ElementInfo {
	const text = ownText(el).trim();
	return {
		tag: el.tag,
		attributes: Object.fromEntries(el.attributes),
		text: text.length > 0 ? text : null,
		childCount: childElements(el).length,
	};
}

/** Sorted, de-duplicated tags of every element in the document. */
export function listTags(doc: Document): string[] {
	const tags = new Set<string>();
	for (const el of elements(doc)) tags.add(el.tag);
	return [...tags].sort();
}

// ---------------------------------------------------------------------------
// QueryEngine
// ---------------------------------------------------------------------------

/** Finds elements in a document. Results are always in document order. */
export interface QueryEngine {
	/** Every element, root included, whose tag equals `tag`. */
	findByTag(document: Document, tag: string): Element[];
	/**
	 * Elements selected by a path expression (see `path.ts`).
	 * @throws {InvalidQueryError} for expressions outside the subset.
	 */
	findByPath(document: Document, expression: string): Element[];
	/** Elements carrying attribute `name` with a value exactly equal to `value`. */
	findByAttribute(document: Document, name: string, value: string): Element[];
}

/**
 * Walks the in-memory tree.
 *
 * `findByTag` compares against the tag as written (`ar:AR-PACKAGE`); a tag
 * given in Clark notation (`{http://autosar.org/schema/r4.0}AR-PACKAGE`)
 * is compared against each element's resolved namespace and local name
 * instead.
 */
export class TreeQueryEngine implements QueryEngine {
	findByTag(document: Document, tag: string): Element[] {
		const matches = tag.startsWith('{') ? (el: Element) => clarkName(el) === tag : (el: Element) => el.tag === tag;
		return [...elements(document)].filter(matches);
	}

	findByPath(document: Document, expression: string): Element[] {
		const compiled = compilePath(expression);
		const root = rootElement(document);
		return root === undefined ? [] : evaluatePath(root, compiled);
	}

	findByAttribute(document: Document, name: string, value: string): Element[] {
		return [...elements(document)].filter((el) => el.attributes.get(name) === value);
	}
}
