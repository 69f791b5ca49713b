/**
 * arxml-access — Nested-object export
 *
 * Flattens a tree into plain keyed data for JSON output:
 *
 *   <AR-PACKAGE UUID="u1">             { "@UUID": "u1",
 *     <SHORT-NAME>Pkg</SHORT-NAME>  →    "SHORT-NAME": "Pkg",
 *     <ELEMENTS/>                        "ELEMENTS": null }
 *   </AR-PACKAGE>
 *
 * • Attributes become `@name` keys, before any child keys. Namespace
 *   declarations (`xmlns`, `xmlns:*`) are not exported.
 * • Children are keyed by local name (prefix dropped); repeated names
 *   collapse into an array in document order.
 * • A leaf with only text becomes the trimmed text; with attributes as well
 *   the text goes under `#text`; with neither it becomes `null`.
 * • Text mixed with child elements is dropped.
 */

import type { Document, Element } from './types.ts';
import { childElements, ownText, rootElement } from './query.ts';

export type ExportedValue = string | null | ExportedObject | ExportedValue[];

export interface ExportedObject {
	[key: string]: ExportedValue;
}

export function exportElement(el: Element): ExportedValue {
	// Names like `constructor` and `__proto__` are ordinary keys here.
	const out = new Map<string, ExportedValue>();
	for (const [name, value] of el.attributes) {
		if (name === 'xmlns' || name.startsWith('xmlns:')) continue;
		out.set(`@${name}`, value);
	}
	const hasAttributes = out.size > 0;

	const kids = childElements(el);
	if (kids.length > 0) {
		for (const kid of kids) {
			const value = exportElement(kid);
			const existing = out.get(kid.name);
			if (existing === undefined) {
				out.set(kid.name, value);
			} else if (Array.isArray(existing)) {
				existing.push(value);
			} else {
				out.set(kid.name, [existing, value]);
			}
		}
		return Object.fromEntries(out);
	}

	const text = ownText(el).trim();
	if (text.length > 0) {
		if (!hasAttributes) return text;
		out.set('#text', text);
		return Object.fromEntries(out);
	}
	return hasAttributes ? Object.fromEntries(out) : null;
}

/** `{ [rootLocalName]: exportElement(root) }`, or `{}` for a rootless tree. */
export function exportDocument(doc: Document): ExportedObject {
	const root = rootElement(doc);
	return root === undefined ? {} : Object.fromEntries(new Map<string, ExportedValue>([[root.name, exportElement(root)]]));
}
