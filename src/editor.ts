/**
 * arxml-access — Attribute editing
 *
 * Single-node attribute mutation. A missing attribute is an ordinary
 * outcome reported through the boolean result, never an exception.
 */

import type { Element } from './types.ts';

export interface AttributeEditor {
	/** Sets `name` to `value`, overwriting any existing value. */
	add(node: Element, name: string, value: string): void;
	/** Overwrites `name` if present. Returns whether the node had it. */
	edit(node: Element, name: string, value: string): boolean;
	/** Removes `name` if present. Returns whether the node had it. */
	delete(node: Element, name: string): boolean;
}

/**
 * Edits the element's attribute map in place. Overwritten attributes keep
 * their position; added ones are appended.
 */
export class MapAttributeEditor implements AttributeEditor {
	add(node: Element, name: string, value: string): void {
		node.attributes.set(name, value);
	}

	edit(node: Element, name: string, value: string): boolean {
		if (!node.attributes.has(name)) return false;
		node.attributes.set(name, value);
		return true;
	}

	delete(node: Element, name: string): boolean {
		return node.attributes.delete(name);
	}
}
