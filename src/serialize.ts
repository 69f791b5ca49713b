/**
 * arxml-access — XML serializer
 *
 * Converts a tree back into XML text.
 *
 * Output conventions
 * ──────────────────
 * • Childless elements are written self-closing (`<TAG/>`).
 * • Attributes are written in map order, double-quoted.
 * • Top-level nodes (declaration, DOCTYPE, comments, root) are separated by
 *   a newline; content inside the root is written exactly as held.
 * • With an `encoding` option the declaration is (re)written to name it and
 *   characters the encoding cannot carry are emitted as `&#xHH;` references
 *   in text and attribute values. Where a reference is not allowed (names,
 *   comments, PIs, CDATA) such a character raises `SerializeError`.
 */

import type { AnyNode, Document, Element, XmlDeclaration } from './types.ts';
import { isLatin1 } from './chars.ts';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Output encodings the serializer knows how to constrain to. */
export type OutputEncoding = 'ISO-8859-1' | 'UTF-8';

export interface SerializeOptions {
	/**
	 * Target encoding. When set, a document is written with an XML
	 * declaration naming it (version and standalone are kept from the
	 * document's own declaration) and unencodable characters are escaped.
	 * When absent the tree is written as held.
	 */
	encoding?: OutputEncoding;
}

/** Thrown when the tree cannot be represented in the requested encoding. */
export class SerializeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'XmlSerializeError';
	}
}

const ENCODABLE: Readonly<Record<OutputEncoding, (code: number) => boolean>> = {
	'ISO-8859-1': isLatin1,
	'UTF-8': () => true,
};

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

class XmlWriter {
	private readonly encoding: OutputEncoding | null;
	private readonly encodable: (code: number) => boolean;

	constructor(options: SerializeOptions) {
		this.encoding = options.encoding ?? null;
		this.encodable = ENCODABLE[options.encoding ?? 'UTF-8'];
	}

	node(node: AnyNode): string {
		switch (node.type) {
			case 'document':
				return this.document(node);
			case 'xml-declaration':
				return this.declaration(node);
			case 'doctype': {
				let s = `<!DOCTYPE ${this.raw(node.name, 'DOCTYPE name')}`;
				if (node.publicId !== null) {
					s += ` PUBLIC "${node.publicId}" "${node.systemId ?? ''}"`;
				} else if (node.systemId !== null) {
					s += ` SYSTEM "${node.systemId}"`;
				}
				if (node.internalSubset !== null) s += ` [${this.raw(node.internalSubset, 'DOCTYPE internal subset')}]`;
				return `${s}>`;
			}
			case 'processing-instruction': {
				const data = this.raw(node.data, 'processing instruction');
				return data.length > 0 ? `<?${node.target} ${data}?>` : `<?${node.target}?>`;
			}
			case 'comment':
				return `<!--${this.raw(node.value, 'comment')}-->`;
			case 'text':
				return this.escape(node.value, /[&<>\r]/g);
			case 'cdata':
				return `<![CDATA[${escapeCData(this.raw(node.value, 'CDATA section'))}]]>`;
			case 'element':
				return this.element(node);
		}
	}

	private document(doc: Document): string {
		const parts: string[] = [];
		const existing = doc.children.find((c): c is XmlDeclaration => c.type === 'xml-declaration');
		if (this.encoding !== null) {
			parts.push(
				this.declaration({
					type: 'xml-declaration',
					version: existing?.version ?? '1.0',
					encoding: this.encoding,
					standalone: existing?.standalone ?? null,
				}),
			);
		}
		for (const c of doc.children) {
			if (c.type === 'xml-declaration' && this.encoding !== null) continue;
			parts.push(this.node(c));
		}
		return parts.join('\n');
	}

	private declaration(decl: XmlDeclaration): string {
		let s = `<?xml version="${decl.version}"`;
		if (decl.encoding !== null) s += ` encoding="${decl.encoding}"`;
		if (decl.standalone !== null) s += ` standalone="${decl.standalone ? 'yes' : 'no'}"`;
		return `${s}?>`;
	}

	private element(el: Element): string {
		const tag = this.raw(el.tag, 'element name');
		let attrs = '';
		for (const [name, value] of el.attributes) {
			attrs += ` ${this.raw(name, 'attribute name')}="${this.escape(value, /[&<"\t\n\r]/g)}"`;
		}
		if (el.children.length === 0) return `<${tag}${attrs}/>`;
		return `<${tag}${attrs}>${el.children.map((c) => this.node(c)).join('')}</${tag}>`;
	}

	/** Escapes markup characters matched by `special`, then unencodable ones. */
	private escape(s: string, special: RegExp): string {
		const escaped = s.replace(special, (ch) => ESCAPES[ch] ?? ch);
		if (this.encoding === null) return escaped;
		let out = '';
		for (const ch of escaped) {
			const code = ch.codePointAt(0) ?? 0;
			out += this.encodable(code) ? ch : `&#x${code.toString(16).toUpperCase()};`;
		}
		return out;
	}

	/** Passes through text that cannot hold references, checking encodability. */
	private raw(s: string, where: string): string {
		if (this.encoding === null) return s;
		for (const ch of s) {
			const code = ch.codePointAt(0) ?? 0;
			if (!this.encodable(code)) {
				throw new SerializeError(`Character U+${code.toString(16).toUpperCase().padStart(4, '0')} in ${where} cannot be encoded as ${this.encoding}`);
			}
		}
		return s;
	}
}

// ---------------------------------------------------------------------------
// Escaping helpers
// ---------------------------------------------------------------------------

const ESCAPES: Readonly<Record<string, string>> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&quot;',
	'\t': '&#9;',
	'\n': '&#10;',
	'\r': '&#13;',
};

/**
 * Ensure a CDATA value does not contain the `]]>` end-marker by splitting
 * it across adjacent CDATA sections wherever that sequence appears.
 *   'a ]]> b' → 'a ]]]><![CDATA[]> b'
 */
function escapeCData(value: string): string {
	return value.split(']]>').join(']]]><![CDATA[]>');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Serialize any node (or a complete document) to an XML string.
 *
 * - `Document`       → top-level nodes joined by `\n`.
 * - `Element`        → `<tag attrs>…</tag>`, or `<tag attrs/>` when childless.
 * - `Text`           → `&`, `<`, `>` escaped.
 * - `CData`          → `<![CDATA[…]]>`, splitting on embedded `]]>`.
 * - Comments, PIs, declaration and DOCTYPE → their literal forms.
 *
 * @throws {SerializeError} when `options.encoding` cannot represent a
 *   character in a position that does not admit character references.
 */
export function serialize(node: AnyNode, options: SerializeOptions = {}): string {
	return new XmlWriter(options).node(node);
}
