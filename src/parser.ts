/**
 * arxml-access — Recursive-descent XML parser
 *
 * Design goals
 * ─────────────
 * • Well-formedness is enforced. A configuration file that does not parse
 *   cleanly is rejected with a positioned `ParseError` instead of being
 *   repaired, because a repaired tree would be written back over the input.
 * • Optimised for configuration-sized documents (a few MB) — no streaming.
 * • The tree is built directly in the mutable shape the editor works on.
 *
 * Normalisation
 * ─────────────
 * • `\r\n` and lone `\r` become `\n` before parsing (XML 1.0 §2.11).
 * • Literal tab / newline characters inside attribute values become spaces
 *   (§3.3.3); whitespace written as character references is kept.
 * • A leading BOM (U+FEFF) is skipped.
 */

import type { Document, DocumentChild, ChildNode, Element, Text, CData, Comment, ProcessingInstruction, DocumentType, XmlDeclaration } from './types.ts';
import { isXmlWhitespace, isNameStartChar, isNameChar, isHexDigit, isDecimalDigit, isXmlChar } from './chars.ts';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const XML_NS = 'http://www.w3.org/XML/1998/namespace';
const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';

/** The five predefined XML entities. Any other named reference is an error. */
const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
	['amp', '&'],
	['lt', '<'],
	['gt', '>'],
	['apos', "'"],
	['quot', '"'],
]);

const DECLARATION_FIELDS = new Set(['version', 'encoding', 'standalone']);

// ---------------------------------------------------------------------------
// Public error type
// ---------------------------------------------------------------------------

/** Thrown for any well-formedness violation. */
export class ParseError extends Error {
	/** Offset in the (line-ending normalised) source string. */
	readonly position: number;
	/** 1-based line number. */
	readonly line: number;
	/** 1-based column number. */
	readonly column: number;

	constructor(message: string, position: number, line: number, column: number) {
		super(`${message} (line ${line}, col ${column})`);
		this.name = 'XmlParseError';
		this.position = position;
		this.line = line;
		this.column = column;
	}
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface QName {
	/** The name exactly as written. */
	raw: string;
	prefix: string | null;
	local: string;
}

interface RawAttr {
	name: QName;
	value: string;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class XmlParser {
	private readonly src: string;
	private pos = 0;

	/**
	 * Namespace scope stack.
	 * Each layer maps prefix → URI; `''` (empty string) is the default NS.
	 */
	private readonly nsStack: Array<Map<string, string>> = [
		new Map<string, string>([
			['xml', XML_NS],
			['xmlns', XMLNS_NS],
		]),
	];

	constructor(src: string) {
		this.src = src.replace(/\r\n?/g, '\n');
	}

	// -------------------------------------------------------------------------
	// Public entry point
	// -------------------------------------------------------------------------

	parse(): Document {
		if (this.src.charCodeAt(0) === 0xfeff) this.pos = 1;
		this.checkCharacters();

		const children: DocumentChild[] = [];

		if (this.startsWith('<?xml') && this.isXmlDeclStart()) {
			children.push(this.parseXmlDeclaration());
		}

		this.parseMisc(children);

		if (this.startsWith('<!DOCTYPE')) {
			children.push(this.parseDoctype());
			this.parseMisc(children);
		}

		if (this.current() !== '<' || !isNameStartChar(this.src.charCodeAt(this.pos + 1))) {
			throw this.error('No root element found');
		}
		children.push(this.parseElement());

		this.parseMisc(children);
		if (this.pos < this.src.length) {
			throw this.error('Unexpected content after the root element');
		}

		return { type: 'document', children, path: null };
	}

	/** Every literal code point must be a `Char`; references are checked where they expand. */
	private checkCharacters(): void {
		for (let i = this.pos; i < this.src.length; ) {
			const code = this.src.codePointAt(i);
			if (code === undefined) break;
			if (!isXmlChar(code)) {
				throw this.errorAt(i, `Illegal character U+${code.toString(16).toUpperCase().padStart(4, '0')}`);
			}
			i += code > 0xffff ? 2 : 1;
		}
	}

	// -------------------------------------------------------------------------
	// Prolog / misc
	// -------------------------------------------------------------------------

	/** `<?xml` followed by whitespace, not a PI named `xml-stylesheet` etc. */
	private isXmlDeclStart(): boolean {
		return isXmlWhitespace(this.src.charCodeAt(this.pos + 5));
	}

	private parseMisc(into: DocumentChild[]): void {
		while (this.pos < this.src.length) {
			this.skipWhitespace();
			if (this.startsWith('<!--')) {
				into.push(this.parseComment());
			} else if (this.startsWith('<?')) {
				into.push(this.parseProcessingInstruction());
			} else {
				break;
			}
		}
	}

	private parseXmlDeclaration(): XmlDeclaration {
		this.expect('<?xml');

		const fields = new Map<string, string>();
		for (;;) {
			const spaced = this.skipWhitespace();
			if (this.startsWith('?>')) {
				this.advanceBy(2);
				break;
			}
			const name = this.tryParseName();
			if (name === null || !spaced || !DECLARATION_FIELDS.has(name) || fields.has(name)) {
				throw this.error('Malformed XML declaration');
			}
			this.parseEq();
			fields.set(name, this.parseLiteral());
		}

		const version = fields.get('version');
		if (version === undefined) throw this.error('XML declaration is missing its version');

		const standaloneValue = fields.get('standalone');
		let standalone: boolean | null = null;
		if (standaloneValue !== undefined) {
			if (standaloneValue !== 'yes' && standaloneValue !== 'no') throw this.error(`Invalid standalone value ${JSON.stringify(standaloneValue)}`);
			standalone = standaloneValue === 'yes';
		}

		return { type: 'xml-declaration', version, encoding: fields.get('encoding') ?? null, standalone };
	}

	private parseDoctype(): DocumentType {
		this.expect('<!DOCTYPE');
		if (!this.skipWhitespace()) throw this.error('Expected whitespace after <!DOCTYPE');
		const name = this.parseName();
		this.skipWhitespace();

		let publicId: string | null = null;
		let systemId: string | null = null;
		let internalSubset: string | null = null;

		if (this.startsWith('PUBLIC')) {
			this.advanceBy(6);
			this.skipWhitespace();
			publicId = this.parseLiteral();
			this.skipWhitespace();
			systemId = this.parseLiteral();
			this.skipWhitespace();
		} else if (this.startsWith('SYSTEM')) {
			this.advanceBy(6);
			this.skipWhitespace();
			systemId = this.parseLiteral();
			this.skipWhitespace();
		}

		if (this.current() === '[') {
			this.advance();
			const start = this.pos;
			// Scan for the closing ']', skipping quoted strings
			while (this.pos < this.src.length && this.current() !== ']') {
				const q = this.current();
				if (q === '"' || q === "'") {
					const end = this.src.indexOf(q, this.pos + 1);
					if (end === -1) throw this.error('Unterminated literal in DOCTYPE internal subset');
					this.pos = end + 1;
				} else {
					this.advance();
				}
			}
			if (this.pos >= this.src.length) throw this.error('Unterminated DOCTYPE internal subset');
			internalSubset = this.src.slice(start, this.pos);
			this.advance();
			this.skipWhitespace();
		}

		if (this.current() !== '>') throw this.error('Expected ">" to close DOCTYPE');
		this.advance();

		return { type: 'doctype', name, publicId, systemId, internalSubset };
	}

	// -------------------------------------------------------------------------
	// Element
	// -------------------------------------------------------------------------

	private parseElement(): Element {
		this.expect('<');
		const qname = this.parseQName();

		// Namespace declarations must be known before any prefix is resolved,
		// so attributes are collected first and resolved afterwards.
		const rawAttrs: RawAttr[] = [];
		const seen = new Set<string>();
		const nsDecls = new Map<string, string>(); // prefix → URI, '' = default

		for (;;) {
			const spaced = this.skipWhitespace();
			if (this.current() === '>' || this.startsWith('/>')) break;
			if (this.pos >= this.src.length) throw this.error(`Unterminated start tag <${qname.raw}>`);
			if (!spaced) throw this.error('Expected whitespace before attribute');

			const name = this.parseQName();
			if (seen.has(name.raw)) throw this.error(`Duplicate attribute ${name.raw}`);
			seen.add(name.raw);
			this.parseEq();
			const value = this.parseAttributeValue();

			if (name.prefix === null && name.local === 'xmlns') {
				nsDecls.set('', value);
			} else if (name.prefix === 'xmlns') {
				nsDecls.set(name.local, value);
			}
			rawAttrs.push({ name, value });
		}

		this.nsStack.push(nsDecls);

		const namespace = this.resolveNS(qname, true);
		for (const raw of rawAttrs) {
			if (raw.name.prefix !== null && raw.name.prefix !== 'xmlns') this.resolveNS(raw.name, false);
		}
		const attributes = new Map(rawAttrs.map((raw): [string, string] => [raw.name.raw, raw.value]));

		const children: ChildNode[] = [];
		if (this.startsWith('/>')) {
			this.advanceBy(2);
		} else {
			this.advance();
			this.parseChildren(children, qname);
		}

		this.nsStack.pop();

		return {
			type: 'element',
			tag: qname.raw,
			name: qname.local,
			prefix: qname.prefix,
			namespace,
			attributes,
			children,
		};
	}

	private parseChildren(into: ChildNode[], parent: QName): void {
		while (this.pos < this.src.length) {
			if (this.startsWith('</')) {
				this.advanceBy(2);
				const close = this.tryParseName();
				if (close !== parent.raw) {
					throw this.error(`Mismatched end tag: expected </${parent.raw}>, found </${close ?? ''}>`);
				}
				this.skipWhitespace();
				if (this.current() !== '>') throw this.error(`Expected ">" to close </${parent.raw}>`);
				this.advance();
				return;
			}

			if (this.startsWith('<![CDATA[')) {
				into.push(this.parseCData());
			} else if (this.startsWith('<!--')) {
				into.push(this.parseComment());
			} else if (this.startsWith('<?')) {
				into.push(this.parseProcessingInstruction());
			} else if (this.current() === '<') {
				if (!isNameStartChar(this.src.charCodeAt(this.pos + 1))) throw this.error('Unexpected "<" in content');
				into.push(this.parseElement());
			} else {
				into.push(this.parseText());
			}
		}
		throw this.error(`Unclosed element <${parent.raw}>`);
	}

	// -------------------------------------------------------------------------
	// Leaf nodes
	// -------------------------------------------------------------------------

	private parseComment(): Comment {
		this.expect('<!--');
		const end = this.src.indexOf('-->', this.pos);
		if (end === -1) throw this.error('Unterminated comment');
		const value = this.src.slice(this.pos, end);
		if (value.includes('--') || value.endsWith('-')) throw this.error('"--" is not allowed inside a comment');
		this.pos = end + 3;
		return { type: 'comment', value };
	}

	private parseCData(): CData {
		this.expect('<![CDATA[');
		const end = this.src.indexOf(']]>', this.pos);
		if (end === -1) throw this.error('Unterminated CDATA section');
		const value = this.src.slice(this.pos, end);
		this.pos = end + 3;
		return { type: 'cdata', value };
	}

	private parseProcessingInstruction(): ProcessingInstruction {
		this.expect('<?');
		const target = this.tryParseName();
		if (target === null) throw this.error('Expected processing-instruction target');
		if (target.toLowerCase() === 'xml') throw this.error('The XML declaration is only allowed at the start of the document');

		if (this.startsWith('?>')) {
			this.advanceBy(2);
			return { type: 'processing-instruction', target, data: '' };
		}
		if (!this.skipWhitespace()) throw this.error('Expected whitespace after processing-instruction target');
		const end = this.src.indexOf('?>', this.pos);
		if (end === -1) throw this.error('Unterminated processing instruction');
		const data = this.src.slice(this.pos, end);
		this.pos = end + 2;
		return { type: 'processing-instruction', target, data };
	}

	private parseText(): Text {
		const parts: string[] = [];

		while (this.pos < this.src.length && this.current() !== '<') {
			if (this.current() === '&') {
				parts.push(this.parseReference());
				continue;
			}
			const next = this.nextSpecialInText();
			const end = next === -1 ? this.src.length : next;
			const run = this.src.slice(this.pos, end);
			if (run.includes(']]>')) throw this.error('"]]>" is not allowed in text content');
			parts.push(run);
			this.pos = end;
		}

		return { type: 'text', value: parts.join('') };
	}

	/** Returns the position of the next `<` or `&` at or after `this.pos`. */
	private nextSpecialInText(): number {
		const lt = this.src.indexOf('<', this.pos);
		const amp = this.src.indexOf('&', this.pos);
		if (lt === -1) return amp;
		if (amp === -1) return lt;
		return Math.min(lt, amp);
	}

	// -------------------------------------------------------------------------
	// References and values
	// -------------------------------------------------------------------------

	private parseReference(): string {
		const start = this.pos;
		this.advance(); // &

		if (this.current() === '#') {
			this.advance();
			return this.parseCharRef(start);
		}

		const name = this.tryParseName();
		if (name === null || this.current() !== ';') throw this.errorAt(start, 'Malformed entity reference');
		this.advance();

		const resolved = PREDEFINED_ENTITIES.get(name);
		if (resolved === undefined) throw this.errorAt(start, `Undefined entity &${name};`);
		return resolved;
	}

	private parseCharRef(start: number): string {
		const hex = this.current() === 'x';
		if (hex) this.advance();
		const isDigit = hex ? isHexDigit : isDecimalDigit;

		const digitsStart = this.pos;
		while (this.pos < this.src.length && isDigit(this.src.charCodeAt(this.pos))) this.pos++;
		const digits = this.src.slice(digitsStart, this.pos);
		if (digits.length === 0 || this.current() !== ';') throw this.errorAt(start, 'Malformed character reference');
		this.advance();

		const code = parseInt(digits, hex ? 16 : 10);
		if (!isXmlChar(code)) throw this.errorAt(start, `Character reference ${this.src.slice(start, this.pos)} is not a legal XML character`);
		return String.fromCodePoint(code);
	}

	private parseAttributeValue(): string {
		const quote = this.current();
		if (quote !== '"' && quote !== "'") throw this.error('Attribute value must be quoted');
		this.advance();

		const parts: string[] = [];
		for (;;) {
			if (this.pos >= this.src.length) throw this.error('Unterminated attribute value');
			const ch = this.current();
			if (ch === quote) {
				this.advance();
				return parts.join('');
			}
			if (ch === '<') throw this.error('"<" is not allowed in attribute values');
			if (ch === '&') {
				parts.push(this.parseReference());
			} else {
				parts.push(isXmlWhitespace(this.src.charCodeAt(this.pos)) ? ' ' : ch);
				this.advance();
			}
		}
	}

	/** A quoted literal without reference expansion (declaration and DOCTYPE fields). */
	private parseLiteral(): string {
		const quote = this.current();
		if (quote !== '"' && quote !== "'") throw this.error('Expected quoted literal');
		const end = this.src.indexOf(quote, this.pos + 1);
		if (end === -1) throw this.error('Unterminated literal');
		const value = this.src.slice(this.pos + 1, end);
		this.pos = end + 1;
		return value;
	}

	private parseEq(): void {
		this.skipWhitespace();
		if (this.current() !== '=') throw this.error('Expected "="');
		this.advance();
		this.skipWhitespace();
	}

	// -------------------------------------------------------------------------
	// Name / QName parsing
	// -------------------------------------------------------------------------

	private parseName(): string {
		const name = this.tryParseName();
		if (name === null) throw this.error(`Expected XML name, got ${JSON.stringify(this.current())}`);
		return name;
	}

	private tryParseName(): string | null {
		if (!isNameStartChar(this.src.charCodeAt(this.pos))) return null;
		const start = this.pos;
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		return this.src.slice(start, this.pos);
	}

	/** Parses a qualified name; at most one `:` with non-empty parts. */
	private parseQName(): QName {
		const start = this.pos;
		const raw = this.parseName();
		const parts = raw.split(':');
		if (parts.length === 1) return { raw, prefix: null, local: raw };
		const [prefix, local] = parts;
		if (parts.length > 2 || !prefix || !local) throw this.errorAt(start, `Invalid qualified name ${raw}`);
		return { raw, prefix, local };
	}

	// -------------------------------------------------------------------------
	// Namespace resolution
	// -------------------------------------------------------------------------

	/**
	 * Resolves a name's prefix against the scope stack.
	 * Unprefixed elements take the default namespace; unprefixed attributes
	 * have none. An undeclared prefix is an error.
	 */
	private resolveNS(name: QName, isElement: boolean): string | null {
		const key = name.prefix ?? (isElement ? '' : null);
		if (key === null) return null;

		for (let i = this.nsStack.length - 1; i >= 0; i--) {
			const uri = this.nsStack[i]?.get(key);
			if (uri !== undefined) return uri === '' ? null : uri;
		}

		if (key === '') return null;
		throw this.error(`Unbound namespace prefix "${key}" in ${name.raw}`);
	}

	// -------------------------------------------------------------------------
	// Low-level cursor helpers
	// -------------------------------------------------------------------------

	private current(): string {
		return this.src[this.pos] ?? '';
	}

	private advance(): void {
		this.pos++;
	}

	private advanceBy(n: number): void {
		this.pos += n;
	}

	private startsWith(str: string): boolean {
		return this.src.startsWith(str, this.pos);
	}

	private expect(str: string): void {
		if (!this.src.startsWith(str, this.pos)) {
			throw this.error(`Expected ${JSON.stringify(str)}, got ${JSON.stringify(this.src.slice(this.pos, this.pos + str.length))}`);
		}
		this.pos += str.length;
	}

	/** Skips whitespace; reports whether any was skipped. */
	private skipWhitespace(): boolean {
		const start = this.pos;
		while (this.pos < this.src.length && isXmlWhitespace(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		return this.pos > start;
	}

	// -------------------------------------------------------------------------
	// Error helpers
	// -------------------------------------------------------------------------

	private error(message: string): ParseError {
		return this.errorAt(this.pos, message);
	}

	private errorAt(position: number, message: string): ParseError {
		let line = 1;
		let col = 1;
		for (let i = 0; i < position && i < this.src.length; i++) {
			if (this.src.charCodeAt(i) === 0x0a) {
				line++;
				col = 1;
			} else {
				col++;
			}
		}
		return new ParseError(message, position, line, col);
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses an XML string into a mutable `Document` tree. The returned
 * document has `path: null`; the store fills it in.
 *
 * @throws {ParseError} on any well-formedness violation.
 */
export function parse(xml: string): Document {
	return new XmlParser(xml).parse();
}
