/**
 * arxml-access — Path expressions
 *
 * A deliberately small subset of XPath, evaluated with the root element as
 * the context node:
 *
 *   expr  := [ '.' ( '/' | '//' ) ] step ( ( '/' | '//' ) step )*  |  '.'
 *   step  := '*' | QName | '{' uri '}' local
 *
 *   AR-PACKAGES/AR-PACKAGE         children of the root, then their children
 *   .//ECUC-CONTAINER-VALUE        any descendant of the root
 *   AR-PACKAGES//*                 everything below AR-PACKAGES
 *
 * Everything else — absolute paths, `..`, predicates, attributes, functions,
 * unions, axes — is rejected with `InvalidQueryError` rather than answered
 * with an empty result.
 */

import type { Element } from './types.ts';
import { InvalidQueryError } from './errors.ts';
import { isNameChar, isNameStartChar } from './chars.ts';

// ---------------------------------------------------------------------------
// Compiled form
// ---------------------------------------------------------------------------

export type Axis = 'child' | 'descendant';

export type NameTest = { kind: 'any' } | { kind: 'tag'; tag: string } | { kind: 'clark'; namespace: string | null; name: string };

export interface Step {
	readonly axis: Axis;
	readonly test: NameTest;
}

/** A compiled expression: `steps` empty means the context node itself. */
export interface PathExpression {
	readonly source: string;
	readonly steps: ReadonlyArray<Step>;
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

class PathCompiler {
	private readonly src: string;
	private pos = 0;

	constructor(src: string) {
		this.src = src;
	}

	compile(): PathExpression {
		const src = this.src;
		if (src.length === 0) throw this.invalid('expression is empty');
		if (src === '.') return { source: src, steps: [] };
		if (src.startsWith('/')) throw this.invalid('absolute paths are not supported');

		let axis: Axis = 'child';
		if (src.startsWith('./')) {
			this.pos = 1;
			axis = this.readSeparator();
		}

		const steps: Step[] = [];
		for (;;) {
			steps.push({ axis, test: this.readTest() });
			if (this.pos >= src.length) break;
			axis = this.readSeparator();
		}
		return { source: src, steps };
	}

	private readSeparator(): Axis {
		let slashes = 0;
		while (this.src[this.pos] === '/') {
			slashes++;
			this.pos++;
		}
		if (slashes === 0) throw this.invalid(`unexpected ${JSON.stringify(this.src[this.pos])} at offset ${this.pos}`);
		if (slashes > 2) throw this.invalid(`"${'/'.repeat(slashes)}" is not a valid separator`);
		if (this.pos >= this.src.length) throw this.invalid('expression ends with a separator');
		return slashes === 2 ? 'descendant' : 'child';
	}

	private readTest(): NameTest {
		const ch = this.src[this.pos];
		if (ch === '*') {
			this.pos++;
			return { kind: 'any' };
		}
		if (ch === '.') {
			throw this.invalid(this.src.startsWith('..', this.pos) ? 'parent steps are not supported' : '"." is only supported as the first step');
		}
		if (ch === '{') {
			const close = this.src.indexOf('}', this.pos);
			if (close === -1) throw this.invalid('unterminated namespace URI');
			const uri = this.src.slice(this.pos + 1, close);
			this.pos = close + 1;
			const name = this.readName();
			if (name.includes(':')) throw this.invalid(`local name ${name} may not carry a prefix`);
			return { kind: 'clark', namespace: uri === '' ? null : uri, name };
		}
		return { kind: 'tag', tag: this.readName() };
	}

	private readName(): string {
		const start = this.pos;
		if (!isNameStartChar(this.src.charCodeAt(this.pos))) {
			throw this.invalid(this.pos < this.src.length ? `unsupported syntax ${JSON.stringify(this.src.slice(this.pos))}` : 'expected a name');
		}
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) this.pos++;
		const name = this.src.slice(start, this.pos);
		// `::` introduces an axis; a QName holds one colon at most
		if (name.split(':').length > 2 || name.endsWith(':')) throw this.invalid(`unsupported syntax ${JSON.stringify(name)}`);
		return name;
	}

	private invalid(reason: string): InvalidQueryError {
		return new InvalidQueryError(this.src, reason);
	}
}

/**
 * Compiles `source` into steps.
 *
 * @throws {InvalidQueryError} for anything outside the subset.
 */
export function compilePath(source: string): PathExpression {
	return new PathCompiler(source).compile();
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export function matchesTest(el: Element, test: NameTest): boolean {
	switch (test.kind) {
		case 'any':
			return true;
		case 'tag':
			return el.tag === test.tag;
		case 'clark':
			return el.name === test.name && el.namespace === test.namespace;
	}
}

function collectDescendants(el: Element, test: NameTest, into: Set<Element>): void {
	for (const c of el.children) {
		if (c.type !== 'element') continue;
		if (matchesTest(c, test)) into.add(c);
		collectDescendants(c, test, into);
	}
}

/**
 * Evaluates a compiled expression against `root`. Matches are unique and
 * in document order.
 */
export function evaluatePath(root: Element, expression: PathExpression): Element[] {
	let context = new Set<Element>([root]);
	for (const step of expression.steps) {
		const next = new Set<Element>();
		for (const el of context) {
			if (step.axis === 'descendant') {
				collectDescendants(el, step.test, next);
				continue;
			}
			for (const c of el.children) {
				if (c.type === 'element' && matchesTest(c, step.test)) next.add(c);
			}
		}
		context = next;
	}
	return inDocumentOrder(root, context);
}

function inDocumentOrder(root: Element, selected: ReadonlySet<Element>): Element[] {
	const ordered: Element[] = [];
	const visit = (el: Element): void => {
		if (selected.has(el)) ordered.push(el);
		for (const c of el.children) {
			if (c.type === 'element') visit(c);
		}
	};
	visit(root);
	return ordered;
}
