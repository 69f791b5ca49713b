/**
 * DocumentContext tests. Most run against the in-memory store; the last
 * group goes through `createDefault` and the real file system.
 */
import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import {
	DocumentContext,
	MapAttributeEditor,
	MalformedDocumentError,
	NoDocumentLoadedError,
	NoOutputPathError,
	NotFoundError,
	InvalidQueryError,
	TreeQueryEngine,
	createCustom,
	createDefault,
	parse,
	isDocumentError,
} from '../src/index.ts';
import type { Document, DocumentEvent, Element, QueryEngine } from '../src/index.ts';
import { MemoryStore, nth, rootElement, tempDir } from './helpers.ts';

const ITEMS = '<ROOT><ITEM id="1"/><ITEM/><OTHER/></ROOT>';

function contextWith(files: Record<string, string>, events: DocumentEvent[] = []): { ctx: DocumentContext; store: MemoryStore } {
	const store = new MemoryStore(files);
	const ctx = new DocumentContext({ store, query: new TreeQueryEngine(), editor: new MapAttributeEditor() }, { onEvent: (e) => events.push(e) });
	return { ctx, store };
}

describe('DocumentContext — empty', () => {
	const { ctx } = contextWith({});
	const node = rootElement(parse('<R/>'));

	const operations: ReadonlyArray<[string, () => unknown]> = [
		['save', () => ctx.save('out.arxml')],
		['findByTag', () => ctx.findByTag('R')],
		['findByPath', () => ctx.findByPath('.')],
		['findByAttribute', () => ctx.findByAttribute('a', 'b')],
		['listTags', () => ctx.listTags()],
		['elementInfo', () => ctx.elementInfo(node)],
		['addToNodes', () => ctx.addToNodes([node], 'a', '1')],
		['editInNodes', () => ctx.editInNodes([node], 'a', '1')],
		['deleteFromNodes', () => ctx.deleteFromNodes([node], 'a')],
		['addByTag', () => ctx.addByTag('R', 'a', '1')],
		['editByTag', () => ctx.editByTag('R', 'a', '1')],
		['deleteByTag', () => ctx.deleteByTag('R', 'a')],
	];

	it('starts empty', () => {
		assert.equal(ctx.state, 'empty');
		assert.equal(ctx.document, null);
		assert.equal(ctx.sourcePath, null);
		assert.equal(ctx.outputPath, null);
	});

	for (const [name, run] of operations) {
		it(`${name} requires a document`, () => {
			assert.throws(run, (err: unknown) => err instanceof NoDocumentLoadedError && err.kind === 'NoDocumentLoaded' && err.message === 'No ARXML file loaded');
		});
	}

	it('leaves nodes untouched when refusing a batch', () => {
		assert.throws(() => ctx.addToNodes([node], 'a', '1'), NoDocumentLoadedError);
		assert.equal(node.attributes.size, 0);
	});
});

describe('DocumentContext — batch edits', () => {
	it('adds, edits and deletes by tag', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');

		assert.equal(ctx.addByTag('ITEM', 'flag', 'x'), 2);
		assert.equal(ctx.editByTag('ITEM', 'id', '9'), 1);
		assert.equal(ctx.deleteByTag('ITEM', 'flag'), 2);

		const items = ctx.findByTag('ITEM');
		assert.deepEqual(
			items.map((el) => [...el.attributes]),
			[[['id', '9']], []],
		);
	});

	it('counts only nodes that held the attribute on edit and delete', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		assert.equal(ctx.editByTag('ITEM', 'missing', 'v'), 0);
		assert.equal(ctx.deleteByTag('OTHER', 'id'), 0);
		assert.equal(ctx.deleteByTag('ITEM', 'id'), 1);
	});

	it('returns zero for a tag that matches nothing', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		assert.equal(ctx.addByTag('NOPE', 'a', '1'), 0);
	});

	it('edits the nodes it is given', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		const picked = ctx.findByAttribute('id', '1');
		assert.equal(ctx.addToNodes(picked, 'seen', 'yes'), 1);
		assert.equal(nth(ctx.findByAttribute('seen', 'yes'), 0), nth(picked, 0));
	});

	it('lets query errors through', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		assert.throws(() => ctx.findByPath('/ROOT'), InvalidQueryError);
	});

	it('summarises held nodes', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		assert.deepEqual(ctx.listTags(), ['ITEM', 'OTHER', 'ROOT']);
		assert.deepEqual(ctx.elementInfo(nth(ctx.findByTag('ITEM'), 0)), { tag: 'ITEM', attributes: { id: '1' }, text: null, childCount: 0 });
	});
});

describe('DocumentContext — load and save targets', () => {
	it('saves back to the load path by default', () => {
		const { ctx, store } = contextWith({ 'in.arxml': '<ROOT><ITEM id="1"/></ROOT>' });
		ctx.load('in.arxml');
		ctx.addByTag('ITEM', 'v', '1');
		ctx.save();
		assert.deepEqual(store.writes, ['in.arxml']);
		assert.equal(store.files.get('in.arxml'), '<?xml version="1.0" encoding="ISO-8859-1"?>\n<ROOT><ITEM id="1" v="1"/></ROOT>');
	});

	it('makes an explicit save path the new default', () => {
		const { ctx, store } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		ctx.save('out.arxml');
		ctx.save();
		assert.deepEqual(store.writes, ['out.arxml', 'out.arxml']);
		assert.equal(ctx.sourcePath, 'in.arxml');
		assert.equal(ctx.outputPath, 'out.arxml');
	});

	it('treats an empty save path as no path', () => {
		const { ctx, store } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		ctx.save('');
		assert.deepEqual(store.writes, ['in.arxml']);
		assert.equal(ctx.outputPath, 'in.arxml');

		ctx.attach(parse('<R/>'));
		assert.throws(() => ctx.save(''), NoOutputPathError);
	});

	it('forgets the previous save path on load', () => {
		const { ctx } = contextWith({ 'in.arxml': ITEMS });
		ctx.load('in.arxml');
		ctx.save('out.arxml');
		ctx.load('in.arxml');
		assert.equal(ctx.outputPath, 'in.arxml');
	});

	it('needs an explicit path for a document without one', () => {
		const { ctx, store } = contextWith({});
		ctx.attach(parse('<R/>'));
		assert.equal(ctx.state, 'loaded');
		assert.throws(() => ctx.save(), (err: unknown) => err instanceof NoOutputPathError && err.message === 'No output path specified');

		ctx.save('new.arxml');
		assert.deepEqual(store.writes, ['new.arxml']);
		assert.equal(ctx.outputPath, 'new.arxml');
	});

	it('keeps the held document when a load fails', () => {
		const { ctx } = contextWith({ 'a.arxml': '<A/>', 'bad.arxml': '<B>' });
		ctx.load('a.arxml');
		const held = ctx.document;

		assert.throws(() => ctx.load('missing.arxml'), NotFoundError);
		assert.throws(() => ctx.load('bad.arxml'), MalformedDocumentError);
		assert.equal(ctx.document, held);
		assert.equal(ctx.sourcePath, 'a.arxml');
	});
});

describe('DocumentContext — events', () => {
	it('reports loads, batches and saves in order', () => {
		const events: DocumentEvent[] = [];
		const { ctx } = contextWith({ 'in.arxml': '<ROOT><ITEM/></ROOT>' }, events);
		ctx.load('in.arxml');
		ctx.addByTag('ITEM', 'v', '1');
		ctx.editByTag('ITEM', 'w', '2');
		ctx.save();
		ctx.attach(parse('<X><Y/><Y/></X>'));

		assert.deepEqual(events, [
			{ type: 'loaded', path: 'in.arxml', elementCount: 2 },
			{ type: 'batch', operation: 'add', attribute: 'v', selected: 1, affected: 1 },
			{ type: 'batch', operation: 'edit', attribute: 'w', selected: 1, affected: 0 },
			{ type: 'saved', path: 'in.arxml' },
			{ type: 'loaded', path: null, elementCount: 3 },
		]);
	});

	it('emits nothing for a failed operation', () => {
		const events: DocumentEvent[] = [];
		const { ctx } = contextWith({}, events);
		assert.throws(() => ctx.load('missing.arxml'), NotFoundError);
		assert.deepEqual(events, []);
	});
});

describe('createCustom', () => {
	it('delegates to substituted capabilities', () => {
		const calls: string[] = [];
		const doc: Document = parse('<R><S/></R>');
		const query: QueryEngine = {
			findByTag(document, tag) {
				calls.push(`tag:${tag}`);
				return document === doc ? [rootElement(document)] : [];
			},
			findByPath(_document, expression) {
				calls.push(`path:${expression}`);
				return [];
			},
			findByAttribute(_document, name, value) {
				calls.push(`attr:${name}=${value}`);
				return [];
			},
		};
		const ctx = createCustom({ store: new MemoryStore(), query });
		ctx.attach(doc);

		const found: Element[] = ctx.findByTag('anything');
		assert.equal(nth(found, 0), rootElement(doc));
		ctx.findByPath('whatever[1]');
		ctx.findByAttribute('k', 'v');
		assert.equal(ctx.addByTag('anything', 'a', '1'), 1);
		assert.deepEqual(calls, ['tag:anything', 'path:whatever[1]', 'attr:k=v', 'tag:anything']);
	});

	it('uses the substituted store for loads and saves', () => {
		const store = new MemoryStore({ 'm.arxml': '<M/>' });
		const ctx = createCustom({ store });
		ctx.load('m.arxml');
		ctx.save('n.arxml');
		assert.equal(store.files.get('n.arxml'), '<?xml version="1.0" encoding="ISO-8859-1"?>\n<M/>');
	});
});

describe('createDefault', () => {
	const { dir, cleanup } = tempDir();
	after(cleanup);

	it('loads, edits and saves through the file system', () => {
		const input = join(dir, 'Ecu.arxml');
		const output = join(dir, 'out', 'Ecu.arxml');
		writeFileSync(input, Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?>\n<AUTOSAR><ECUC-VALUE UUID="1">Größe</ECUC-VALUE></AUTOSAR>', 'latin1'));

		const messages: DocumentEvent[] = [];
		const ctx = createDefault({ onEvent: (e) => messages.push(e) });
		ctx.load(input);
		assert.equal(ctx.editByTag('ECUC-VALUE', 'UUID', '2'), 1);
		ctx.save(output);

		assert.equal(readFileSync(output, 'latin1'), '<?xml version="1.0" encoding="ISO-8859-1"?>\n<AUTOSAR><ECUC-VALUE UUID="2">Größe</ECUC-VALUE></AUTOSAR>');
		assert.deepEqual(
			messages.map((e) => e.type),
			['loaded', 'batch', 'saved'],
		);
	});

	it('writes UTF-8 when asked to', () => {
		const output = join(dir, 'utf8.arxml');
		const ctx = createDefault({ encoding: 'UTF-8' });
		ctx.attach(parse('<R>中</R>'));
		ctx.save(output);
		assert.equal(readFileSync(output, 'utf8'), '<?xml version="1.0" encoding="UTF-8"?>\n<R>中</R>');
	});

	it('reports file errors as document errors', () => {
		const ctx = createDefault();
		assert.throws(
			() => ctx.load(join(dir, 'nope.arxml')),
			(err: unknown) => isDocumentError(err, 'NotFound'),
		);
	});
});
