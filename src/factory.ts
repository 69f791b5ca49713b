/**
 * arxml-access — Context construction
 *
 * The one place that knows the default capability implementations. Tests
 * swap any of them out through `createCustom`.
 */

import { DocumentContext } from './context.ts';
import type { Capabilities, ContextOptions } from './context.ts';
import { FileDocumentStore } from './store.ts';
import type { FileStoreOptions } from './store.ts';
import { TreeQueryEngine } from './query.ts';
import { MapAttributeEditor } from './editor.ts';

export interface DefaultContextOptions extends ContextOptions, FileStoreOptions {}

/** A context on the file system with the standard query engine and editor. */
export function createDefault(options: DefaultContextOptions = {}): DocumentContext {
	return new DocumentContext(
		{
			store: new FileDocumentStore({ encoding: options.encoding }),
			query: new TreeQueryEngine(),
			editor: new MapAttributeEditor(),
		},
		{ onEvent: options.onEvent },
	);
}

/** A context where any subset of the capabilities is substituted. */
export function createCustom(capabilities: Partial<Capabilities> = {}, options: ContextOptions = {}): DocumentContext {
	return new DocumentContext(
		{
			store: capabilities.store ?? new FileDocumentStore(),
			query: capabilities.query ?? new TreeQueryEngine(),
			editor: capabilities.editor ?? new MapAttributeEditor(),
		},
		options,
	);
}
