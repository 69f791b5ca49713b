/**
 * arxml-access
 *
 * Load, query, edit and save AUTOSAR XML (ARXML) configuration documents.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { createDefault, formatEvent } from 'arxml-access';
 *
 * const ctx = createDefault({ onEvent: (e) => console.log(formatEvent(e)) });
 * ctx.load('EcuExtract.arxml');
 * ctx.addByTag('ECUC-MODULE-CONFIGURATION-VALUES', 'version', '1.0');
 * ctx.save('output/EcuExtract.arxml'); // ISO-8859-1, with an XML declaration
 * ```
 */

// Context and its construction
export { DocumentContext } from './context.ts';
export type { Capabilities, ContextOptions, ContextState } from './context.ts';
export { createDefault, createCustom } from './factory.ts';
export type { DefaultContextOptions } from './factory.ts';

// Capabilities
export { FileDocumentStore } from './store.ts';
export type { DocumentStore, FileStoreOptions } from './store.ts';
export { TreeQueryEngine } from './query.ts';
export type { QueryEngine, ElementInfo } from './query.ts';
export { MapAttributeEditor } from './editor.ts';
export type { AttributeEditor } from './editor.ts';

// Errors
export { DocumentError, NotFoundError, MalformedDocumentError, WriteFailureError, InvalidQueryError, NoDocumentLoadedError, NoOutputPathError, isDocumentError } from './errors.ts';
export type { DocumentErrorKind } from './errors.ts';

// Events
export { formatEvent } from './events.ts';
export type { DocumentEvent, DocumentEventListener, BatchOperation } from './events.ts';

// Codec
export { parse, ParseError } from './parser.ts';
export { serialize, SerializeError } from './serialize.ts';
export type { SerializeOptions, OutputEncoding } from './serialize.ts';

// Node model
export type { NodeType, Node, XmlDeclaration, DocumentType, ProcessingInstruction, Comment, CData, Text, Element, Document, ChildNode, DocumentChild, AnyNode } from './types.ts';
export { isDocument, isElement, isText, isCData, isComment, isProcessingInstruction, isDocumentType, isXmlDeclaration } from './types.ts';

// Tree helpers and path expressions
export { textContent, ownText, rootElement, child, children, childElements, elements, descendants, attr, clarkName, elementInfo, listTags } from './query.ts';
export { compilePath, evaluatePath } from './path.ts';
export type { PathExpression, Step, Axis, NameTest } from './path.ts';

// Export to nested objects
export { exportDocument, exportElement } from './export.ts';
export type { ExportedValue, ExportedObject } from './export.ts';
