/**
 * arxml-access — Observability hook
 *
 * The document context never prints. It reports what it did as structured
 * events to an optional listener supplied by the caller; `formatEvent`
 * turns an event into the one-line status message a CLI would show.
 */

export type BatchOperation = 'add' | 'edit' | 'delete';

export type DocumentEvent =
	| { type: 'loaded'; path: string | null; elementCount: number }
	| { type: 'saved'; path: string }
	| { type: 'batch'; operation: BatchOperation; attribute: string; selected: number; affected: number };

export type DocumentEventListener = (event: DocumentEvent) => void;

const PAST_TENSE: Readonly<Record<BatchOperation, string>> = {
	add: 'Added',
	edit: 'Edited',
	delete: 'Deleted',
};

export function formatEvent(event: DocumentEvent): string {
	switch (event.type) {
		case 'loaded':
			return event.path === null ? `Attached in-memory ARXML document (${event.elementCount} elements)` : `Successfully loaded ARXML file: ${event.path} (${event.elementCount} elements)`;
		case 'saved':
			return `Successfully saved ARXML file: ${event.path}`;
		case 'batch':
			return `${PAST_TENSE[event.operation]} attribute '${event.attribute}' on ${event.affected} of ${event.selected} elements`;
	}
}
