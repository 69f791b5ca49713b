import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatEvent } from '../src/index.ts';

describe('formatEvent', () => {
	it('describes a load from disk', () => {
		assert.equal(formatEvent({ type: 'loaded', path: 'in/Ecu.arxml', elementCount: 12 }), 'Successfully loaded ARXML file: in/Ecu.arxml (12 elements)');
	});

	it('describes an attached document', () => {
		assert.equal(formatEvent({ type: 'loaded', path: null, elementCount: 1 }), 'Attached in-memory ARXML document (1 elements)');
	});

	it('describes a save', () => {
		assert.equal(formatEvent({ type: 'saved', path: 'out/Ecu.arxml' }), 'Successfully saved ARXML file: out/Ecu.arxml');
	});

	it('describes each batch operation', () => {
		assert.equal(formatEvent({ type: 'batch', operation: 'add', attribute: 'UUID', selected: 3, affected: 3 }), "Added attribute 'UUID' on 3 of 3 elements");
		assert.equal(formatEvent({ type: 'batch', operation: 'edit', attribute: 'T', selected: 4, affected: 1 }), "Edited attribute 'T' on 1 of 4 elements");
		assert.equal(formatEvent({ type: 'batch', operation: 'delete', attribute: 'T', selected: 2, affected: 0 }), "Deleted attribute 'T' on 0 of 2 elements");
	});
});
