import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { JsonSchema, SchemaValidator } from '../src/schema_validator';

const ENTRY_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['category'],
    requireAnyOf: { keys: ['text', 'content'], type: 'string' },
    properties: {
        category: { type: 'string', minLength: 1 },
    },
};

function validator(): SchemaValidator {
    const v = new SchemaValidator();
    v.registerSchema('entry_v1', ENTRY_SCHEMA);
    return v;
}

describe('SchemaValidator', () => {
    test('accepts a complete entry', () => {
        const r = validator().validate({ category: 'a', text: 'x', tag: 't' }, 'entry_v1');
        assert.deepEqual(r, { valid: true, errors: [] });
    });

    test('accepts the alternate text key', () => {
        assert.ok(validator().validate({ category: 'a', content: 'x' }, 'entry_v1').valid);
    });

    test('reports a missing required field', () => {
        const r = validator().validate({ text: 'x' }, 'entry_v1');
        assert.deepEqual(r.errors, [{ path: '.category', message: 'Required field missing' }]);
    });

    test('reports when no text key holds a string', () => {
        const r = validator().validate({ category: 'a', text: 3 }, 'entry_v1');
        assert.deepEqual(r.errors, [{ path: '', message: 'Expected a string field in one of: text, content' }]);
    });

    test('reports a top-level type mismatch and stops', () => {
        const r = validator().validate(['x'], 'entry_v1');
        assert.deepEqual(r.errors, [{ path: '', message: 'Expected type object, got array' }]);
    });

    test('checks minLength of a nested property', () => {
        const r = validator().validate({ category: '', text: 'x' }, 'entry_v1');
        assert.deepEqual(r, { valid: false, errors: [{ path: '.category', message: 'Length 0 < minLength 1' }] });
    });

    test('reports a nested property type mismatch', () => {
        const r = validator().validate({ category: 3, text: 'x' }, 'entry_v1');
        assert.deepEqual(r.errors, [{ path: '.category', message: 'Expected type string, got number' }]);
    });

    test('unknown schema id fails validation', () => {
        const r = new SchemaValidator().validate({}, 'nope');
        assert.deepEqual(r, { valid: false, errors: [{ path: '', message: 'Schema not found: nope' }] });
    });
});
