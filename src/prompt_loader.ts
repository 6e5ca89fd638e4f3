/**
 * Prompt Loader
 *
 * Reads a JSON document and normalizes it into a PromptCollection.
 *
 * Accepted layouts:
 *   mapping  { "<category>": [ "text" | { text, ... } ], "<group>": { "<sub>": [...] } }
 *   array    [ { category, text, ... }, ... ]
 *
 * Nested groups flatten to "<group>.<sub>". Entry objects carry their body
 * under the first string-valued key among TEXT_KEYS.
 *
 * Category order is the order keys are written in the file. JSON.parse hoists
 * integer-like keys, so mapping keys are read off the syntax tree instead.
 */

import * as fs from 'fs';
import { Node as JsonNode, parseTree } from 'jsonc-parser';
import { TEXT_KEYS } from './config';
import { createLogger } from './logger';
import { PromptCollection, PromptEntry, RawDocument } from './prompt_types';
import { JsonSchema, SchemaValidator, isRecord } from './schema_validator';
import { DataFormatError, ErrorContext, fileErrorFromErrno } from './structured_error';

const log = createLogger('loader');

const ENTRY_OBJECT_SCHEMA: JsonSchema = {
    type: 'object',
    requireAnyOf: { keys: TEXT_KEYS, type: 'string' },
};

const ARRAY_ITEM_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['category'],
    requireAnyOf: { keys: TEXT_KEYS, type: 'string' },
    properties: {
        category: { type: 'string', minLength: 1 },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('entry_object', ENTRY_OBJECT_SCHEMA);
validator.registerSchema('array_item', ARRAY_ITEM_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

export function loadCollection(filePath: string): PromptCollection {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
        throw fileErrorFromErrno(err, filePath, 'read');
    }
    return parseCollection(raw, filePath);
}

/** Parse JSON text. `origin` names the input in error context. */
export function parseCollection(jsonText: string, origin = '<input>'): PromptCollection {
    let data: unknown;
    try {
        data = JSON.parse(jsonText);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new DataFormatError(`Invalid JSON in ${origin}: ${detail}`, 'INVALID_JSON', { path: origin }, err);
    }

    const doc = classifyDocument(data, origin, parseTree(jsonText));
    const collection = normalizeDocument(doc, origin);

    let total = 0;
    for (const entries of collection.values()) total += entries.length;
    log.debug('Loaded prompt collection', { path: origin, shape: doc.shape, categories: collection.size, entries: total });

    return collection;
}

/**
 * Tag the parsed value with its layout. With a syntax `tree`, mapping keys and
 * nested group keys follow the source text; nested groups become Maps.
 */
export function classifyDocument(data: unknown, origin = '<input>', tree?: JsonNode): RawDocument {
    if (Array.isArray(data)) {
        return { shape: 'array', items: data };
    }
    if (isRecord(data)) {
        const categories: Array<[string, unknown]> = [];
        for (const [name, node] of keyOrder(data, tree)) {
            const value = data[name];
            if (isRecord(value)) {
                const members = new Map<string, unknown>();
                for (const sub of keyOrder(value, node).keys()) members.set(sub, value[sub]);
                categories.push([name, members]);
            } else {
                categories.push([name, value]);
            }
        }
        return { shape: 'mapping', categories };
    }
    const found = data === null ? 'null' : typeof data;
    throw new DataFormatError(
        `Top-level JSON value must be an object or an array, got ${found}`,
        'UNSUPPORTED_SHAPE',
        { path: origin, found }
    );
}

export function normalizeDocument(doc: RawDocument, origin = '<input>'): PromptCollection {
    const builder = new CollectionBuilder(origin);

    switch (doc.shape) {
        case 'mapping':
            for (const [name, value] of doc.categories) {
                builder.requireCategoryName(name, {});
                if (Array.isArray(value)) {
                    builder.addAll(name, value);
                } else if (value instanceof Map) {
                    addGroup(builder, name, value, origin);
                } else {
                    throw new DataFormatError(
                        `Category "${name}" must map to an array of entries`,
                        'INVALID_ENTRY',
                        { path: origin, category: name }
                    );
                }
            }
            break;

        case 'array':
            doc.items.forEach((item, index) => {
                const result = validator.validate(item, 'array_item');
                if (!result.valid || !isRecord(item) || typeof item.category !== 'string') {
                    throw new DataFormatError(
                        `Item ${index} is not a valid entry: ${describeErrors(result.errors)}`,
                        'INVALID_ENTRY',
                        { path: origin, index }
                    );
                }
                builder.add(item.category, item, index);
            });
            break;
    }

    return builder.build();
}

/* -------------------------------------------------------------------------- */
/* Internals                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Keys of `record` in written order, each with its value node. Repeated keys
 * keep their first position and their last value, as JSON.parse does.
 */
function keyOrder(record: Record<string, unknown>, node: JsonNode | undefined): Map<string, JsonNode | undefined> {
    const order = new Map<string, JsonNode | undefined>();
    if (node?.type === 'object' && node.children) {
        for (const property of node.children) {
            const [keyNode, valueNode] = property.children ?? [];
            if (keyNode && typeof keyNode.value === 'string') order.set(keyNode.value, valueNode);
        }
    }
    for (const key of Object.keys(record)) {
        if (!order.has(key)) order.set(key, undefined);
    }
    return order;
}

function addGroup(builder: CollectionBuilder, group: string, members: ReadonlyMap<string, unknown>, origin: string): void {
    for (const [sub, value] of members) {
        if (!Array.isArray(value)) {
            throw new DataFormatError(
                `Category group "${group}" holds a non-array value under "${sub}"`,
                'INVALID_ENTRY',
                { path: origin, category: `${group}.${sub}` }
            );
        }
        builder.requireCategoryName(sub, { group });
        builder.addAll(`${group}.${sub}`, value);
    }
}

function describeErrors(errors: { path: string; message: string }[]): string {
    if (errors.length === 0) return 'unrecognized structure';
    return errors.map(e => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');
}

class CollectionBuilder {
    private categories = new Map<string, PromptEntry[]>();

    constructor(private readonly origin: string) {}

    requireCategoryName(name: string, context: ErrorContext): void {
        if (name.length === 0) {
            throw new DataFormatError('Category names must be non-empty', 'INVALID_CATEGORY', { path: this.origin, ...context });
        }
    }

    /** Adds a whole category. A name seen before means two sources flatten to it. */
    addAll(category: string, items: unknown[]): void {
        if (this.categories.has(category)) {
            throw new DataFormatError(
                `Category "${category}" is defined more than once`,
                'INVALID_CATEGORY',
                { path: this.origin, category }
            );
        }
        this.ensure(category);
        items.forEach((item, index) => this.add(category, item, index));
    }

    /** `sourceIndex` is the item's position in the input, used for error context. */
    add(category: string, item: unknown, sourceIndex: number): void {
        const entries = this.ensure(category);
        entries.push(toEntry(item, category, entries.length, { path: this.origin, category, index: sourceIndex }));
    }

    build(): PromptCollection {
        const frozen = new Map<string, readonly PromptEntry[]>();
        for (const [name, entries] of this.categories) {
            frozen.set(name, Object.freeze(entries));
        }
        return frozen;
    }

    private ensure(category: string): PromptEntry[] {
        let entries = this.categories.get(category);
        if (!entries) {
            entries = [];
            this.categories.set(category, entries);
        }
        return entries;
    }
}

function toEntry(item: unknown, category: string, position: number, context: ErrorContext): PromptEntry {
    if (typeof item === 'string') {
        return Object.freeze({ text: item, category, index: position, metadata: Object.freeze({}) });
    }

    const result = validator.validate(item, 'entry_object');
    if (!result.valid || !isRecord(item)) {
        throw new DataFormatError(
            `Entry ${context.index} in category "${category}" has no text: ${describeErrors(result.errors)}`,
            'INVALID_ENTRY',
            context
        );
    }

    let textKey = '';
    let text = '';
    for (const key of TEXT_KEYS) {
        const value = item[key];
        if (typeof value === 'string') {
            textKey = key;
            text = value;
            break;
        }
    }

    const metadata: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(item)) {
        if (key !== textKey && key !== 'category') metadata[key] = value;
    }

    const source = typeof item.source === 'string'
        ? item.source
        : typeof item.sourceId === 'string' ? item.sourceId : undefined;

    return Object.freeze({
        text,
        category,
        index: position,
        ...(source !== undefined ? { source } : {}),
        metadata: Object.freeze(metadata),
    });
}
