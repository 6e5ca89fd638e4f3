import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { analyze, charLength, preview } from '../src/analyzer';
import { parseCollection } from '../src/prompt_loader';

const SCENARIO = '{"greeting": ["hello world"], "farewell": ["goodbye world"]}';

describe('analyze', () => {
    test('reports counts and lengths for the two-category scenario', () => {
        const report = analyze(parseCollection(SCENARIO));
        assert.equal(report.totalEntries, 2);
        assert.equal(report.categoryCount, 2);
        assert.deepEqual(Array.from(report.categories), [['greeting', 1], ['farewell', 1]]);
        assert.deepEqual(report.length, { min: 11, max: 13, mean: 12 });
        assert.equal(report.longestPreview, 'goodbye world');
        assert.equal(report.shortestPreview, 'hello world');
    });

    test('empty collection reports zeros, not NaN', () => {
        const report = analyze(parseCollection('{}'));
        assert.equal(report.totalEntries, 0);
        assert.equal(report.categoryCount, 0);
        assert.equal(report.categories.size, 0);
        assert.deepEqual(report.length, { min: 0, max: 0, mean: 0 });
        assert.equal(report.longestPreview, '');
        assert.equal(report.shortestPreview, '');
    });

    test('categories without entries count toward categoryCount only', () => {
        const report = analyze(parseCollection('{"a": [], "b": []}'));
        assert.equal(report.categoryCount, 2);
        assert.equal(report.totalEntries, 0);
        assert.deepEqual(report.length, { min: 0, max: 0, mean: 0 });
    });

    test('totalEntries equals the sum of category sizes', () => {
        const collection = parseCollection('{"a": ["1", "22", "333"], "b": ["4444"], "c": [], "d": ["x", "y"]}');
        const report = analyze(collection);
        let sum = 0;
        for (const entries of collection.values()) sum += entries.length;
        assert.equal(report.totalEntries, sum);
        assert.equal(report.totalEntries, 6);
        assert.equal(report.categoryCount, collection.size);
        assert.deepEqual(Array.from(report.categories), [['a', 3], ['b', 1], ['c', 0], ['d', 2]]);
    });

    test('mean is computed over all entries', () => {
        const report = analyze(parseCollection('{"a": ["ab", "abcd"], "b": ["abcdef"]}'));
        assert.deepEqual(report.length, { min: 2, max: 6, mean: 4 });
    });

    test('empty text contributes a zero length', () => {
        const report = analyze(parseCollection('{"a": ["", "abc"]}'));
        assert.deepEqual(report.length, { min: 0, max: 3, mean: 1.5 });
        assert.equal(report.shortestPreview, '');
    });

    test('ties resolve to the first entry in collection order', () => {
        const report = analyze(parseCollection('{"a": ["xx"], "b": ["yy"]}'));
        assert.equal(report.longestPreview, 'xx');
        assert.equal(report.shortestPreview, 'xx');
    });

    test('long texts are truncated in previews', () => {
        const long = 'a'.repeat(250);
        const report = analyze(parseCollection(JSON.stringify({ a: [long] })));
        assert.equal(report.longestPreview, 'a'.repeat(200) + '...');
        assert.equal(report.length.max, 250);
    });

    test('identical input yields identical reports', () => {
        const collection = parseCollection('{"a": ["one", "three"], "b": ["seven"]}');
        assert.deepEqual(analyze(collection), analyze(collection));
    });
});

describe('charLength / preview', () => {
    test('counts code points rather than UTF-16 units', () => {
        assert.equal(charLength('\u{1F600}'), 1);
        assert.equal(charLength('héllo'), 5);
    });

    test('preview leaves short text untouched', () => {
        assert.equal(preview('short', 10), 'short');
        assert.equal(preview('exactly10!', 10), 'exactly10!');
    });

    test('preview cuts on code points', () => {
        assert.equal(preview('\u{1F600}\u{1F600}\u{1F600}', 2), '\u{1F600}\u{1F600}...');
    });
});
