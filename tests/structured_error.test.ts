import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import {
    DataFormatError,
    FileAccessError,
    InvalidArgumentError,
    exitCodeFor,
    fileErrorFromErrno,
    formatStructuredError,
    toStructuredError,
} from '../src/structured_error';

function errnoError(code: string, message: string): Error {
    return Object.assign(new Error(message), { code });
}

describe('exitCodeFor', () => {
    test('maps each error kind to its own code', () => {
        assert.equal(exitCodeFor(new InvalidArgumentError('x', 'UNKNOWN_COMMAND')), 2);
        assert.equal(exitCodeFor(new FileAccessError('x', 'FILE_NOT_FOUND')), 3);
        assert.equal(exitCodeFor(new DataFormatError('x', 'INVALID_JSON')), 4);
        assert.equal(exitCodeFor(new Error('boom')), 1);
        assert.equal(exitCodeFor('a string'), 1);
    });
});

describe('toStructuredError', () => {
    test('carries code, kind and context', () => {
        const se = toStructuredError(new DataFormatError('Entry 2 has no text', 'INVALID_ENTRY', { category: 'a', index: 2 }));
        assert.equal(se.code, 'INVALID_ENTRY');
        assert.equal(se.kind, 'data_format');
        assert.equal(se.severity, 'FATAL');
        assert.deepEqual(se.context, { category: 'a', index: 2 });
        assert.equal(se.hint, 'Each entry needs a "text", "content" or "prompt" string.');
    });

    test('wraps unknown errors as UNEXPECTED', () => {
        const se = toStructuredError(new TypeError('bad'));
        assert.equal(se.code, 'UNEXPECTED');
        assert.equal(se.kind, 'unexpected');
        assert.equal(se.message, 'bad');
        assert.deepEqual(se.context, {});
    });

    test('keeps the original cause', () => {
        const cause = new Error('root');
        const err = new FileAccessError('outer', 'FILE_UNREADABLE', {}, cause);
        assert.equal(err.cause, cause);
        assert.equal(err.name, 'FileAccessError');
        assert.ok(err instanceof Error);
    });
});

describe('formatStructuredError', () => {
    test('prints headline, context lines and hint', () => {
        const se = toStructuredError(new FileAccessError('Input file not found: in.json', 'FILE_NOT_FOUND', { path: 'in.json', errno: undefined }));
        assert.equal(
            formatStructuredError(se),
            'Error [FILE_NOT_FOUND]: Input file not found: in.json\n  path: in.json\n  hint: Check the input path.'
        );
    });

    test('omits the hint when none is defined', () => {
        const se = toStructuredError(new InvalidArgumentError('Option -o requires a value', 'MISSING_ARGUMENT', { option: '-o' }));
        assert.equal(formatStructuredError(se), 'Error [MISSING_ARGUMENT]: Option -o requires a value\n  option: -o');
    });
});

describe('fileErrorFromErrno', () => {
    test('read ENOENT is FILE_NOT_FOUND', () => {
        const err = fileErrorFromErrno(errnoError('ENOENT', 'no such file'), 'in.json', 'read');
        assert.equal(err.code, 'FILE_NOT_FOUND');
        assert.equal(err.message, 'Input file not found: in.json');
    });

    test('other read failures are FILE_UNREADABLE with errno', () => {
        const err = fileErrorFromErrno(errnoError('EACCES', 'permission denied'), 'in.json', 'read');
        assert.equal(err.code, 'FILE_UNREADABLE');
        assert.deepEqual(err.context, { path: 'in.json', errno: 'EACCES' });
    });

    test('write ENOENT is OUTPUT_DIR_MISSING', () => {
        assert.equal(fileErrorFromErrno(errnoError('ENOENT', 'x'), 'out/a.md', 'write').code, 'OUTPUT_DIR_MISSING');
    });

    test('other write failures are FILE_UNWRITABLE', () => {
        const err = fileErrorFromErrno(errnoError('EROFS', 'read-only file system'), 'a.md', 'write');
        assert.equal(err.code, 'FILE_UNWRITABLE');
        assert.equal(err.message, 'Cannot write a.md: read-only file system');
    });
});
