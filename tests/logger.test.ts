import { afterEach, describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { beginRun, clearCorrelation, configureLogger, createLogger, currentRunId, resetLogger } from '../src/logger';

function capture(): string[] {
    const lines: string[] = [];
    configureLogger({ write: (line) => { lines.push(line); } });
    return lines;
}

describe('logger', () => {
    afterEach(() => resetLogger());

    test('filters below the configured level', () => {
        const lines = capture();
        configureLogger({ level: 'warn' });
        const log = createLogger('loader');
        log.info('hidden');
        log.warn('shown');
        assert.equal(lines.length, 1);
        assert.match(lines[0], /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN \] \[loader\] shown$/);
    });

    test('text lines append data as JSON', () => {
        const lines = capture();
        configureLogger({ level: 'debug' });
        createLogger('search').debug('done', { matches: 2 });
        assert.match(lines[0], /\[DEBUG\] \[search\] done \{"matches":2\}$/);
    });

    test('child loggers extend the component name', () => {
        const lines = capture();
        configureLogger({ level: 'info' });
        createLogger('cli').child('extract').info('writing');
        assert.match(lines[0], /\[cli:extract\] writing$/);
    });

    test('json mode emits one object per line with the run id', () => {
        const lines = capture();
        configureLogger({ level: 'info', json: true });
        const runId = beginRun('analyze');
        createLogger('cli').error('failed', { code: 'INVALID_JSON' });

        const entry: unknown = JSON.parse(lines[0]);
        assert.ok(typeof entry === 'object' && entry !== null);
        assert.deepEqual({ ...entry, ts: 'fixed' }, {
            ts: 'fixed',
            level: 'error',
            component: 'cli',
            msg: 'failed',
            run_id: runId,
            command: 'analyze',
            data: { code: 'INVALID_JSON' },
        });
    });

    test('each run gets a fresh uuid', () => {
        const first = beginRun('search');
        const second = beginRun('search');
        assert.match(first, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        assert.notEqual(first, second);
        clearCorrelation();
        assert.equal(currentRunId(), '');
    });
});
