import { describe, it, expect, beforeEach } from 'vitest';
import { AppendFailure, NotFoundError, PermanentError, TransientError } from '../src/Common/Errors.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { AppendOnlyLogStore, SplitLines } from '../src/Services/AppendOnlyLogStore.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { FastTransport } from './helpers/Fixture.js';
import { FlakyObjectStore } from './helpers/FlakyObjectStore.js';
import { ManualClock } from './helpers/ManualClock.js';

describe('AppendOnlyLogStore', () => {
    let store: FlakyObjectStore;
    let clock: ManualClock;
    let metrics: MetricsService;
    let events: MainEventBus;
    let logs: AppendOnlyLogStore;

    beforeEach(() => {
        store = new FlakyObjectStore({
            objects: [{ id: 'log', name: 'log.jsonl', folderId: 'logs', kind: 'text', content: 'r1\n' }],
        });
        clock = new ManualClock();
        metrics = new MetricsService();
        events = new MainEventBus(metrics);
        logs = new AppendOnlyLogStore(store, FastTransport(clock, metrics, events), {}, clock, metrics, events);
    });

    describe('Append', () => {
        it('should add lines after the existing content', async () => {
            await logs.Append('log', ['r2']);
            await logs.Append('log', ['r3\n', 'r4']);

            expect(await store.inner.GetText('log')).toBe('r1\nr2\nr3\nr4\n');
        });

        it('should start a new line when the content lacks a trailing newline', async () => {
            await store.inner.PutText('log', 'x');

            await logs.Append('log', ['y']);

            expect(await store.inner.GetText('log')).toBe('x\ny\n');
        });

        it('should retry whole cycles with linear backoff', async () => {
            store.Fail('PutText', new PermanentError('conflict'), 2, 'log');

            await logs.Append('log', ['r2']);

            expect(await store.inner.GetText('log')).toBe('r1\nr2\n');
            expect(clock.sleeps).toEqual([400, 800]);
            expect(metrics.Snapshot().appendFallbacks).toBe(0);
        });

        it('should write against cached content when every cycle fails', async () => {
            const fallbacks: string[] = [];
            events.On('log.append.fallback', payload => fallbacks.push(payload.fileId));
            store.Fail('PutText', new PermanentError('conflict'), 3, 'log');

            await logs.Append('log', ['r2']);

            expect(await store.inner.GetText('log')).toBe('r1\nr2\n');
            expect(clock.sleeps).toEqual([400, 800, 1200]);
            expect(metrics.Snapshot().appendFallbacks).toBe(1);
            expect(fallbacks).toEqual(['log']);
        });

        it('should raise AppendFailure when the fallback write fails too', async () => {
            store.Fail('PutText', new PermanentError('quota exceeded'), 4, 'log');

            const failure = await logs.Append('log', ['r2']).then(
                () => undefined,
                (err: unknown) => err,
            );

            expect(failure).toBeInstanceOf(AppendFailure);
            expect(failure instanceof AppendFailure && failure.details).toEqual({ fileId: 'log' });
            expect(await store.inner.GetText('log')).toBe('r1\n');
        });
    });

    describe('Read', () => {
        it('should return trimmed non-blank lines', async () => {
            await store.inner.PutText('log', ' a \r\n\n b\n');

            expect(await logs.Read('log')).toEqual(['a', 'b']);
        });

        it('should ride out a transient read through the transport', async () => {
            store.Fail('GetText', new TransientError('timeout'), 1, 'log');

            expect(await logs.Read('log')).toEqual(['r1']);
            expect(clock.sleeps).toEqual([10]);
        });

        it('should serve the last good content when a read fails', async () => {
            await logs.Read('log');
            store.Fail('GetText', new PermanentError('forbidden'), 1, 'log');

            expect(await logs.Read('log')).toEqual(['r1']);
        });

        it('should fail when nothing is cached', async () => {
            await expect(logs.Read('missing')).rejects.toBeInstanceOf(NotFoundError);

            await logs.Read('log');
            logs.Forget('log');
            store.Fail('GetText', new PermanentError('forbidden'), 1, 'log');

            await expect(logs.Read('log')).rejects.toBeInstanceOf(PermanentError);
        });
    });

    it('should replace the whole content on Write', async () => {
        await logs.Write('log', '7');

        expect(await store.inner.GetText('log')).toBe('7');
    });

    it('should split text into trimmed lines', () => {
        expect(SplitLines('x\r\ny\n\n  z  ')).toEqual(['x', 'y', 'z']);
        expect(SplitLines('')).toEqual([]);
    });
});
