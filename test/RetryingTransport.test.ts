import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, PermanentError, TransientError } from '../src/Common/Errors.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { RateLimiter } from '../src/Services/RateLimiter.js';
import { BackoffDelay, DEFAULT_RETRY_OPTIONS, IsTransientError, RetryingTransport } from '../src/Services/RetryingTransport.js';
import { ManualClock } from './helpers/ManualClock.js';

/** Operation failing with the given errors in order, then resolving to 'ok'. */
function Scripted(errors: unknown[]) {
    const state = { calls: 0 };
    const op = async (): Promise<string> => {
        const error = errors[state.calls];
        state.calls++;

        if (error !== undefined) {
            throw error;
        }
        return `ok`;
    };
    return { op, state };
}

describe('RetryingTransport', () => {
    let clock: ManualClock;
    let metrics: MetricsService;
    let events: MainEventBus;
    let transport: RetryingTransport;

    beforeEach(() => {
        clock = new ManualClock();
        metrics = new MetricsService();
        events = new MainEventBus(metrics);
        const limiter = new RateLimiter({ maxQps: 1_000_000 }, clock, metrics);
        transport = new RetryingTransport(limiter, DEFAULT_RETRY_OPTIONS, clock, metrics, events);
    });

    it('should retry transient failures with exponential backoff', async () => {
        const retries: { attempt: number; delayMs: number }[] = [];
        events.On('store.retry', payload => retries.push({ attempt: payload.attempt, delayMs: payload.delayMs }));
        const { op, state } = Scripted([new TransientError('rate limited', undefined, undefined, 429), new TransientError('timeout')]);

        const result = await transport.Call(op, 'GetText log-h');

        expect(result).toBe('ok');
        expect(state.calls).toBe(3);
        expect(clock.sleeps).toEqual([1500, 3000]);
        expect(retries).toEqual([
            { attempt: 1, delayMs: 1500 },
            { attempt: 2, delayMs: 3000 },
        ]);
        expect(metrics.Snapshot().retries).toBe(2);
    });

    it('should rethrow the last error once attempts run out', async () => {
        const limiter = new RateLimiter({ maxQps: 1_000_000 }, clock, metrics);
        const short = new RetryingTransport(limiter, { attempts: 4, baseDelayMs: 1500, maxDelayMs: 6000 }, clock, metrics);
        const errors = [1, 2, 3, 4].map(n => new TransientError(`fail ${n}`));
        const { op, state } = Scripted(errors);

        await expect(short.Call(op, 'List folder')).rejects.toBe(errors[3]);
        expect(state.calls).toBe(4);
        expect(clock.sleeps).toEqual([1500, 3000, 6000]);
    });

    it('should surface permanent failures immediately', async () => {
        const denied = new PermanentError('forbidden', undefined, undefined, 403);
        const { op, state } = Scripted([denied]);

        await expect(transport.Call(op, 'PutText log-h')).rejects.toBe(denied);
        expect(state.calls).toBe(1);
        expect(clock.sleeps).toEqual([]);
    });

    it('should retry socket errors recognized by code', async () => {
        const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        const { op, state } = Scripted([reset]);

        expect(await transport.Call(op, 'Stat feed')).toBe('ok');
        expect(state.calls).toBe(2);
    });

    describe('IsTransientError', () => {
        it('should classify store statuses', () => {
            expect(IsTransientError({ status: 503 })).toBe(true);
            expect(IsTransientError({ statusCode: 429 })).toBe(true);
            expect(IsTransientError({ status: 408 })).toBe(true);
            expect(IsTransientError({ status: 404 })).toBe(false);
        });

        it('should classify connection and TLS codes', () => {
            expect(IsTransientError(Object.assign(new Error('x'), { code: 'ETIMEDOUT' }))).toBe(true);
            expect(IsTransientError(Object.assign(new Error('x'), { code: 'ERR_TLS_CERT_ALTNAME_INVALID' }))).toBe(true);
            expect(IsTransientError(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe(false);
        });

        it('should follow the cause chain', () => {
            const inner = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });

            expect(IsTransientError(new Error('request failed', { cause: inner }))).toBe(true);
            expect(IsTransientError(new Error('request failed', { cause: new Error('bad input') }))).toBe(false);
        });

        it('should never retry the permanent kinds', () => {
            expect(IsTransientError(new NotFoundError('gone'))).toBe(false);
            expect(IsTransientError(new PermanentError('denied', undefined, undefined, 503))).toBe(false);
            expect(IsTransientError(new Error('plain'))).toBe(false);
        });
    });

    it('should cap the backoff', () => {
        const options = { attempts: 6, baseDelayMs: 1500, maxDelayMs: 6000 };

        expect([0, 1, 2, 3, 4].map(attempt => BackoffDelay(attempt, options))).toEqual([1500, 3000, 6000, 6000, 6000]);
    });
});
