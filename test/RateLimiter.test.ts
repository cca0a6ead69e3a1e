import { describe, it, expect, beforeEach } from 'vitest';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { RateLimiter } from '../src/Services/RateLimiter.js';
import { ManualClock } from './helpers/ManualClock.js';

describe('RateLimiter', () => {
    let clock: ManualClock;
    let metrics: MetricsService;
    let events: MainEventBus;

    beforeEach(() => {
        clock = new ManualClock();
        metrics = new MetricsService();
        events = new MainEventBus(metrics);
    });

    it('should admit calls without waiting while the window has no span', async () => {
        const limiter = new RateLimiter({ maxQps: 4 }, clock, metrics, events);

        expect(await limiter.Acquire()).toBe(0);
        expect(await limiter.Acquire()).toBe(0);
        expect(await limiter.Acquire()).toBe(0);
        expect(limiter.CurrentQps()).toBe(0);
        expect(clock.sleeps).toEqual([]);
    });

    it('should sleep in proportion to the overshoot', async () => {
        const throttled: { delayMs: number; qps: number }[] = [];
        events.On('store.throttled', payload => throttled.push(payload));
        const limiter = new RateLimiter({ maxQps: 4, windowSize: 10, maxDelayMs: 250, scaleMs: 120 }, clock, metrics, events);

        await limiter.Acquire();
        clock.Advance(100);
        const delay = await limiter.Acquire();

        // 10 qps against a ceiling of 4: (10 / 4 - 1) * 120
        expect(delay).toBe(180);
        expect(clock.sleeps).toEqual([180]);
        expect(throttled).toEqual([{ delayMs: 180, qps: 10 }]);
        expect(metrics.Snapshot().remoteCalls).toBe(2);
        expect(metrics.Snapshot().rateLimitDelays).toBe(1);
    });

    it('should cap a single delay', async () => {
        const limiter = new RateLimiter({ maxQps: 4, maxDelayMs: 250, scaleMs: 120 }, clock, metrics);

        await limiter.Acquire();
        clock.Advance(10);

        expect(await limiter.Acquire()).toBe(250);
    });

    it('should only consider the most recent calls', async () => {
        const narrow = new RateLimiter({ maxQps: 4, windowSize: 2, maxDelayMs: 250 }, clock, metrics);
        const wide = new RateLimiter({ maxQps: 4, windowSize: 3, maxDelayMs: 250 }, clock, metrics);

        await narrow.Acquire();
        await wide.Acquire();
        clock.Advance(1000);
        expect(await narrow.Acquire()).toBe(0);
        expect(await wide.Acquire()).toBe(0);
        clock.Advance(1);

        const wideDelay = await wide.Acquire();
        const narrowDelay = await narrow.Acquire();

        expect(wideDelay).toBe(0);
        expect(narrowDelay).toBe(250);
    });
});
