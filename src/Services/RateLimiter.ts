import type { Clock } from '../Common/Clock.js';
import { systemClock } from '../Common/Clock.js';
import { log } from '../Common/Log.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import { metricsService, type MetricsService } from './MetricsService.js';

export interface RateLimiterOptions {
    maxQps: number; // ceiling on the observed rate
    windowSize: number; // number of recent call timestamps tracked
    maxDelayMs: number; // upper bound of a single throttle sleep
    scaleMs: number; // delay per unit of relative overshoot
}

export const DEFAULT_RATE_LIMITER_OPTIONS: RateLimiterOptions = {
    maxQps: 4,
    windowSize: 10,
    maxDelayMs: 250,
    scaleMs: 120,
};

/**
 * Client-side soft QPS guard. Keeps a sliding window of recent call timestamps and, when the
 * observed rate over that window exceeds the ceiling, sleeps a delay proportional to the overshoot
 * before admitting the call. One session's burst must not trip the store's global limit for others.
 */
export class RateLimiter {
    private _options: RateLimiterOptions;
    private _clock: Clock;
    private _metrics: MetricsService;
    private _events?: MainEventBus;
    private _calls: number[] = []; // epoch ms, oldest first, at most windowSize

    constructor(
        options: Partial<RateLimiterOptions> = {},
        clock: Clock = systemClock,
        metrics: MetricsService = metricsService,
        events?: MainEventBus,
    ) {
        this._options = { ...DEFAULT_RATE_LIMITER_OPTIONS, ...options };
        this._clock = clock;
        this._metrics = metrics;
        this._events = events;
    }

    /**
     * Records a call and waits if the window's rate is above the ceiling.
     * @returns Promise<number> - Milliseconds slept (0 when admitted immediately)
     */
    public async Acquire(): Promise<number> {
        this._calls.push(this._clock.Now());

        if (this._calls.length > this._options.windowSize) {
            this._calls.shift();
        }
        this._metrics.IncRemoteCall();
        const delayMs = this.__delayFor();

        if (delayMs > 0) {
            const qps = this.CurrentQps();
            this._metrics.IncRateLimitDelay();
            this._events?.Emit(EVENT_NAMES.storeThrottled, { delayMs, qps });
            log.debug(`Throttling ${delayMs}ms at ${qps.toFixed(2)} qps`, `RateLimiter`);
            await this._clock.Sleep(delayMs);
        }
        return delayMs;
    }

    /** Rate observed across the tracked window; 0 with fewer than two calls or a zero-length span. */
    public CurrentQps(): number {
        if (this._calls.length < 2) {
            return 0;
        }
        const span = (this._calls[this._calls.length - 1] - this._calls[0]) / 1000;

        if (span <= 0) {
            return 0;
        }
        return (this._calls.length - 1) / span;
    }

    private __delayFor(): number {
        const qps = this.CurrentQps();

        if (qps <= this._options.maxQps) {
            return 0;
        }
        const overshoot = qps / this._options.maxQps - 1;
        return Math.min(this._options.maxDelayMs, Math.round(overshoot * this._options.scaleMs));
    }
}
