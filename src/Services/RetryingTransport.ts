import type { Clock } from '../Common/Clock.js';
import { systemClock } from '../Common/Clock.js';
import { DescribeError, PermanentError, TransientError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import { metricsService, type MetricsService } from './MetricsService.js';
import type { RateLimiter } from './RateLimiter.js';

export interface RetryOptions {
    attempts: number; // total tries, first one included
    baseDelayMs: number; // delay after the first failure, doubled each time
    maxDelayMs: number; // ceiling of a single backoff
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    attempts: 6,
    baseDelayMs: 1500,
    maxDelayMs: 6000,
};

/** Socket-level failures raised by Node's net/http/undici stacks. */
const TRANSIENT_ERROR_CODES = new Set([
    `ECONNRESET`,
    `ECONNREFUSED`,
    `ECONNABORTED`,
    `ETIMEDOUT`,
    `EPIPE`,
    `EAI_AGAIN`,
    `ENOTFOUND`,
    `EHOSTUNREACH`,
    `ENETUNREACH`,
    `EPROTO`,
]);

/** Prefixes of TLS handshake and undici socket error codes. */
const TRANSIENT_CODE_PREFIXES = [`ERR_TLS_`, `ERR_SSL_`, `UND_ERR_`];

/** Client-side statuses worth another try; every 5xx is retried as well. */
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

function ReadStringProp(value: unknown, key: string): string | undefined {
    if (typeof value === `object` && value !== null && key in value) {
        const prop: unknown = Reflect.get(value, key);
        return typeof prop === `string` ? prop : undefined;
    }
    return undefined;
}

function ReadStatus(value: unknown): number | undefined {
    if (typeof value !== `object` || value === null) {
        return undefined;
    }
    for (const key of [`status`, `statusCode`]) {
        const prop: unknown = Reflect.get(value, key);

        if (typeof prop === `number`) {
            return prop;
        }
    }
    return undefined;
}

/**
 * Decides whether a failure belongs to the closed set of retryable kinds:
 * TransientError, retryable store statuses, transport errors and TLS/connection errors.
 * The `cause` chain is followed so wrapped socket errors are recognized.
 * @example
 * IsTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' })); // true
 */
export function IsTransientError(err: unknown, depth = 0): boolean {
    if (err instanceof TransientError) {
        return true;
    }
    if (err instanceof PermanentError) {
        return false;
    }
    const code = ReadStringProp(err, `code`);

    if (code && (TRANSIENT_ERROR_CODES.has(code) || TRANSIENT_CODE_PREFIXES.some(p => code.startsWith(p)))) {
        return true;
    }
    const status = ReadStatus(err);

    if (status !== undefined) {
        return TRANSIENT_STATUSES.has(status) || (status >= 500 && status < 600);
    }
    if (depth < 3 && err instanceof Error && err.cause !== undefined) {
        return IsTransientError(err.cause, depth + 1);
    }
    return false;
}

/** Backoff before retry number `attempt` (0-based): base * 2^attempt, capped. */
export function BackoffDelay(attempt: number, options: RetryOptions): number {
    return Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
}

/**
 * Wraps every remote call: passes it through the RateLimiter, then retries transient failures with
 * bounded exponential backoff. After the last attempt the last error is rethrown unmodified; callers
 * treat that as terminal for the call, not for the session.
 */
export class RetryingTransport {
    private _limiter: RateLimiter;
    private _options: RetryOptions;
    private _clock: Clock;
    private _metrics: MetricsService;
    private _events?: MainEventBus;

    constructor(
        limiter: RateLimiter,
        options: Partial<RetryOptions> = {},
        clock: Clock = systemClock,
        metrics: MetricsService = metricsService,
        events?: MainEventBus,
    ) {
        this._limiter = limiter;
        this._options = { ...DEFAULT_RETRY_OPTIONS, ...options };
        this._clock = clock;
        this._metrics = metrics;
        this._events = events;
    }

    /**
     * Executes a zero-argument remote operation.
     * @param op () => Promise<T> - The remote call
     * @param label string - Short description used in logs (e.g. 'GetText log-h')
     * @example
     * const text = await transport.Call(() => store.GetText(id), `GetText ${id}`);
     */
    public async Call<T>(op: () => Promise<T>, label: string): Promise<T> {
        let lastError: unknown = new TransientError(`No attempt made for ${label}`);

        for (let attempt = 0; attempt < this._options.attempts; attempt++) {
            await this._limiter.Acquire();

            try {
                return await op();
            } catch(err) {
                if (!IsTransientError(err)) {
                    throw err;
                }
                lastError = err;

                if (attempt + 1 >= this._options.attempts) {
                    break;
                }
                const delayMs = BackoffDelay(attempt, this._options);
                const message = DescribeError(err);
                this._metrics.IncRetry();
                this._events?.Emit(EVENT_NAMES.storeRetry, { label, attempt: attempt + 1, delayMs, message });
                log.warning(
                    `Attempt ${attempt + 1}/${this._options.attempts} failed: ${message}; retrying in ${delayMs}ms`,
                    `RetryingTransport`,
                    label,
                );
                await this._clock.Sleep(delayMs);
            }
        }
        log.error(`Giving up after ${this._options.attempts} attempts`, `RetryingTransport`, label);
        throw lastError;
    }
}
