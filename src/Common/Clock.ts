/**
 * Time source shared by components that wait (rate limiter, retry backoff, append backoff).
 * Tests substitute a manual clock so backoff schedules run instantly.
 */
export interface Clock {
    /** Current epoch time in milliseconds. */
    Now(): number;
    /** Resolves after the given number of milliseconds. */
    Sleep(ms: number): Promise<void>;
}

/** Clock backed by Date.now and setTimeout. */
export class SystemClock implements Clock {
    public Now(): number {
        return Date.now();
    }

    public Sleep(ms: number): Promise<void> {
        if (ms <= 0) {
            return Promise.resolve();
        }
        return new Promise(resolve => {
            setTimeout(resolve, ms);
        });
    }
}

export const systemClock = new SystemClock();
