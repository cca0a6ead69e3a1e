import type { Clock } from '../../src/Common/Clock.js';

/** Clock that only moves when told to; Sleep advances it instantly and records the delay. */
export class ManualClock implements Clock {
    public now: number;
    public sleeps: number[] = [];

    constructor(start = 1_700_000_000_000) {
        this.now = start;
    }

    Now(): number {
        return this.now;
    }

    async Sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.now += ms;
    }

    Advance(ms: number): void {
        this.now += ms;
    }
}
