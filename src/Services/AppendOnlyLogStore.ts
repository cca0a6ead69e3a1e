import type { Clock } from '../Common/Clock.js';
import { systemClock } from '../Common/Clock.js';
import { AppendFailure, DescribeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { EVENT_NAMES, type RemoteObjectStore } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import { metricsService, type MetricsService } from './MetricsService.js';
import type { RetryingTransport } from './RetryingTransport.js';

export interface AppendOptions {
    retries: number; // full read-modify-write cycles before the cached-content fallback
    linearBackoffMs: number; // wait after cycle n is linearBackoffMs * n
}

export const DEFAULT_APPEND_OPTIONS: AppendOptions = {
    retries: 3,
    linearBackoffMs: 400,
};

/**
 * Treats one remote text object as a log of newline-delimited records. The store has no append, so
 * Append downloads the full content, concatenates and uploads it again.
 *
 * Concurrent writers to the same object can lose an update in that window; within a session the
 * annotator is the only writer of their own rows, and rows of different annotators never conflict.
 *
 * Every successful read or write refreshes an in-process copy of the content. A failed read serves
 * that copy, and an append whose cycles all failed writes against it rather than dropping the record.
 */
export class AppendOnlyLogStore {
    private _store: RemoteObjectStore;
    private _transport: RetryingTransport;
    private _options: AppendOptions;
    private _clock: Clock;
    private _metrics: MetricsService;
    private _events?: MainEventBus;
    private _lastGood: Map<string, string> = new Map(); // file id -> last content read or written

    constructor(
        store: RemoteObjectStore,
        transport: RetryingTransport,
        options: Partial<AppendOptions> = {},
        clock: Clock = systemClock,
        metrics: MetricsService = metricsService,
        events?: MainEventBus,
    ) {
        this._store = store;
        this._transport = transport;
        this._options = { ...DEFAULT_APPEND_OPTIONS, ...options };
        this._clock = clock;
        this._metrics = metrics;
        this._events = events;
    }

    /**
     * Reads the full text of a log object.
     * @throws the last store error when the read fails and nothing is cached for the file
     */
    public async ReadText(fileId: string): Promise<string> {
        try {
            const text = await this._transport.Call(() => this._store.GetText(fileId), `GetText ${fileId}`);
            this._lastGood.set(fileId, text);
            return text;
        } catch(err) {
            const cached = this._lastGood.get(fileId);

            if (cached !== undefined) {
                log.warning(`Read failed, serving last good content: ${DescribeError(err)}`, `AppendOnlyLogStore`, fileId);
                return cached;
            }
            throw err;
        }
    }

    /**
     * Reads a log object as ordered raw lines; blank lines are dropped.
     * @example
     * const rows = await logs.Read(cfg.logs.hypothesis);
     */
    public async Read(fileId: string): Promise<string[]> {
        const text = await this.ReadText(fileId);
        return SplitLines(text);
    }

    /** Replaces the full content of a text object (used for small scalar files). */
    public async Write(fileId: string, text: string): Promise<void> {
        await this._transport.Call(() => this._store.PutText(fileId, text), `PutText ${fileId}`);
        this._lastGood.set(fileId, text);
    }

    /**
     * Appends records with a read-modify-write cycle, retried with linear backoff. When every cycle
     * fails, one last write goes out against the cached content.
     * @param newLines string[] - Serialized records; a trailing newline is added where missing
     * @throws AppendFailure when the fallback write fails too
     */
    public async Append(fileId: string, newLines: string[]): Promise<void> {
        const suffix = newLines.map(line => (line.endsWith(`\n`) ? line : `${line}\n`)).join(``);
        let lastError: unknown;

        for (let attempt = 0; attempt < this._options.retries; attempt++) {
            try {
                const previous = await this.ReadText(fileId);
                await this.Write(fileId, JoinContent(previous, suffix));
                return;
            } catch(err) {
                lastError = err;
                log.warning(
                    `Append cycle ${attempt + 1}/${this._options.retries} failed: ${DescribeError(err)}`,
                    `AppendOnlyLogStore`,
                    fileId,
                );
                await this._clock.Sleep(this._options.linearBackoffMs * (attempt + 1));
            }
        }

        const cached = this._lastGood.get(fileId) ?? ``;
        const reason = lastError === undefined ? `no append cycle ran` : DescribeError(lastError);
        this._metrics.IncAppendFallback();
        this._events?.Emit(EVENT_NAMES.logAppendFallback, { fileId, message: reason });
        log.warning(`Writing against cached content after failed cycles: ${reason}`, `AppendOnlyLogStore`, fileId);

        try {
            await this.Write(fileId, JoinContent(cached, suffix));
        } catch(err) {
            throw new AppendFailure(`Failed to append to log ${fileId}: ${DescribeError(err)}`, { fileId }, err);
        }
    }

    /** Drops the cached content of one file or of all files. */
    public Forget(fileId?: string): void {
        if (fileId === undefined) {
            this._lastGood.clear();
            return;
        }
        this._lastGood.delete(fileId);
    }
}

/** Non-blank lines of a text blob, trimmed of surrounding whitespace. */
export function SplitLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

function JoinContent(previous: string, suffix: string): string {
    if (previous.length === 0 || previous.endsWith(`\n`)) {
        return previous + suffix;
    }
    return `${previous}\n${suffix}`;
}
