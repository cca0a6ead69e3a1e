import { DescribeError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import {
    CanonicalAnnotator,
    EVENT_NAMES,
    PairKeyOf,
    type MetadataRecord,
    type RemoteObjectStore,
} from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import type { AppendOnlyLogStore } from './AppendOnlyLogStore.js';
import type { RetryingTransport } from './RetryingTransport.js';

/**
 * Index of the first pair not in the completed set, in feed order. When every pair is complete the
 * last valid index is returned so there is always something to display.
 * @example
 * FirstUndecided(meta, new Set()); // 0
 */
export function FirstUndecided(metadata: MetadataRecord[], completed: ReadonlySet<string>): number {
    const index = metadata.findIndex(record => !completed.has(PairKeyOf(record)));
    return index >= 0 ? index : Math.max(0, metadata.length - 1);
}

/** A hint may only push the start forward past genuinely completed work, never back before it. */
export function StartingPosition(hint: number, firstUndecided: number): number {
    return Math.max(hint, firstUndecided);
}

/** Parses a hint file body; anything but a non-negative integer reads as 0. */
export function ParseHint(text: string): number {
    const trimmed = text.trim();
    return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
}

/** Name of the hint object for a (category, annotator). */
export function HintFileName(category: string, annotator: string): string {
    return `progress_${category}_${CanonicalAnnotator(annotator)}.txt`;
}

/**
 * Persists the advisory "last visited position" per (category, annotator) as a small text object
 * in the category's progress folder. The hint never overrides the log-derived completion index;
 * read failures count as 0 and write failures are reported, not thrown.
 */
export class ProgressTracker {
    private _store: RemoteObjectStore;
    private _transport: RetryingTransport;
    private _texts: AppendOnlyLogStore;
    private _folders: Record<string, string>; // category -> progress folder id
    private _events?: MainEventBus;
    private _fileIds: Map<string, string> = new Map(); // hint file name -> object id

    constructor(
        store: RemoteObjectStore,
        transport: RetryingTransport,
        texts: AppendOnlyLogStore,
        folders: Record<string, string>,
        events?: MainEventBus,
    ) {
        this._store = store;
        this._transport = transport;
        this._texts = texts;
        this._folders = folders;
        this._events = events;
    }

    /**
     * Loads the stored hint.
     * @returns Promise<number> - Stored position, 0 when absent, unparsable or unreadable
     */
    public async LoadHint(category: string, annotator: string): Promise<number> {
        try {
            const fileId = await this.__hintFileId(category, annotator);
            return ParseHint(await this._texts.ReadText(fileId));
        } catch(err) {
            log.warning(`Hint unavailable, starting from 0: ${DescribeError(err)}`, `ProgressTracker`, category);
            return 0;
        }
    }

    /**
     * Stores the hint.
     * @returns Promise<boolean> - false when the write failed (the hint is advisory)
     */
    public async SaveHint(category: string, annotator: string, position: number): Promise<boolean> {
        const value = Math.max(0, Math.floor(position));

        try {
            const fileId = await this.__hintFileId(category, annotator);
            await this._texts.Write(fileId, String(value));
            this._events?.Emit(EVENT_NAMES.progressSaved, {
                category,
                annotator: CanonicalAnnotator(annotator),
                position: value,
            });
            return true;
        } catch(err) {
            log.warning(`Failed to save hint ${value}: ${DescribeError(err)}`, `ProgressTracker`, category);
            return false;
        }
    }

    /** Finds the hint object by name, creating it with content `0` when missing. */
    private async __hintFileId(category: string, annotator: string): Promise<string> {
        const name = HintFileName(category, annotator);
        const known = this._fileIds.get(name);

        if (known) {
            return known;
        }
        const folderId = this._folders[category];

        if (!folderId) {
            throw new Error(`No progress folder configured for category '${category}'`);
        }
        const page = await this._transport.Call(
            () => this._store.List(folderId, { name, pageSize: 1 }),
            `List ${folderId} ${name}`,
        );
        let fileId = page.objects[0]?.id;

        if (!fileId) {
            fileId = await this._transport.Call(() => this._store.CreateText(folderId, name, `0`), `CreateText ${name}`);
        }
        this._fileIds.set(name, fileId);
        return fileId;
    }
}
