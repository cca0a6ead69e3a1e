import { DescribeError, NotFoundError, ReconciliationFailure } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { EVENT_NAMES, type DecisionStatus, type RemoteObjectStore, type Side } from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import type { FolderIndexCache } from './FolderIndexCache.js';
import type { RetryingTransport } from './RetryingTransport.js';

/** Everything needed to bring one side's pointer object in line with its new status. */
export interface ReconcileRequest {
    side: Side;
    filename: string; // source asset filename; pointers carry the same name
    previousStatus: DecisionStatus | null; // last saved status for this annotator, null if never saved
    newStatus: DecisionStatus;
    sourceObjectId: string | undefined; // resolved id of the source asset
    destinationFolderId: string;
    knownPointerId: string | undefined; // copied_id cached in the last saved record
}

/**
 * Keeps at most one live pointer per (pair, side) no matter how often a decision flips, including
 * re-runs after a crash between pointer update and log append.
 *
 * - accepted -> not accepted: delete the pointer.
 * - -> accepted: delete any stale pointer first, then create a fresh one.
 * - unchanged status: no store mutation.
 *
 * Deleting an object that is already gone counts as success.
 */
export class DecisionReconciler {
    private _store: RemoteObjectStore;
    private _transport: RetryingTransport;
    private _folderIndex: FolderIndexCache;
    private _events?: MainEventBus;

    constructor(store: RemoteObjectStore, transport: RetryingTransport, folderIndex: FolderIndexCache, events?: MainEventBus) {
        this._store = store;
        this._transport = transport;
        this._folderIndex = folderIndex;
        this._events = events;
    }

    /**
     * Applies the pointer policy for one side.
     * @returns Promise<string | undefined> - Id of the live pointer after reconciliation, if any
     * @throws ReconciliationFailure when a store call fails after retries
     */
    public async Reconcile(request: ReconcileRequest): Promise<string | undefined> {
        if (request.newStatus === request.previousStatus) {
            return request.knownPointerId;
        }

        try {
            if (request.newStatus !== `accepted`) {
                if (request.previousStatus === `accepted`) {
                    await this.__deletePointer(request);
                }
                return undefined;
            }

            await this.__deletePointer(request);

            if (!request.sourceObjectId) {
                log.warning(
                    `Source asset '${request.filename}' not found; no pointer created`,
                    `DecisionReconciler`,
                    request.side,
                );
                return undefined;
            }
            return await this.__createPointer(request, request.sourceObjectId);
        } catch(err) {
            throw new ReconciliationFailure(
                `Pointer update failed for ${request.side} '${request.filename}': ${DescribeError(err)}`,
                { side: request.side, filename: request.filename, folderId: request.destinationFolderId },
                err,
            );
        }
    }

    private async __deletePointer(request: ReconcileRequest): Promise<void> {
        const pointerId =
            request.knownPointerId ?? (await this._folderIndex.Resolve(request.destinationFolderId, request.filename));

        if (!pointerId) {
            return;
        }

        try {
            await this._transport.Call(() => this._store.Delete(pointerId), `Delete ${pointerId}`);
        } catch(err) {
            if (!(err instanceof NotFoundError)) {
                throw err;
            }
            log.debug(`Pointer ${pointerId} already absent`, `DecisionReconciler`, request.side);
        }
        this._folderIndex.Record(request.destinationFolderId, request.filename, undefined);
        this._events?.Emit(EVENT_NAMES.pointerDeleted, { side: request.side, pointerId });
    }

    private async __createPointer(request: ReconcileRequest, sourceObjectId: string): Promise<string> {
        const pointerId = await this._transport.Call(
            () => this._store.CreatePointer(sourceObjectId, request.destinationFolderId, request.filename),
            `CreatePointer ${request.filename}`,
        );
        this._folderIndex.Record(request.destinationFolderId, request.filename, pointerId);
        this._events?.Emit(EVENT_NAMES.pointerCreated, {
            side: request.side,
            pointerId,
            folderId: request.destinationFolderId,
            name: request.filename,
        });
        return pointerId;
    }
}
