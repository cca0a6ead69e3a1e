import { createHash } from 'crypto';
import type { Clock } from '../Common/Clock.js';
import { systemClock } from '../Common/Clock.js';
import {
    AppendFailure,
    AppError,
    AuthenticationError,
    DescribeError,
    IncompleteDecision,
    InternalError,
    PolicyError,
    ReconciliationFailure,
    SaveInProgressError,
    ValidationError,
} from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import {
    AssetNameOf,
    EVENT_NAMES,
    IsDecisionStatus,
    PairKeyOf,
    SIDES,
    type AnnotatorIdentity,
    type CompletionIndex,
    type CredentialVerifier,
    type DecisionRecord,
    type DecisionStatus,
    type MetadataRecord,
    type PairView,
    type PerSide,
    type ProgressSummary,
    type SaveOutcome,
    type SessionContext,
    type Side,
    type StagedDecision,
} from '../Domain/index.js';
import type { MainEventBus } from '../Events/MainEventBus.js';
import type { CategoryConfig } from '../Types/Config.js';
import type { AppendOnlyLogStore } from './AppendOnlyLogStore.js';
import { ApplyAppendedRows, LatestFor, LoadCompletionIndex } from './CompletionIndex.js';
import type { DecisionReconciler } from './DecisionReconciler.js';
import type { FolderIndexCache } from './FolderIndexCache.js';
import type { MetadataCache } from './MetadataCache.js';
import { FirstUndecided, StartingPosition, type ProgressTracker } from './ProgressTracker.js';

export interface SessionControllerDeps {
    categories: Record<string, CategoryConfig>;
    verifier: CredentialVerifier;
    metadata: MetadataCache;
    logs: AppendOnlyLogStore;
    folderIndex: FolderIndexCache;
    reconciler: DecisionReconciler;
    progress: ProgressTracker;
    clock?: Clock;
    events?: MainEventBus;
}

export type NavigateTarget = `prev` | `next` | number;

/** Data of the category the session is positioned in. */
interface CategoryState {
    name: string;
    config: CategoryConfig;
    metadata: MetadataRecord[];
    index: CompletionIndex;
}

/**
 * Fingerprint of one save: the same annotator saving the same statuses for the same pair twice in a
 * row produces the same token.
 * @example
 * ReplayToken('h1.jpg|a1.jpg', 'accepted', 'rejected', 'alice'); // 40 hex chars
 */
export function ReplayToken(pairKey: string, hypothesis: DecisionStatus, adversarial: DecisionStatus, annotator: string): string {
    const payload = JSON.stringify({ pk: pairKey, h: hypothesis, a: adversarial, who: annotator });
    return createHash(`sha1`).update(payload, `utf8`).digest(`hex`);
}

/** Builds the log line for one side of a pair. Metadata fields come first, decision fields after. */
export function BuildDecisionRecord(
    pair: MetadataRecord,
    annotator: AnnotatorIdentity,
    side: Side,
    status: DecisionStatus,
    decidedAt: number,
    pointerId: string | undefined,
): DecisionRecord {
    return {
        ...pair,
        pair_key: PairKeyOf(pair),
        annotator: annotator.displayName,
        canonical_annotator: annotator.canonical,
        side,
        status,
        decided_at: decidedAt,
        ...(pointerId ? { copied_id: pointerId } : {}),
    };
}

function SavedStatus(index: CompletionIndex, side: Side, pairKey: string): DecisionStatus | null {
    const status = LatestFor(index, side, pairKey)?.status;
    return IsDecisionStatus(status) ? status : null;
}

/**
 * One annotator's working session. Commands are discrete calls; every save walks
 * Idle -> Validating -> Reconciling -> Appending -> Advancing and always ends back in Idle.
 *
 * Only one save may be in flight per session: the log objects are rewritten whole, so two
 * overlapping saves from the same session could drop each other's lines.
 */
export class SessionController {
    private _deps: SessionControllerDeps;
    private _clock: Clock;
    private _context: SessionContext | null = null;
    private _state: CategoryState | null = null;

    constructor(deps: SessionControllerDeps) {
        this._deps = deps;
        this._clock = deps.clock ?? systemClock;
    }

    /** Current session context, null before login. */
    public get context(): Readonly<SessionContext> | null {
        return this._context;
    }

    /**
     * Verifies the annotator and positions the session in their first allowed category.
     * @throws AuthenticationError when the credentials are rejected
     * @throws PolicyError when the annotator has no category
     */
    public async Login(name: string, secret: string): Promise<AnnotatorIdentity> {
        const identity = await this._deps.verifier.Verify(name, secret);

        if (!identity) {
            throw new AuthenticationError(`Invalid username or password`, { user: name.trim() });
        }
        const first = identity.categories.find(category => this._deps.categories[category]);

        if (!first) {
            throw new PolicyError(`No category assigned to '${identity.displayName}'`, { user: identity.canonical });
        }
        this._context = {
            annotator: identity,
            category: first,
            index: 0,
            staged: new Map(),
            positionedFor: null,
            lastSaveToken: null,
            inFlight: null,
            saveState: `Idle`,
        };
        this._state = null;
        this._deps.events?.Emit(EVENT_NAMES.sessionStarted, { annotator: identity.canonical, category: first });
        log.info(`Session started for ${identity.canonical}`, `SessionController`, first);
        await this.SelectCategory(first);
        return identity;
    }

    /**
     * Switches category, dropping staged decisions, and positions at max(hint, first undecided).
     * @throws PolicyError when the annotator may not work on the category
     */
    public async SelectCategory(category: string): Promise<PairView | null> {
        const context = this.__requireContext();
        const config = this._deps.categories[category];

        if (!config || !context.annotator.categories.includes(category)) {
            throw new PolicyError(`Category '${category}' is not available to ${context.annotator.displayName}`, {
                category,
            });
        }
        if (context.inFlight !== null) {
            throw new SaveInProgressError(`Cannot switch category while a save is in progress`, { category });
        }
        const metadata = await this._deps.metadata.Load(config.metadataFeedId);
        const index = await LoadCompletionIndex(this._deps.logs, config.logs, context.annotator.canonical);
        const hint = await this._deps.progress.LoadHint(category, context.annotator.canonical);
        const start = StartingPosition(hint, FirstUndecided(metadata, index.completed));

        context.category = category;
        context.staged.clear();
        context.index = Math.min(start, Math.max(0, metadata.length - 1));
        context.positionedFor = category;
        this._state = { name: category, config, metadata, index };
        log.info(`Positioned at ${context.index}/${metadata.length} (hint ${hint})`, `SessionController`, category);
        return this.Current();
    }

    /**
     * View of the current pair with saved statuses, staged statuses prefilled from them, pointer ids
     * and source asset ids.
     * @returns Promise<PairView | null> - null when the category has no pairs
     */
    public async Current(): Promise<PairView | null> {
        const context = this.__requireContext();
        const state = this.__requireState();
        const pair = state.metadata[context.index];

        if (!pair) {
            return null;
        }
        const pairKey = PairKeyOf(pair);
        const saved: PerSide<DecisionStatus | null> = {
            hypothesis: SavedStatus(state.index, `hypothesis`, pairKey),
            adversarial: SavedStatus(state.index, `adversarial`, pairKey),
        };
        const current = context.staged.get(pairKey) ?? { ...saved };
        const pointerIds: PerSide<string | null> = {
            hypothesis: LatestFor(state.index, `hypothesis`, pairKey)?.copiedId ?? null,
            adversarial: LatestFor(state.index, `adversarial`, pairKey)?.copiedId ?? null,
        };
        const sourceIds: PerSide<string | null> = {
            hypothesis: await this.__sourceId(state, pair, `hypothesis`),
            adversarial: await this.__sourceId(state, pair, `adversarial`),
        };
        return {
            index: context.index,
            total: state.metadata.length,
            pairKey,
            pair,
            saved,
            current,
            pointerIds,
            sourceIds,
            canSave: current.hypothesis !== null && current.adversarial !== null && context.saveState === `Idle`,
        };
    }

    /**
     * Stages a status for one side of the current pair; nothing is written until SubmitDecision.
     * @throws ValidationError when the category has no pairs
     */
    public Decide(side: Side, status: DecisionStatus): StagedDecision {
        const context = this.__requireContext();
        const state = this.__requireState();
        const pair = state.metadata[context.index];

        if (!pair) {
            throw new ValidationError(`No pair to decide on in '${state.name}'`);
        }
        const pairKey = PairKeyOf(pair);
        const staged: StagedDecision = context.staged.get(pairKey) ?? {
            hypothesis: SavedStatus(state.index, `hypothesis`, pairKey),
            adversarial: SavedStatus(state.index, `adversarial`, pairKey),
        };
        const next: StagedDecision = { ...staged };
        next[side] = status;
        context.staged.set(pairKey, next);
        return next;
    }

    /**
     * Moves to the previous/next pair or to an absolute index, clamped to the feed, and stores the
     * position as the progress hint right away.
     */
    public async Navigate(target: NavigateTarget): Promise<PairView | null> {
        const context = this.__requireContext();
        const state = this.__requireState();
        const last = Math.max(0, state.metadata.length - 1);
        let next: number;

        if (target === `prev`) {
            next = context.index - 1;
        } else if (target === `next`) {
            next = context.index + 1;
        } else {
            next = Math.trunc(target);
        }
        context.index = Math.min(Math.max(next, 0), last);
        await this._deps.progress.SaveHint(state.name, context.annotator.canonical, context.index);
        return this.Current();
    }

    /** Completion numbers of the current category for this annotator. */
    public Summary(): ProgressSummary {
        const state = this.__requireState();
        const total = state.metadata.length;
        const completed = state.metadata.filter(pair => state.index.completed.has(PairKeyOf(pair))).length;
        return { total, completed, pending: total - completed };
    }

    /**
     * Saves the staged statuses of the current pair: reconciles pointers, appends one record per side
     * and advances to the first undecided pair. Failures come back as `{ ok: false, error }`.
     */
    public async SubmitDecision(): Promise<SaveOutcome> {
        const context = this.__requireContext();
        const state = this.__requireState();
        const pair = state.metadata[context.index];

        if (!pair) {
            return this.__fail(state, ``, new ValidationError(`No pair to save in '${state.name}'`));
        }
        const pairKey = PairKeyOf(pair);

        if (context.inFlight !== null) {
            return this.__fail(
                state,
                pairKey,
                new SaveInProgressError(`A save is already in progress`, { pairKey: context.inFlight }),
            );
        }
        context.inFlight = pairKey;

        try {
            return await this.__save(context, state, pair, pairKey);
        } catch(err) {
            const error = err instanceof AppError ? err : new InternalError(DescribeError(err), { pairKey }, err);
            return this.__fail(state, pairKey, error);
        } finally {
            context.inFlight = null;
            context.saveState = `Idle`;
        }
    }

    private async __save(context: SessionContext, state: CategoryState, pair: MetadataRecord, pairKey: string): Promise<SaveOutcome> {
        const annotator = context.annotator;

        context.saveState = `Validating`;
        const stagedEntry = context.staged.get(pairKey);
        const staged = stagedEntry ?? {
            hypothesis: SavedStatus(state.index, `hypothesis`, pairKey),
            adversarial: SavedStatus(state.index, `adversarial`, pairKey),
        };
        const hypothesis = staged.hypothesis;
        const adversarial = staged.adversarial;

        if (hypothesis === null || adversarial === null) {
            throw new IncompleteDecision(`Both sides need a decision before saving`, { pairKey });
        }
        const statuses: PerSide<DecisionStatus> = { hypothesis, adversarial };
        const token = ReplayToken(pairKey, hypothesis, adversarial, annotator.canonical);

        if (token === context.lastSaveToken) {
            this.__dropStaged(context, pairKey, stagedEntry);
            this._deps.events?.Emit(EVENT_NAMES.decisionReplayed, {
                category: state.name,
                annotator: annotator.canonical,
                pairKey,
            });
            log.info(`Duplicate save ignored`, `SessionController`, pairKey);
            return { ok: true, replayed: true, message: `Already saved`, position: context.index, records: [] };
        }

        context.saveState = `Reconciling`;
        const pointerIds: PerSide<string | undefined> = { hypothesis: undefined, adversarial: undefined };

        for (const side of SIDES) {
            pointerIds[side] = await this.__reconcile(state, pair, pairKey, side, statuses[side]);
        }

        context.saveState = `Appending`;
        const decidedAt = Math.floor(this._clock.Now() / 1000);
        const records = SIDES.map(side =>
            BuildDecisionRecord(pair, annotator, side, statuses[side], decidedAt, pointerIds[side]),
        );

        for (const record of records) {
            const fileId = state.config.logs[record.side];

            try {
                await this._deps.logs.Append(fileId, [JSON.stringify(record)]);
            } catch(err) {
                throw new AppendFailure(
                    `Failed to record the ${record.side} decision: ${DescribeError(err)}`,
                    { side: record.side, fileId, pairKey },
                    err,
                );
            }
            // durable: the index must match the log whether or not the refresh succeeds
            ApplyAppendedRows(state.index, record.side, [record]);
        }
        context.lastSaveToken = token;
        this.__dropStaged(context, pairKey, stagedEntry);

        context.saveState = `Advancing`;
        await this.__advance(context, state);
        this._deps.events?.Emit(EVENT_NAMES.decisionSaved, {
            category: state.name,
            annotator: annotator.canonical,
            pairKey,
            records,
        });
        log.info(`Saved ${hypothesis}/${adversarial}`, `SessionController`, pairKey);
        return { ok: true, replayed: false, message: `Saved`, position: context.index, records };
    }

    private async __reconcile(
        state: CategoryState,
        pair: MetadataRecord,
        pairKey: string,
        side: Side,
        newStatus: DecisionStatus,
    ): Promise<string | undefined> {
        const latest = LatestFor(state.index, side, pairKey);
        const latestStatus = latest?.status;
        const previousStatus = IsDecisionStatus(latestStatus) ? latestStatus : null;
        const filename = AssetNameOf(pair, side);
        let sourceObjectId: string | undefined;

        if (newStatus === `accepted` && previousStatus !== `accepted`) {
            try {
                sourceObjectId = await this._deps.folderIndex.Resolve(state.config.sources[side], filename);
            } catch(err) {
                throw new ReconciliationFailure(
                    `Could not look up source asset '${filename}': ${DescribeError(err)}`,
                    { side, filename, folderId: state.config.sources[side] },
                    err,
                );
            }
        }
        return this._deps.reconciler.Reconcile({
            side,
            filename,
            previousStatus,
            newStatus,
            sourceObjectId,
            destinationFolderId: state.config.destinations[side],
            knownPointerId: latest?.copiedId,
        });
    }

    /**
     * Re-derives progress from the remote log after a save. The records are already durable and
     * folded into the index, so a failure here only leaves the position where it was.
     */
    private async __advance(context: SessionContext, state: CategoryState): Promise<void> {
        try {
            this._deps.metadata.Invalidate(state.config.metadataFeedId);
            state.metadata = await this._deps.metadata.Load(state.config.metadataFeedId);
            state.index = await LoadCompletionIndex(this._deps.logs, state.config.logs, context.annotator.canonical);
            context.index = FirstUndecided(state.metadata, state.index.completed);
        } catch(err) {
            log.warning(`Could not refresh progress after save: ${DescribeError(err)}`, `SessionController`, state.name);
            return;
        }
        await this._deps.progress.SaveHint(state.name, context.annotator.canonical, context.index);
    }

    /** Clears the staged entry a save consumed, keeping statuses staged for the pair while it ran. */
    private __dropStaged(context: SessionContext, pairKey: string, consumed: StagedDecision | undefined): void {
        if (consumed && context.staged.get(pairKey) === consumed) {
            context.staged.delete(pairKey);
        }
    }

    private async __sourceId(state: CategoryState, pair: MetadataRecord, side: Side): Promise<string | null> {
        try {
            return (await this._deps.folderIndex.Resolve(state.config.sources[side], AssetNameOf(pair, side))) ?? null;
        } catch(err) {
            log.warning(`Source lookup failed: ${DescribeError(err)}`, `SessionController`, AssetNameOf(pair, side));
            return null;
        }
    }

    private __fail(state: CategoryState, pairKey: string, error: AppError): SaveOutcome {
        const annotator = this._context?.annotator.canonical ?? ``;
        this._deps.events?.Emit(EVENT_NAMES.decisionFailed, {
            category: state.name,
            annotator,
            pairKey,
            code: error.code,
            message: error.message,
        });
        log.warning(`Save failed (${error.code}): ${error.message}`, `SessionController`, pairKey || state.name);
        return { ok: false, message: error.message, error };
    }

    private __requireContext(): SessionContext {
        if (!this._context) {
            throw new AuthenticationError(`Login required`);
        }
        return this._context;
    }

    private __requireState(): CategoryState {
        const context = this.__requireContext();

        if (!this._state || context.positionedFor !== this._state.name) {
            throw new ValidationError(`No category selected`);
        }
        return this._state;
    }
}
