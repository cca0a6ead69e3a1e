/**
 * Annotation data model: metadata pairs, decision records and the derived completion index.
 * Field names of persisted records are snake_case because they are the on-disk line format.
 */

/** Any value that survives a JSON round trip. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A parsed JSON object line (metadata feed row or log row). */
export type JsonObject = { [key: string]: JsonValue };

/** The two assets of a pair. */
export type Side = `hypothesis` | `adversarial`;

export const SIDES: readonly Side[] = [`hypothesis`, `adversarial`];

/** Final statuses a side can be saved with. */
export type DecisionStatus = `accepted` | `rejected`;

/** A value per side, used for folders, logs and staged statuses. */
export type PerSide<T> = Record<Side, T>;

/**
 * One row of the metadata feed. Only the two asset filenames are required; any other
 * keys are carried verbatim into the decision records.
 */
export interface MetadataRecord extends JsonObject {
    hypo_id: string;
    adversarial_id: string;
}

/** Line format appended to a side's LogFile. */
export interface DecisionRecord extends JsonObject {
    pair_key: string;
    annotator: string; // raw display name
    canonical_annotator: string;
    side: Side;
    status: DecisionStatus;
    decided_at: number; // unix seconds
}

/** Latest known state of one side of one pair for one annotator. */
export interface LoggedDecision {
    pairKey: string;
    status: string; // trimmed; '' when the row carried none
    copiedId?: string;
    decidedAt?: number;
    row: JsonObject;
}

/**
 * Derived, never persisted. For one annotator: pair_key -> latest decision per side,
 * plus the set of pairs with both sides decided.
 */
export interface CompletionIndex {
    annotator: string; // canonical
    latest: PerSide<Map<string, LoggedDecision>>;
    completed: Set<string>;
}

/** Normalizes a display name into the identity used for all log matching. */
export function CanonicalAnnotator(name: string | null | undefined): string {
    return (name ?? ``).trim().toLowerCase();
}

/** Builds the stable pair identifier from the two asset filenames. */
export function PairKey(hypoId: string, adversarialId: string): string {
    return `${hypoId}|${adversarialId}`;
}

/** Pair key of a metadata row. */
export function PairKeyOf(record: MetadataRecord): string {
    return PairKey(record.hypo_id, record.adversarial_id);
}

/** Asset filename of the given side of a metadata row. */
export function AssetNameOf(record: MetadataRecord, side: Side): string {
    return side === `hypothesis` ? record.hypo_id : record.adversarial_id;
}

export function IsDecisionStatus(value: unknown): value is DecisionStatus {
    return value === `accepted` || value === `rejected`;
}
