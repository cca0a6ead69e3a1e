import {
    CanonicalAnnotator,
    PairKey,
    SIDES,
    type CompletionIndex,
    type JsonObject,
    type JsonValue,
    type LoggedDecision,
    type PerSide,
    type Side,
} from '../Domain/index.js';
import type { AppendOnlyLogStore } from './AppendOnlyLogStore.js';

/** Legacy field some older log rows carry instead of `canonical_annotator`. */
const LEGACY_CANONICAL_FIELD = `_annotator_canon`;

function IsJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

function StringField(row: JsonObject, key: string): string {
    const value = row[key];
    return typeof value === `string` ? value : ``;
}

/**
 * Parses newline-delimited JSON rows; malformed lines and non-object values are skipped.
 * @example
 * ParseJsonLines(['{"a":1}', 'oops', '[1]']); // [{ a: 1 }]
 */
export function ParseJsonLines(lines: string[]): JsonObject[] {
    const rows: JsonObject[] = [];

    for (const line of lines) {
        const trimmed = line.trim();

        if (!trimmed) {
            continue;
        }
        let parsed: JsonValue;

        try {
            parsed = JSON.parse(trimmed);
        } catch {
            continue; // malformed rows are not fatal
        }
        if (IsJsonObject(parsed)) {
            rows.push(parsed);
        }
    }
    return rows;
}

/** pair_key of a log row; rebuilt from the asset ids when the row has none. */
export function RowPairKey(row: JsonObject): string {
    return StringField(row, `pair_key`) || PairKey(StringField(row, `hypo_id`), StringField(row, `adversarial_id`));
}

/**
 * Latest row per pair for one annotator: rows are scanned top-to-bottom and the last row whose
 * canonical annotator matches wins. Rows without any annotator field are attributed to the querying
 * annotator.
 */
export function BuildLatestMap(rows: JsonObject[], annotator: string): Map<string, LoggedDecision> {
    const target = CanonicalAnnotator(annotator);
    const latest = new Map<string, LoggedDecision>();

    for (const row of rows) {
        const owner = CanonicalAnnotator(
            StringField(row, `canonical_annotator`) ||
                StringField(row, `annotator`) ||
                StringField(row, LEGACY_CANONICAL_FIELD),
        );

        if (owner && owner !== target) {
            continue;
        }
        const pairKey = RowPairKey(row);
        const copiedId = StringField(row, `copied_id`);
        const decidedAt = row.decided_at;
        latest.set(pairKey, {
            pairKey,
            status: StringField(row, `status`).trim(),
            copiedId: copiedId || undefined,
            decidedAt: typeof decidedAt === `number` ? decidedAt : undefined,
            row,
        });
    }
    return latest;
}

/**
 * Builds the completion index from both sides' rows. A pair is complete iff both of its sides have
 * a non-empty latest status for the annotator.
 */
export function BuildCompletionIndex(rows: PerSide<JsonObject[]>, annotator: string): CompletionIndex {
    const latest: PerSide<Map<string, LoggedDecision>> = {
        hypothesis: BuildLatestMap(rows.hypothesis, annotator),
        adversarial: BuildLatestMap(rows.adversarial, annotator),
    };
    const completed = new Set<string>();
    const keys = new Set([...latest.hypothesis.keys(), ...latest.adversarial.keys()]);

    for (const key of keys) {
        if (SIDES.every(side => (latest[side].get(key)?.status ?? ``) !== ``)) {
            completed.add(key);
        }
    }
    return { annotator: CanonicalAnnotator(annotator), latest, completed };
}

/**
 * Folds rows just appended to one side's LogFile into an existing index, in place. Rows of other
 * annotators are ignored the same way `BuildLatestMap` ignores them.
 */
export function ApplyAppendedRows(index: CompletionIndex, side: Side, rows: JsonObject[]): void {
    for (const [pairKey, decision] of BuildLatestMap(rows, index.annotator)) {
        index.latest[side].set(pairKey, decision);

        if (SIDES.every(each => (index.latest[each].get(pairKey)?.status ?? ``) !== ``)) {
            index.completed.add(pairKey);
        } else {
            index.completed.delete(pairKey);
        }
    }
}

/**
 * Reads both LogFiles of a category and derives the completion index for an annotator.
 * Nothing is cached here; the index is recomputed from the log every time.
 */
export async function LoadCompletionIndex(
    logs: AppendOnlyLogStore,
    logFiles: PerSide<string>,
    annotator: string,
): Promise<CompletionIndex> {
    const hypothesis = ParseJsonLines(await logs.Read(logFiles.hypothesis));
    const adversarial = ParseJsonLines(await logs.Read(logFiles.adversarial));
    return BuildCompletionIndex({ hypothesis, adversarial }, annotator);
}

/** Latest decision of one side of a pair, if any. */
export function LatestFor(index: CompletionIndex, side: Side, pairKey: string): LoggedDecision | undefined {
    return index.latest[side].get(pairKey);
}
