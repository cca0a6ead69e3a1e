/**
 * Per-session state threaded through every SessionController call.
 */

import type { AppError } from '../Common/Errors.js';
import type { AnnotatorIdentity } from './Credentials.js';
import type { DecisionRecord, DecisionStatus, MetadataRecord, PerSide } from './Annotation.js';

/** Phases of one save; every save ends back in Idle. */
export type SaveState = `Idle` | `Validating` | `Reconciling` | `Appending` | `Advancing`;

/** Statuses staged for a pair before it is saved; null means undecided. */
export type StagedDecision = PerSide<DecisionStatus | null>;

/** Session context: who is annotating, where, and what is staged. */
export interface SessionContext {
    annotator: AnnotatorIdentity;
    category: string;
    index: number; // current position in the category's metadata feed
    staged: Map<string, StagedDecision>; // pair_key -> staged statuses
    positionedFor: string | null; // category whose starting position has been resolved
    lastSaveToken: string | null; // replay token of the last successful save
    inFlight: string | null; // pair_key of the save in progress
    saveState: SaveState;
}

/** What the caller renders for the current pair. */
export interface PairView {
    index: number;
    total: number;
    pairKey: string;
    pair: MetadataRecord;
    saved: PerSide<DecisionStatus | null>;
    current: StagedDecision;
    pointerIds: PerSide<string | null>;
    sourceIds: PerSide<string | null>;
    canSave: boolean;
}

/** Progress numbers for the current category. */
export interface ProgressSummary {
    total: number;
    completed: number;
    pending: number;
}

/** Result of a save command. */
export type SaveOutcome =
    | {
          ok: true;
          replayed: boolean;
          message: string;
          position: number; // index the session moved to
          records: DecisionRecord[]; // appended records, empty on replay
      }
    | {
          ok: false;
          message: string;
          error: AppError;
      };
