/**
 * Domain interfaces and types for the annotation sync engine.
 */

// Annotation model
export type {
    JsonValue,
    JsonObject,
    Side,
    DecisionStatus,
    PerSide,
    MetadataRecord,
    DecisionRecord,
    LoggedDecision,
    CompletionIndex,
} from './Annotation.js';
export {
    SIDES,
    CanonicalAnnotator,
    PairKey,
    PairKeyOf,
    AssetNameOf,
    IsDecisionStatus,
} from './Annotation.js';

// Remote store contract
export type { RemoteObjectStore, StoredObjectInfo, StoredObjectKind, ListOptions, ListPage } from './Store.js';

// Credentials
export type { AnnotatorIdentity, CredentialVerifier } from './Credentials.js';

// Session
export type { SaveState, StagedDecision, SessionContext, PairView, ProgressSummary, SaveOutcome } from './Session.js';

// Events
export type { EventName, EventPayloads } from './Utility.js';
export { EVENT_NAMES } from './Utility.js';
