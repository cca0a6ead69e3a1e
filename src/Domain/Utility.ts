/**
 * Central enumeration of well-known event names and their payloads for the typed event bus.
 */

import type { DecisionRecord, Side } from './Annotation.js';

export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    configError: 'config.error',
    storeRetry: 'store.retry',
    storeThrottled: 'store.throttled',
    logAppendFallback: 'log.append.fallback',
    pointerCreated: 'pointer.created',
    pointerDeleted: 'pointer.deleted',
    sessionStarted: 'session.started',
    progressSaved: 'progress.saved',
    decisionSaved: 'decision.saved',
    decisionReplayed: 'decision.replayed',
    decisionFailed: 'decision.failed',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/** Payload carried by each event. */
export interface EventPayloads {
    'config.loaded': { path: string };
    'config.error': { path: string; message: string };
    'store.retry': { label: string; attempt: number; delayMs: number; message: string };
    'store.throttled': { delayMs: number; qps: number };
    'log.append.fallback': { fileId: string; message: string };
    'pointer.created': { side: Side; pointerId: string; folderId: string; name: string };
    'pointer.deleted': { side: Side; pointerId: string };
    'session.started': { annotator: string; category: string };
    'progress.saved': { category: string; annotator: string; position: number };
    'decision.saved': { category: string; annotator: string; pairKey: string; records: DecisionRecord[] };
    'decision.replayed': { category: string; annotator: string; pairKey: string };
    'decision.failed': { category: string; annotator: string; pairKey: string; code: string; message: string };
}
