import { HashSecret } from '../../src/Services/CredentialVerifier.js';
import type { MetadataRecord } from '../../src/Domain/index.js';
import { MainEventBus } from '../../src/Events/MainEventBus.js';
import type { SeedObject } from '../../src/Repository/InMemoryObjectStore.js';
import { AppendOnlyLogStore } from '../../src/Services/AppendOnlyLogStore.js';
import { StaticCredentialVerifier } from '../../src/Services/CredentialVerifier.js';
import { DecisionReconciler } from '../../src/Services/DecisionReconciler.js';
import { FolderIndexCache } from '../../src/Services/FolderIndexCache.js';
import { MetadataCache } from '../../src/Services/MetadataCache.js';
import { MetricsService } from '../../src/Services/MetricsService.js';
import { ProgressTracker } from '../../src/Services/ProgressTracker.js';
import { RateLimiter } from '../../src/Services/RateLimiter.js';
import { RetryingTransport } from '../../src/Services/RetryingTransport.js';
import { SessionController } from '../../src/Services/SessionController.js';
import type { CategoryConfig } from '../../src/Types/Config.js';
import { FlakyObjectStore } from './FlakyObjectStore.js';
import { ManualClock } from './ManualClock.js';

export const SECRET = `test-secret`;

export const CATEGORY: CategoryConfig = {
    metadataFeedId: `feed`,
    sources: { hypothesis: `src-h`, adversarial: `src-a` },
    destinations: { hypothesis: `dst-h`, adversarial: `dst-a` },
    logs: { hypothesis: `log-h`, adversarial: `log-a` },
    progressFolderId: `progress`,
};

export const PAIRS: MetadataRecord[] = [
    { id: `1`, hypo_id: `h1.jpg`, adversarial_id: `a1.jpg`, text: `first` },
    { id: `2`, hypo_id: `h2.jpg`, adversarial_id: `a2.jpg`, text: `second` },
    { id: `3`, hypo_id: `h3.jpg`, adversarial_id: `a3.jpg`, text: `third` },
];

export interface FixtureOptions {
    pairs?: MetadataRecord[];
    hypothesisLog?: string;
    adversarialLog?: string;
    extraObjects?: SeedObject[];
}

/** Transport over a limiter that never throttles, retrying twice with short backoff. */
export function FastTransport(clock: ManualClock, metrics: MetricsService, events?: MainEventBus): RetryingTransport {
    const limiter = new RateLimiter({ maxQps: 1_000_000 }, clock, metrics, events);
    return new RetryingTransport(limiter, { attempts: 2, baseDelayMs: 10, maxDelayMs: 20 }, clock, metrics, events);
}

/** Seeded store, fast transport and a SessionController factory for one category `animals`. */
export function CreateFixture(options: FixtureOptions = {}) {
    const pairs = options.pairs ?? PAIRS;
    const store = new FlakyObjectStore({
        objects: [
            {
                id: `feed`,
                name: `feed.jsonl`,
                folderId: `feeds`,
                kind: `text`,
                content: pairs.map(pair => JSON.stringify(pair)).join(`\n`) + `\n`,
            },
            { id: `log-h`, name: `h.jsonl`, folderId: `logs`, kind: `text`, content: options.hypothesisLog ?? `` },
            { id: `log-a`, name: `a.jsonl`, folderId: `logs`, kind: `text`, content: options.adversarialLog ?? `` },
            ...pairs.flatMap((pair): SeedObject[] => [
                { id: `src-${pair.hypo_id}`, name: pair.hypo_id, folderId: `src-h` },
                { id: `src-${pair.adversarial_id}`, name: pair.adversarial_id, folderId: `src-a` },
            ]),
            ...(options.extraObjects ?? []),
        ],
    });
    const clock = new ManualClock();
    const metrics = new MetricsService();
    const events = new MainEventBus(metrics);
    const transport = FastTransport(clock, metrics, events);
    const folderIndex = new FolderIndexCache(store, transport, {}, clock, metrics);
    const logs = new AppendOnlyLogStore(store, transport, {}, clock, metrics, events);
    const metadata = new MetadataCache(store, transport, logs, 60_000, clock, metrics);
    const reconciler = new DecisionReconciler(store, transport, folderIndex, events);
    const progress = new ProgressTracker(store, transport, logs, { animals: `progress` }, events);
    const verifier = new StaticCredentialVerifier([
        { name: `Alice`, secretSha256: HashSecret(SECRET), categories: [`animals`] },
        { name: `Bob`, secretSha256: HashSecret(SECRET), categories: [`animals`] },
    ]);
    const NewSession = () =>
        new SessionController({
            categories: { animals: CATEGORY },
            verifier,
            metadata,
            logs,
            folderIndex,
            reconciler,
            progress,
            clock,
            events,
        });

    return { store, clock, metrics, events, transport, folderIndex, logs, metadata, reconciler, progress, verifier, NewSession };
}

/** Non-blank lines of a text object in the fixture store. */
export async function LogLines(store: FlakyObjectStore, fileId: string): Promise<string[]> {
    const text = await store.inner.GetText(fileId);
    return text.split(`\n`).filter(line => line.trim().length > 0);
}
