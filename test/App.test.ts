import { describe, it, expect, beforeEach } from 'vitest';
import { FormatPair, AnnotationApp } from '../src/App.js';
import { BuildEngine } from '../src/App/Boot.js';
import { DEFAULT_APPEND_OPTIONS } from '../src/Services/AppendOnlyLogStore.js';
import { HashSecret } from '../src/Services/CredentialVerifier.js';
import { DEFAULT_RATE_LIMITER_OPTIONS } from '../src/Services/RateLimiter.js';
import type { ValidatedConfig } from '../src/Types/Config.js';
import { CATEGORY, CreateFixture, SECRET } from './helpers/Fixture.js';

describe('AnnotationApp', () => {
    let app: AnnotationApp;

    beforeEach(() => {
        const fx = CreateFixture();
        const config: ValidatedConfig = {
            logLevel: 'silent',
            backend: 'memory',
            categories: { animals: CATEGORY },
            users: [{ name: 'Alice', secretSha256: HashSecret(SECRET), categories: ['animals'] }],
            rateLimit: DEFAULT_RATE_LIMITER_OPTIONS,
            retry: { attempts: 2, baseDelayMs: 10, maxDelayMs: 20 },
            append: DEFAULT_APPEND_OPTIONS,
            folderIndexTtlMs: 60_000,
            metadataTtlMs: 60_000,
        };
        const engine = BuildEngine(config, { store: fx.store, Close: async () => {} }, fx.events, fx.clock, fx.metrics);
        app = new AnnotationApp(engine, fx.events);
    });

    it('should list commands', async () => {
        expect((await app.HandleCommand('help'))[0]).toBe('Commands:');
        expect(await app.HandleCommand('   ')).toEqual([]);
        expect(await app.HandleCommand('frobnicate')).toEqual([`Unknown command 'frobnicate'. Type 'help'.`]);
    });

    it('should require a login first', async () => {
        expect(await app.HandleCommand('show')).toEqual(['Error (AUTHENTICATION_FAILED): Login required']);
        expect(await app.HandleCommand('login Alice wrong-secret')).toEqual([
            'Error (AUTHENTICATION_FAILED): Invalid username or password',
        ]);
        expect(await app.HandleCommand('login Alice')).toEqual(['Usage: login <name> <secret>']);
    });

    it('should run a review from login to save', async () => {
        expect(await app.HandleCommand(`login Alice ${SECRET}`)).toEqual([
            'Logged in as Alice (animals)',
            'Pair 1/3: h1.jpg|a1.jpg',
            '  first',
            '  hypothesis: - [saved: -]',
            '  adversarial: - [saved: -]',
        ]);
        expect(await app.HandleCommand('decide h accept')).toEqual(['hypothesis: accepted, adversarial: -']);
        expect(await app.HandleCommand('save')).toEqual([
            'Error (INCOMPLETE_DECISION): Both sides need a decision before saving',
        ]);
        expect(await app.HandleCommand('decide a n')).toEqual(['hypothesis: accepted, adversarial: rejected']);
        expect(await app.HandleCommand('save')).toEqual([
            'Saved',
            'Pair 2/3: h2.jpg|a2.jpg',
            '  second',
            '  hypothesis: - [saved: -]',
            '  adversarial: - [saved: -]',
        ]);
        expect(await app.HandleCommand('goto 1')).toEqual([
            'Pair 1/3: h1.jpg|a1.jpg',
            '  first',
            '  hypothesis: accepted [saved: accepted]',
            '  adversarial: rejected [saved: rejected]',
        ]);
        expect((await app.HandleCommand('status'))[0]).toBe('Completed 1/3 (2 pending)');
    });

    it('should reject malformed arguments', async () => {
        await app.HandleCommand(`login Alice ${SECRET}`);

        expect(await app.HandleCommand('decide x accept')).toEqual(['Usage: decide <h|a> <accept|reject>']);
        expect(await app.HandleCommand('goto next')).toEqual(['Usage: goto <n>']);
        expect(await app.HandleCommand('category plants')).toEqual([
            `Error (POLICY_ERROR): Category 'plants' is not available to Alice`,
        ]);
        expect(await app.HandleCommand('quit')).toEqual(['Bye.']);
    });

    it('should format empty categories and missing sources', () => {
        expect(FormatPair(null)).toEqual(['No pairs in this category.']);
        expect(
            FormatPair({
                index: 0,
                total: 1,
                pairKey: 'h|a',
                pair: { hypo_id: 'h', adversarial_id: 'a' },
                saved: { hypothesis: null, adversarial: null },
                current: { hypothesis: 'accepted', adversarial: null },
                pointerIds: { hypothesis: null, adversarial: null },
                sourceIds: { hypothesis: 'src-h', adversarial: null },
                canSave: false,
            }),
        ).toEqual(['Pair 1/1: h|a', '  hypothesis: accepted [saved: -]', '  adversarial: - [saved: -] (source missing)']);
    });
});
