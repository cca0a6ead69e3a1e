import { createHash, timingSafeEqual } from 'crypto';
import { CanonicalAnnotator, type AnnotatorIdentity, type CredentialVerifier } from '../Domain/index.js';

/** Configured annotator account; the secret is stored as a SHA-256 hex digest. */
export interface AnnotatorAccount {
    name: string;
    secretSha256: string;
    categories: string[];
}

/**
 * SHA-256 hex digest of a secret, the format accounts are configured with.
 * @example
 * HashSecret('test-secret'); // 64 hex chars
 */
export function HashSecret(secret: string): string {
    return createHash(`sha256`).update(secret, `utf8`).digest(`hex`);
}

/**
 * Verifies annotators against a fixed account list from configuration. Names match on their
 * canonical form; the identity keeps the name as typed for display.
 */
export class StaticCredentialVerifier implements CredentialVerifier {
    private _accounts: Map<string, AnnotatorAccount> = new Map(); // canonical name -> account

    constructor(accounts: AnnotatorAccount[]) {
        for (const account of accounts) {
            this._accounts.set(CanonicalAnnotator(account.name), account);
        }
    }

    public async Verify(name: string, secret: string): Promise<AnnotatorIdentity | null> {
        const canonical = CanonicalAnnotator(name);
        const account = this._accounts.get(canonical);

        if (!account || !canonical) {
            return null;
        }
        const expected = Buffer.from(account.secretSha256.toLowerCase(), `hex`);
        const actual = Buffer.from(HashSecret(secret), `hex`);

        if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
            return null;
        }
        return {
            displayName: name.trim(),
            canonical,
            categories: [...account.categories],
        };
    }
}
