/**
 * Credential verification seam. Storage of credentials belongs to the implementation,
 * the engine only consumes verified identities.
 */

/** Verified annotator, as returned by a CredentialVerifier. */
export interface AnnotatorIdentity {
    displayName: string; // as typed at login
    canonical: string; // trimmed, case-folded
    categories: string[]; // categories this annotator may work on, in preference order
}

export interface CredentialVerifier {
    /** Resolves the identity for a valid name/secret pair, or null when rejected. */
    Verify(name: string, secret: string): Promise<AnnotatorIdentity | null>;
}
