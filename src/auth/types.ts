import type { JWTPayload } from 'jose';

/** Who the caller is, once their token checks out. */
export interface Identity {
    subjectId: string;
    claims: JWTPayload;
}

export type TokenVerification =
    | { ok: true; identity?: Identity } // identity absent when the token has no `sub`
    | { ok: false; reason: 'invalid' | 'expired' };

/** Verify a bearer token. Never throws for a bad token, only answers. */
export interface TokenVerifier {
    verify(token: string): Promise<TokenVerification>;
}
