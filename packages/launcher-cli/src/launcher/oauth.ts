/**
 * Authorization-code + PKCE sign-in against the Anthropic console
 *
 * The redirect lands on a console page that shows the code for the user to paste
 * back, so there is no local callback listener. The PKCE verifier doubles as the
 * `state` parameter because it has to be sent back on exchange anyway.
 */

import { createHash, randomBytes } from 'node:crypto';
import * as z from 'zod';
import { logger } from '@/ui/logger';

export const OAUTH_CLIENT_ID = '9d1c250a-e61b-44d9-88ed-5944d1962f5e';
export const OAUTH_AUTHORIZE_URL = 'https://claude.ai/oauth/authorize';
export const OAUTH_TOKEN_URL = 'https://console.anthropic.com/v1/oauth/token';
export const OAUTH_REDIRECT_URI = 'https://console.anthropic.com/oauth/code/callback';
export const OAUTH_SCOPES = 'org:create_api_key user:profile user:inference';

/** Subtracted from the provider's expiry so refresh happens before rejection */
export const EXPIRY_SAFETY_MARGIN_MS = 5 * 60 * 1000;

export interface PKCE {
    verifier: string;
    challenge: string;
}

export interface OAuthCredentialSet {
    type: 'oauth';
    refreshToken: string;
    accessToken: string;
    expiresAtEpochMs: number;
}

export class OAuthError extends Error {
    constructor(message: string, readonly status: number | null = null) {
        super(message);
        this.name = 'OAuthError';
    }
}

const TokenResponseSchema = z.object({
    access_token: z.string(),
    refresh_token: z.string().optional(),
    expires_in: z.number(),
});

export function base64UrlEncode(bytes: Buffer): string {
    return bytes.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

export function challengeForVerifier(verifier: string): string {
    return base64UrlEncode(createHash('sha256').update(verifier).digest());
}

export function generatePKCE(): PKCE {
    const verifier = base64UrlEncode(randomBytes(32));
    return { verifier, challenge: challengeForVerifier(verifier) };
}

export function buildAuthorizeUrl(pkce: PKCE): string {
    const url = new URL(OAUTH_AUTHORIZE_URL);
    url.searchParams.set('code', 'true');
    url.searchParams.set('client_id', OAUTH_CLIENT_ID);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', OAUTH_REDIRECT_URI);
    url.searchParams.set('scope', OAUTH_SCOPES);
    url.searchParams.set('code_challenge', pkce.challenge);
    url.searchParams.set('code_challenge_method', 'S256');
    url.searchParams.set('state', pkce.verifier);
    return url.toString();
}

/**
 * Accepts a bare code, a full callback URL, or `code#state`
 */
export function normalizeAuthorizationCode(input: string): string {
    let code = input.trim();
    if (URL.canParse(code)) {
        const fromQuery = new URL(code).searchParams.get('code');
        if (fromQuery) {
            code = fromQuery;
        }
    }
    const hashIndex = code.indexOf('#');
    return hashIndex === -1 ? code : code.slice(0, hashIndex);
}

type FetchFn = typeof fetch;

export interface OAuthClientOptions {
    fetch?: FetchFn;
    now?: () => number;
    timeoutMs?: number;
}

export class OAuthClient {
    private readonly fetchFn: FetchFn;
    private readonly now: () => number;
    private readonly timeoutMs: number;

    constructor(options: OAuthClientOptions = {}) {
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
        this.now = options.now ?? Date.now;
        this.timeoutMs = options.timeoutMs ?? 30_000;
    }

    async exchangeCode(code: string, verifier: string): Promise<OAuthCredentialSet> {
        const response = await this.postToken({
            grant_type: 'authorization_code',
            client_id: OAUTH_CLIENT_ID,
            code,
            state: verifier,
            redirect_uri: OAUTH_REDIRECT_URI,
            code_verifier: verifier,
        }, 'Token exchange failed');

        if (!response.refresh_token) {
            throw new OAuthError('Unexpected token response');
        }
        return this.toCredentialSet(response.access_token, response.refresh_token, response.expires_in);
    }

    /** Keeps the old refresh token when the provider does not rotate it */
    async refreshAccessToken(refreshToken: string): Promise<OAuthCredentialSet> {
        const response = await this.postToken({
            grant_type: 'refresh_token',
            client_id: OAUTH_CLIENT_ID,
            refresh_token: refreshToken,
        }, 'Token refresh failed');

        return this.toCredentialSet(response.access_token, response.refresh_token ?? refreshToken, response.expires_in);
    }

    private async postToken(payload: Record<string, string>, failurePrefix: string): Promise<z.infer<typeof TokenResponseSchema>> {
        const response = await this.fetchFn(OAUTH_TOKEN_URL, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        const text = await response.text();
        if (!response.ok) {
            logger.debug(`[OAUTH] ${failurePrefix} (HTTP ${response.status}): ${text}`);
            throw new OAuthError(`${failurePrefix}: ${text}`, response.status);
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch {
            throw new OAuthError('Unexpected token response', response.status);
        }
        const parsed = TokenResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new OAuthError('Unexpected token response', response.status);
        }
        return parsed.data;
    }

    private toCredentialSet(accessToken: string, refreshToken: string, expiresInSeconds: number): OAuthCredentialSet {
        return {
            type: 'oauth',
            accessToken,
            refreshToken,
            expiresAtEpochMs: Math.floor(this.now() + expiresInSeconds * 1000 - EXPIRY_SAFETY_MARGIN_MS),
        };
    }
}
