import { createHash } from 'node:crypto';
import { describe, expect, it, vi } from 'vitest';

import {
    buildAuthorizeUrl,
    generatePKCE,
    normalizeAuthorizationCode,
    OAuthClient,
    OAuthError,
    OAUTH_TOKEN_URL,
} from './oauth';

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('PKCE', () => {
    it('challenge is the unpadded base64url sha256 of the verifier', () => {
        for (let i = 0; i < 20; i++) {
            const { verifier, challenge } = generatePKCE();
            const expected = createHash('sha256').update(verifier).digest('base64url');

            expect(challenge).toBe(expected);
            expect(challenge).not.toBe(verifier);
            expect(verifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
        }
    });

    it('builds the authorize URL with the verifier as state', () => {
        const url = new URL(buildAuthorizeUrl({ verifier: 'test-verifier', challenge: 'test-challenge' }));

        expect(url.origin + url.pathname).toBe('https://claude.ai/oauth/authorize');
        expect([...url.searchParams.keys()]).toEqual([
            'code', 'client_id', 'response_type', 'redirect_uri', 'scope', 'code_challenge', 'code_challenge_method', 'state',
        ]);
        expect(url.searchParams.get('client_id')).toBe('9d1c250a-e61b-44d9-88ed-5944d1962f5e');
        expect(url.searchParams.get('scope')).toBe('org:create_api_key user:profile user:inference');
        expect(url.searchParams.get('redirect_uri')).toBe('https://console.anthropic.com/oauth/code/callback');
        expect(url.searchParams.get('code_challenge')).toBe('test-challenge');
        expect(url.searchParams.get('code_challenge_method')).toBe('S256');
        expect(url.searchParams.get('state')).toBe('test-verifier');
    });
});

describe('normalizeAuthorizationCode', () => {
    it('extracts the code from every pasted form', () => {
        expect(normalizeAuthorizationCode('abc123')).toBe('abc123');
        expect(normalizeAuthorizationCode('https://x/callback?code=abc123&state=y')).toBe('abc123');
        expect(normalizeAuthorizationCode('abc123#y')).toBe('abc123');
        expect(normalizeAuthorizationCode('  abc123#y \n')).toBe('abc123');
    });
});

describe('OAuthClient', () => {
    const now = () => 1_000_000;

    it('exchanges a code and subtracts the safety margin from expiry', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
            jsonResponse({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 }),
        );
        const client = new OAuthClient({ fetch: fetchMock, now });

        const credentials = await client.exchangeCode('abc123', 'test-verifier');

        expect(credentials).toEqual({
            type: 'oauth',
            accessToken: 'test-access',
            refreshToken: 'test-refresh',
            expiresAtEpochMs: 1_000_000 + 3_600_000 - 300_000,
        });
        expect(fetchMock.mock.calls[0]?.[0]).toBe(OAUTH_TOKEN_URL);
        const init = fetchMock.mock.calls[0]?.[1];
        expect(init?.method).toBe('POST');
        expect(JSON.parse(String(init?.body))).toEqual({
            grant_type: 'authorization_code',
            client_id: '9d1c250a-e61b-44d9-88ed-5944d1962f5e',
            code: 'abc123',
            state: 'test-verifier',
            redirect_uri: 'https://console.anthropic.com/oauth/code/callback',
            code_verifier: 'test-verifier',
        });
    });

    it('surfaces the body of a failed exchange', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('invalid_grant', { status: 400 }));
        const client = new OAuthClient({ fetch: fetchMock, now });

        await expect(client.exchangeCode('bad', 'test-verifier')).rejects.toThrow('Token exchange failed: invalid_grant');
    });

    it('rejects an exchange response without a refresh token', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ access_token: 'test-access', expires_in: 60 }));
        const client = new OAuthClient({ fetch: fetchMock, now });

        await expect(client.exchangeCode('abc123', 'test-verifier')).rejects.toBeInstanceOf(OAuthError);
    });

    it('keeps the old refresh token when the provider does not rotate it', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ access_token: 'test-access-2', expires_in: 600 }));
        const client = new OAuthClient({ fetch: fetchMock, now });

        const credentials = await client.refreshAccessToken('test-refresh');

        expect(credentials.refreshToken).toBe('test-refresh');
        expect(credentials.accessToken).toBe('test-access-2');
        expect(credentials.expiresAtEpochMs).toBe(1_000_000 + 600_000 - 300_000);
        const init = fetchMock.mock.calls[0]?.[1];
        expect(JSON.parse(String(init?.body))).toEqual({
            grant_type: 'refresh_token',
            client_id: '9d1c250a-e61b-44d9-88ed-5944d1962f5e',
            refresh_token: 'test-refresh',
        });
    });
});
