import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
  },
}));

import type { LauncherSnapshot } from '@/launcher/types';
import { buildControlServer, type ControlledLauncher } from './controlServer';

const snapshot: LauncherSnapshot = {
  state: 'running',
  busy: false,
  steps: [{ status: 'done', message: 'Gateway is ready!', at: 1_700_000_000_000 }],
  gatewayToken: 'a'.repeat(64),
  port: 18789,
  controlUiUrl: `http://localhost:18789/openclaw?token=${'a'.repeat(64)}`,
  health: { healthy: true, consecutiveFailures: 0, uptimeSeconds: 12 },
  containerStartedAt: 1_700_000_000_000,
  pullProgress: null,
  authInputMode: null,
  authorizeUrl: null,
  authExpired: false,
  lastFailure: null,
  remediation: null,
};

const CONTROL_TOKEN = 'test-secret';
const AUTH = { authorization: `Bearer ${CONTROL_TOKEN}` };

function fakeLauncher() {
  return {
    getSnapshot: vi.fn(() => snapshot),
    accepts: vi.fn<ControlledLauncher['accepts']>(() => true),
    start: vi.fn(async () => true),
    stopContainer: vi.fn(async () => true),
    restartContainer: vi.fn(async () => true),
    resetEverything: vi.fn(async () => true),
    reAuthenticate: vi.fn(async () => true),
    beginOAuth: vi.fn(async () => true),
    showApiKeyInput: vi.fn(async () => true),
    submitOAuthCode: vi.fn(async (_code: string) => true),
    submitApiKey: vi.fn(async (_key: string) => true),
    skipAuth: vi.fn(async () => true),
    fetchLogs: vi.fn(async (_tail?: number) => 'gateway listening'),
    openControlUi: vi.fn(async (): Promise<string | null> => snapshot.controlUiUrl),
  } satisfies ControlledLauncher;
}

describe('control server', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  function build(launcher: ControlledLauncher, requestShutdown: () => void = vi.fn()): FastifyInstance {
    app = buildControlServer({ launcher, requestShutdown, controlToken: CONTROL_TOKEN });
    return app;
  }

  it('returns the current snapshot from /status', async () => {
    const server = build(fakeLauncher());

    const response = await server.inject({ method: 'POST', url: '/status', headers: AUTH });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(snapshot);
  });

  it('refuses requests without the control token', async () => {
    const launcher = fakeLauncher();
    const server = build(launcher);

    const anonymous = await server.inject({ method: 'POST', url: '/status' });
    const wrongToken = await server.inject({ method: 'POST', url: '/reset', headers: { authorization: 'Bearer test-other' } });

    expect(anonymous.statusCode).toBe(401);
    expect(anonymous.json()).toEqual({ error: 'Unauthorized' });
    expect(anonymous.body).not.toContain(snapshot.gatewayToken);
    expect(wrongToken.statusCode).toBe(401);
    expect(launcher.getSnapshot).not.toHaveBeenCalled();
    expect(launcher.accepts).not.toHaveBeenCalled();
    expect(launcher.resetEverything).not.toHaveBeenCalled();
  });

  it('runs accepted lifecycle operations in the background', async () => {
    const launcher = fakeLauncher();
    const server = build(launcher);

    const response = await server.inject({ method: 'POST', url: '/restart', headers: AUTH });

    expect(response.json()).toEqual({ accepted: true });
    expect(launcher.accepts).toHaveBeenCalledWith('restart');
    expect(launcher.restartContainer).toHaveBeenCalledTimes(1);
  });

  it('reports rejection without running the operation', async () => {
    const launcher = fakeLauncher();
    launcher.accepts.mockReturnValue(false);
    const server = build(launcher);

    const response = await server.inject({ method: 'POST', url: '/reset', headers: AUTH });

    expect(response.json()).toEqual({ accepted: false });
    expect(launcher.resetEverything).not.toHaveBeenCalled();
  });

  it('maps each auth route to its continuation', async () => {
    const launcher = fakeLauncher();
    const server = build(launcher);

    await server.inject({ method: 'POST', url: '/auth/oauth', headers: AUTH });
    await server.inject({ method: 'POST', url: '/auth/show-api-key', headers: AUTH });
    await server.inject({ method: 'POST', url: '/auth/skip', headers: AUTH });
    await server.inject({ method: 'POST', url: '/auth/oauth/code', headers: AUTH, payload: { code: 'abc123' } });
    await server.inject({ method: 'POST', url: '/auth/api-key', headers: AUTH, payload: { key: 'test-secret' } });

    expect(launcher.accepts.mock.calls.map(([operation]) => operation)).toEqual([
      'beginOAuth',
      'showApiKeyInput',
      'skipAuth',
      'submitOAuthCode',
      'submitApiKey',
    ]);
    expect(launcher.submitOAuthCode).toHaveBeenCalledWith('abc123');
    expect(launcher.submitApiKey).toHaveBeenCalledWith('test-secret');
  });

  it('rejects an empty authorization code', async () => {
    const launcher = fakeLauncher();
    const server = build(launcher);

    const response = await server.inject({ method: 'POST', url: '/auth/oauth/code', headers: AUTH, payload: { code: '' } });

    expect(response.statusCode).toBe(400);
    expect(launcher.submitOAuthCode).not.toHaveBeenCalled();
  });

  it('tails logs with the requested line count', async () => {
    const launcher = fakeLauncher();
    const server = build(launcher);

    const response = await server.inject({ method: 'POST', url: '/logs', headers: AUTH, payload: { tail: 20 } });

    expect(response.json()).toEqual({ logs: 'gateway listening' });
    expect(launcher.fetchLogs).toHaveBeenCalledWith(20);
  });

  it('validates the tail range', async () => {
    const server = build(fakeLauncher());

    const response = await server.inject({ method: 'POST', url: '/logs', headers: AUTH, payload: { tail: 0 } });

    expect(response.statusCode).toBe(400);
  });

  it('returns the opened control UI url', async () => {
    const server = build(fakeLauncher());

    const response = await server.inject({ method: 'POST', url: '/open', headers: AUTH });

    expect(response.json()).toEqual({ url: snapshot.controlUiUrl });
  });

  it('requests shutdown shortly after answering', async () => {
    const requestShutdown = vi.fn();
    const server = build(fakeLauncher(), requestShutdown);

    const response = await server.inject({ method: 'POST', url: '/shutdown', headers: AUTH });

    expect(response.json()).toEqual({ status: 'stopping' });
    await vi.waitFor(() => expect(requestShutdown).toHaveBeenCalledTimes(1));
  });
});
