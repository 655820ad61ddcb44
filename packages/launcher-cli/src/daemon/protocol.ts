/**
 * Wire shapes of the daemon control channel, shared by the server and the client
 */

import { z } from 'zod';
import type { LauncherSnapshot } from '@/launcher/types';

const LaunchFailureSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('EngineNotInstalled') }),
  z.object({ kind: z.literal('EngineNotRunning') }),
  z.object({ kind: z.literal('ImagePullFailed'), detail: z.string() }),
  z.object({ kind: z.literal('ContainerStartFailed'), detail: z.string() }),
  z.object({ kind: z.literal('NoSecretAvailable') }),
  z.object({ kind: z.literal('UnexpectedContainerExit') }),
]);

const RemediationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('openDownloadPage'), url: z.string() }),
  z.object({ kind: z.literal('openEngineApp'), path: z.string().nullable() }),
]);

export const LauncherSnapshotSchema: z.ZodType<LauncherSnapshot> = z.object({
  state: z.enum(['idle', 'working', 'needsAuth', 'waitingForAuthInput', 'running', 'stopped', 'error']),
  busy: z.boolean(),
  steps: z.array(z.object({
    status: z.enum(['pending', 'running', 'done', 'error', 'warning']),
    message: z.string(),
    at: z.number(),
  })),
  gatewayToken: z.string().nullable(),
  port: z.number().int().nullable(),
  controlUiUrl: z.string().nullable(),
  health: z.object({
    healthy: z.boolean(),
    consecutiveFailures: z.number().int(),
    uptimeSeconds: z.number().optional(),
  }),
  containerStartedAt: z.number().nullable(),
  pullProgress: z.string().nullable(),
  authInputMode: z.enum(['oauthCode', 'apiKey']).nullable(),
  authorizeUrl: z.string().nullable(),
  authExpired: z.boolean(),
  lastFailure: LaunchFailureSchema.nullable(),
  remediation: RemediationSchema.nullable(),
});

export const AcceptedResponseSchema = z.object({
  accepted: z.boolean(),
});

export const OAuthCodeBodySchema = z.object({
  code: z.string().min(1),
});

export const ApiKeyBodySchema = z.object({
  key: z.string(),
});

export const LogsBodySchema = z.object({
  tail: z.number().int().min(1).max(10_000).optional(),
});

export const LogsResponseSchema = z.object({
  logs: z.string(),
});

export const OpenResponseSchema = z.object({
  url: z.string().nullable(),
});

export const ShutdownResponseSchema = z.object({
  status: z.literal('stopping'),
});
