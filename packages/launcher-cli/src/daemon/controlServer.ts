/**
 * HTTP control server for the launcher daemon
 * Exposes the orchestrator's snapshot and operations to CLI invocations on loopback
 */

import { timingSafeEqual } from 'node:crypto';
import fastify, { FastifyInstance } from 'fastify';
import { serializerCompiler, validatorCompiler, ZodTypeProvider } from 'fastify-type-provider-zod';
import { logger } from '@/ui/logger';
import type { LaunchOrchestrator, LauncherOperation } from '@/launcher/orchestrator';
import {
  AcceptedResponseSchema,
  ApiKeyBodySchema,
  LauncherSnapshotSchema,
  LogsBodySchema,
  LogsResponseSchema,
  OAuthCodeBodySchema,
  OpenResponseSchema,
  ShutdownResponseSchema,
} from './protocol';

export type ControlledLauncher = Pick<
  LaunchOrchestrator,
  | 'getSnapshot'
  | 'accepts'
  | 'start'
  | 'stopContainer'
  | 'restartContainer'
  | 'resetEverything'
  | 'reAuthenticate'
  | 'beginOAuth'
  | 'showApiKeyInput'
  | 'submitOAuthCode'
  | 'submitApiKey'
  | 'skipAuth'
  | 'fetchLogs'
  | 'openControlUi'
>;

export interface ControlServerOptions {
  launcher: ControlledLauncher;
  requestShutdown: () => void;
  /** Every request must carry `Authorization: Bearer <controlToken>` */
  controlToken: string;
}

function bearerMatches(header: string | undefined, controlToken: string): boolean {
  if (!header) {
    return false;
  }
  const presented = Buffer.from(header);
  const expected = Buffer.from(`Bearer ${controlToken}`);
  return presented.length === expected.length && timingSafeEqual(presented, expected);
}

export function buildControlServer({ launcher, requestShutdown, controlToken }: ControlServerOptions): FastifyInstance {
  const app = fastify({
    logger: false // We use our own logger
  });

  // Loopback is reachable by every local user; the token lives in the owner-only state file
  app.addHook('onRequest', async (request, reply) => {
    if (!bearerMatches(request.headers.authorization, controlToken)) {
      logger.debug(`[CONTROL SERVER] Rejected unauthenticated ${request.url}`);
      return reply.code(401).send({ error: 'Unauthorized' });
    }
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);
  const typed = app.withTypeProvider<ZodTypeProvider>();

  // Lifecycle operations answer right away; the CLI follows progress through /status
  const runInBackground = (operation: LauncherOperation, run: () => Promise<boolean>): { accepted: boolean } => {
    const accepted = launcher.accepts(operation);
    logger.debug(`[CONTROL SERVER] ${operation} request: ${accepted ? 'accepted' : 'rejected'}`);
    if (accepted) {
      void run().catch((error) => logger.debug(`[CONTROL SERVER] ${operation} failed`, error));
    }
    return { accepted };
  };

  typed.post('/status', {
    schema: {
      response: {
        200: LauncherSnapshotSchema
      }
    }
  }, async () => launcher.getSnapshot());

  const lifecycleRoutes: Array<[string, LauncherOperation, () => Promise<boolean>]> = [
    ['/start', 'start', () => launcher.start()],
    ['/stop', 'stop', () => launcher.stopContainer()],
    ['/restart', 'restart', () => launcher.restartContainer()],
    ['/reset', 'reset', () => launcher.resetEverything()],
    ['/reauth', 'reauth', () => launcher.reAuthenticate()],
    ['/auth/oauth', 'beginOAuth', () => launcher.beginOAuth()],
    ['/auth/show-api-key', 'showApiKeyInput', () => launcher.showApiKeyInput()],
    ['/auth/skip', 'skipAuth', () => launcher.skipAuth()],
  ];

  for (const [path, operation, run] of lifecycleRoutes) {
    typed.post(path, {
      schema: {
        response: {
          200: AcceptedResponseSchema
        }
      }
    }, async () => runInBackground(operation, run));
  }

  typed.post('/auth/oauth/code', {
    schema: {
      body: OAuthCodeBodySchema,
      response: {
        200: AcceptedResponseSchema
      }
    }
  }, async (request) => {
    const { code } = request.body;
    return runInBackground('submitOAuthCode', () => launcher.submitOAuthCode(code));
  });

  typed.post('/auth/api-key', {
    schema: {
      body: ApiKeyBodySchema,
      response: {
        200: AcceptedResponseSchema
      }
    }
  }, async (request) => {
    const { key } = request.body;
    return runInBackground('submitApiKey', () => launcher.submitApiKey(key));
  });

  typed.post('/logs', {
    schema: {
      body: LogsBodySchema,
      response: {
        200: LogsResponseSchema
      }
    }
  }, async (request) => {
    const logs = await launcher.fetchLogs(request.body.tail);
    return { logs };
  });

  typed.post('/open', {
    schema: {
      response: {
        200: OpenResponseSchema
      }
    }
  }, async () => {
    const url = await launcher.openControlUi();
    return { url };
  });

  typed.post('/shutdown', {
    schema: {
      response: {
        200: ShutdownResponseSchema
      }
    }
  }, async () => {
    logger.debug('[CONTROL SERVER] Stop daemon request received');

    // Give time for response to arrive
    setTimeout(() => {
      logger.debug('[CONTROL SERVER] Triggering daemon shutdown');
      requestShutdown();
    }, 50);

    return { status: 'stopping' as const };
  });

  return app;
}

export async function startDaemonControlServer(options: ControlServerOptions): Promise<{ port: number; stop: () => Promise<void> }> {
  const app = buildControlServer(options);
  await app.listen({ port: 0, host: '127.0.0.1' });

  const address = app.server.address();
  if (address === null || typeof address === 'string') {
    await app.close();
    throw new Error(`Control server bound to an unexpected address: ${String(address)}`);
  }
  logger.debug(`[CONTROL SERVER] Started on port ${address.port}`);

  return {
    port: address.port,
    stop: async () => {
      logger.debug('[CONTROL SERVER] Stopping server');
      await app.close();
      logger.debug('[CONTROL SERVER] Server stopped');
    }
  };
}
