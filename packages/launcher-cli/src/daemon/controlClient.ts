/**
 * HTTP client for the daemon control server
 * Every call resolves to null when no daemon answers, so callers decide whether to start one
 */

import { z } from 'zod';
import { configuration } from '@/configuration';
import type { LauncherSnapshot } from '@/launcher/types';
import { clearDaemonState, isProcessAlive, readDaemonState, type DaemonLocallyPersistedState } from '@/persistence';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';
import {
  AcceptedResponseSchema,
  LauncherSnapshotSchema,
  LogsResponseSchema,
  OpenResponseSchema,
  ShutdownResponseSchema,
} from './protocol';

const REQUEST_TIMEOUT_MS = 10_000;

export type LifecycleRoute = '/start' | '/stop' | '/restart' | '/reset' | '/reauth' | '/auth/oauth' | '/auth/show-api-key' | '/auth/skip';

async function daemonPost<T>(path: string, schema: z.ZodType<T>, body: object = {}): Promise<T | null> {
  const state = await readDaemonState();
  if (!state?.httpPort) {
    logger.debug('[CONTROL CLIENT] No daemon state, nothing to talk to');
    return null;
  }

  try {
    const response = await fetch(`http://127.0.0.1:${state.httpPort}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${state.controlToken}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      logger.debug(`[CONTROL CLIENT] ${path} answered ${response.status}`);
      return null;
    }
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      logger.debug(`[CONTROL CLIENT] Unexpected ${path} response`, parsed.error.issues);
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.debug(`[CONTROL CLIENT] ${path} request failed`, error);
    return null;
  }
}

export function getLauncherStatus(): Promise<LauncherSnapshot | null> {
  return daemonPost('/status', LauncherSnapshotSchema);
}

/** True when the daemon took the request; false when it refused; null when unreachable */
export async function requestLifecycle(route: LifecycleRoute): Promise<boolean | null> {
  const result = await daemonPost(route, AcceptedResponseSchema);
  return result ? result.accepted : null;
}

export async function submitOAuthCode(code: string): Promise<boolean | null> {
  const result = await daemonPost('/auth/oauth/code', AcceptedResponseSchema, { code });
  return result ? result.accepted : null;
}

export async function submitApiKey(key: string): Promise<boolean | null> {
  const result = await daemonPost('/auth/api-key', AcceptedResponseSchema, { key });
  return result ? result.accepted : null;
}

export async function fetchContainerLogs(tail?: number): Promise<string | null> {
  const result = await daemonPost('/logs', LogsResponseSchema, tail === undefined ? {} : { tail });
  return result ? result.logs : null;
}

/** The opened URL; undefined when the daemon is unreachable */
export async function openControlUi(): Promise<string | null | undefined> {
  const result = await daemonPost('/open', OpenResponseSchema);
  return result ? result.url : undefined;
}

function terminate(pid: number): void {
  try {
    process.kill(pid, 'SIGTERM');
  } catch (error) {
    logger.debug(`[CONTROL CLIENT] SIGTERM to ${pid} failed`, error);
  }
}

/**
 * Reads the daemon state and removes it when its process is gone
 */
export async function checkIfDaemonRunningAndCleanupStaleState(): Promise<DaemonLocallyPersistedState | null> {
  const state = await readDaemonState();
  if (!state) {
    return null;
  }
  if (isProcessAlive(state.pid)) {
    return state;
  }

  logger.debug(`[CONTROL CLIENT] Daemon PID ${state.pid} is gone, removing stale state`);
  await clearDaemonState();
  return null;
}

export async function isDaemonRunningCurrentlyInstalledVersion(): Promise<boolean> {
  const state = await checkIfDaemonRunningAndCleanupStaleState();
  if (!state) {
    return false;
  }
  const matches = state.startedWithCliVersion === configuration.currentCliVersion;
  logger.debug(`[CONTROL CLIENT] Daemon ${state.startedWithCliVersion} vs CLI ${configuration.currentCliVersion}: ${matches ? 'match' : 'mismatch'}`);
  return matches;
}

/**
 * Asks the daemon to shut down and waits for its process to exit, escalating to SIGTERM
 */
export async function stopDaemon(timeoutMs: number = 5_000): Promise<void> {
  const state = await checkIfDaemonRunningAndCleanupStaleState();
  if (!state) {
    logger.debug('[CONTROL CLIENT] No daemon running');
    return;
  }

  const answered = await daemonPost('/shutdown', ShutdownResponseSchema);
  if (!answered) {
    logger.debug(`[CONTROL CLIENT] Daemon did not answer, sending SIGTERM to ${state.pid}`);
    terminate(state.pid);
  }

  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessAlive(state.pid)) {
      await clearDaemonState();
      return;
    }
    await delay(100);
  }

  if (answered) {
    logger.debug(`[CONTROL CLIENT] Daemon ${state.pid} still alive after shutdown request, sending SIGTERM`);
    terminate(state.pid);
  }
}
