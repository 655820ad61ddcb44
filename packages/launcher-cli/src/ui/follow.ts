import React from 'react';
import { render } from 'ink';
import { getLauncherStatus } from '@/daemon/controlClient';
import type { LauncherSnapshot } from '@/launcher/types';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';
import { isSettled } from './format';
import { LaunchProgress } from './ink/LaunchProgress';

export interface FollowOptions {
  pollIntervalMs?: number;
  /** Image pulls on a slow link take minutes */
  timeoutMs?: number;
}

/**
 * Renders the daemon's step log until the lifecycle settles.
 * Resolves to the last snapshot, or null when the daemon stopped answering.
 */
export async function followLauncher(options: FollowOptions = {}): Promise<LauncherSnapshot | null> {
  const pollIntervalMs = options.pollIntervalMs ?? 500;
  const deadline = Date.now() + (options.timeoutMs ?? 15 * 60_000);

  const instance = render(React.createElement(LaunchProgress, { snapshot: null }));
  let last: LauncherSnapshot | null = null;
  try {
    while (Date.now() < deadline) {
      const snapshot = await getLauncherStatus();
      if (!snapshot) {
        logger.debug('[FOLLOW] Daemon stopped answering');
        return null;
      }
      last = snapshot;
      instance.rerender(React.createElement(LaunchProgress, { snapshot }));
      if (isSettled(snapshot)) {
        return snapshot;
      }
      await delay(pollIntervalMs);
    }
    logger.debug('[FOLLOW] Gave up waiting for the launcher to settle');
    return last;
  } finally {
    instance.unmount();
  }
}

/**
 * Polls without rendering, for use between interactive prompts
 */
export async function waitForSnapshot(
  predicate: (snapshot: LauncherSnapshot) => boolean,
  timeoutMs: number = 30_000,
  pollIntervalMs: number = 200,
): Promise<LauncherSnapshot | null> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const snapshot = await getLauncherStatus();
    if (!snapshot) {
      return null;
    }
    if (predicate(snapshot)) {
      return snapshot;
    }
    await delay(pollIntervalMs);
  }
  return null;
}
