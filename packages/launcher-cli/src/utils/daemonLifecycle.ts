import { isDaemonRunningCurrentlyInstalledVersion, stopDaemon } from '@/daemon/controlClient';
import { readDaemonState } from '@/persistence';
import { spawnLauncherCLI } from '@/utils/spawnLauncherCLI';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';

const STARTUP_POLL_INTERVAL_MS = 100;
const STARTUP_TIMEOUT_MS = 10_000;

/**
 * Makes sure a daemon of this version is serving the control channel.
 * Returns false when none came up in time.
 */
export async function ensureDaemonRunning(): Promise<boolean> {
  logger.debug('Ensuring launcher daemon is running & matches our version...');
  if (await isDaemonRunningCurrentlyInstalledVersion()) {
    return true;
  }

  // An outdated daemon still holds the lock
  await stopDaemon();

  logger.debug('Starting launcher daemon...');
  const daemonProcess = spawnLauncherCLI(['daemon', 'start-sync'], {
    detached: true,
    stdio: 'ignore',
    env: process.env
  });
  daemonProcess.unref();

  // The state file appears once the control server listens
  for (let waited = 0; waited < STARTUP_TIMEOUT_MS; waited += STARTUP_POLL_INTERVAL_MS) {
    await delay(STARTUP_POLL_INTERVAL_MS);
    const state = await readDaemonState();
    if (state && state.pid === daemonProcess.pid) {
      return true;
    }
  }
  logger.debug('Daemon did not write its state in time');
  return false;
}
