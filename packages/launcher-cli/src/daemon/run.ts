import { configuration, readPackageVersion } from '@/configuration';
import { generateGatewaySecret } from '@/launcher/gatewaySecret';
import { LaunchOrchestrator } from '@/launcher/orchestrator';
import type { LauncherState } from '@/launcher/types';
import { logger } from '@/ui/logger';
import { getEnvironmentInfo } from '@/ui/doctor';
import { spawnLauncherCLI } from '@/utils/spawnLauncherCLI';
import { delay } from '@/utils/time';
import {
  acquireDaemonLock,
  clearDaemonState,
  DaemonLocallyPersistedState,
  readDaemonState,
  readSettings,
  releaseDaemonLock,
  writeDaemonState,
} from '@/persistence';

import { isDaemonRunningCurrentlyInstalledVersion, stopDaemon } from './controlClient';
import { startDaemonControlServer } from './controlServer';

type ShutdownSource = 'cli' | 'os-signal' | 'exception';

export async function startDaemon(): Promise<void> {
  // We don't have cleanup function at the time of server construction
  // Control flow is:
  // 1. Create promise that will resolve when shutdown is requested
  // 2. Setup signal handlers to resolve this promise with the source of the shutdown
  // 3. Once our setup is complete - if all goes well - we await this promise
  // 4. When it resolves we can cleanup and exit
  //
  // In case the setup malfunctions - our signal handlers will not properly
  // shut down. We will force exit the process with code 1.
  let requestShutdown: (source: ShutdownSource, errorMessage?: string) => void = () => undefined;
  const resolvesWhenShutdownRequested = new Promise<{ source: ShutdownSource; errorMessage?: string }>((resolve) => {
    requestShutdown = (source, errorMessage) => {
      logger.debug(`[DAEMON RUN] Requesting shutdown (source: ${source}, errorMessage: ${errorMessage})`);

      // Fallback - in case cleanup hangs - force exit with code 1
      setTimeout(() => {
        logger.debug('[DAEMON RUN] Cleanup malfunctioned, forcing exit with code 1');
        process.exit(1);
      }, 5_000).unref();

      resolve({ source, errorMessage });
    };
  });

  process.on('SIGINT', () => {
    logger.debug('[DAEMON RUN] Received SIGINT');
    requestShutdown('os-signal');
  });

  process.on('SIGTERM', () => {
    logger.debug('[DAEMON RUN] Received SIGTERM');
    requestShutdown('os-signal');
  });

  process.on('uncaughtException', (error) => {
    logger.debug('[DAEMON RUN] FATAL: Uncaught exception', error);
    requestShutdown('exception', error.message);
  });

  process.on('unhandledRejection', (reason) => {
    logger.debug('[DAEMON RUN] FATAL: Unhandled promise rejection', reason);
    const error = reason instanceof Error ? reason : new Error(`Unhandled promise rejection: ${String(reason)}`);
    requestShutdown('exception', error.message);
  });

  process.on('exit', (code) => {
    logger.debug(`[DAEMON RUN] Process exiting with code: ${code}`);
  });

  logger.debug('[DAEMON RUN] Starting daemon process...');
  logger.debugLargeJson('[DAEMON RUN] Environment', getEnvironmentInfo());

  if (await isDaemonRunningCurrentlyInstalledVersion()) {
    logger.debug('[DAEMON RUN] Daemon version matches, keeping existing daemon');
    console.log('Daemon already running with matching version');
    process.exit(0);
  }
  // Outdated or stale daemon state
  await stopDaemon();

  // Acquire exclusive lock (proves daemon is running)
  const daemonLockHandle = await acquireDaemonLock(5, 200);
  if (!daemonLockHandle) {
    logger.debug('[DAEMON RUN] Daemon lock file already held, another daemon is running');
    process.exit(0);
  }

  try {
    const orchestrator = new LaunchOrchestrator();
    let lastState: LauncherState | null = null;
    let lastStepCount = 0;
    orchestrator.subscribe((snapshot) => {
      if (snapshot.state !== lastState) {
        logger.debug(`[DAEMON RUN] Launcher state: ${lastState ?? 'none'} -> ${snapshot.state}`);
        lastState = snapshot.state;
      }
      const newSteps = snapshot.steps.length >= lastStepCount ? snapshot.steps.slice(lastStepCount) : snapshot.steps;
      for (const step of newSteps) {
        logger.debug(`[DAEMON RUN] Step ${step.status}: ${step.message}`);
      }
      lastStepCount = snapshot.steps.length;
    });

    // Fresh per daemon; CLI invocations read it from the state file
    const controlToken = generateGatewaySecret();
    const { port: controlPort, stop: stopControlServer } = await startDaemonControlServer({
      launcher: orchestrator,
      requestShutdown: () => requestShutdown('cli'),
      controlToken,
    });

    // Write initial daemon state (no lock needed for state file)
    const fileState: DaemonLocallyPersistedState = {
      pid: process.pid,
      httpPort: controlPort,
      controlToken,
      startTime: new Date().toLocaleString(),
      startedWithCliVersion: configuration.currentCliVersion,
      daemonLogPath: logger.logFilePath,
    };
    writeDaemonState(fileState);
    logger.debug('[DAEMON RUN] Daemon state written');

    const settings = await readSettings();
    if (settings.debugMode) {
      logger.debugLargeJson('[DAEMON RUN] Settings', settings);
    }

    // Every 60 seconds:
    // 1. Check if the installed version changed underneath us
    // 2. Check that the state file still names this process
    // 3. Write heartbeat
    const heartbeatIntervalMs = Number.parseInt(process.env.OPENCLAW_LAUNCHER_HEARTBEAT_INTERVAL || '60000', 10);
    let heartbeatRunning = false;
    const heartbeat = setInterval(() => {
      if (heartbeatRunning) {
        return;
      }
      heartbeatRunning = true;

      void (async () => {
        const installedVersion = readPackageVersion();
        if (installedVersion !== configuration.currentCliVersion) {
          logger.debug(`[DAEMON RUN] Installed version ${installedVersion} differs from ${configuration.currentCliVersion}, handing over`);
          clearInterval(heartbeat);

          // The new daemon stops us through the control channel once it starts
          const replacement = spawnLauncherCLI(['daemon', 'start'], {
            detached: true,
            stdio: 'ignore',
          });
          replacement.unref();
          return;
        }

        const daemonState = await readDaemonState();
        if (daemonState && daemonState.pid !== process.pid) {
          logger.debug('[DAEMON RUN] A different daemon owns the state file');
          requestShutdown('exception', 'A different daemon was started without stopping this one');
          return;
        }

        const updatedState: DaemonLocallyPersistedState = {
          ...fileState,
          lastHeartbeat: new Date().toLocaleString(),
        };
        writeDaemonState(updatedState);
        if (process.env.DEBUG) {
          logger.debug(`[DAEMON RUN] Heartbeat written at ${updatedState.lastHeartbeat}`);
        }
      })()
        .catch((error) => logger.debug('[DAEMON RUN] Heartbeat failed', error))
        .finally(() => {
          heartbeatRunning = false;
        });
    }, heartbeatIntervalMs);

    // The gateway container outlives the daemon; the next daemon recovers it
    const cleanupAndShutdown = async (source: ShutdownSource, errorMessage?: string) => {
      logger.debug(`[DAEMON RUN] Starting proper cleanup (source: ${source}, errorMessage: ${errorMessage})...`);

      clearInterval(heartbeat);
      orchestrator.dispose();

      await stopControlServer();
      // Only remove the state file if it still describes us
      const currentState = await readDaemonState();
      if (currentState?.pid === process.pid) {
        await clearDaemonState();
      }
      await releaseDaemonLock(daemonLockHandle);

      logger.debug('[DAEMON RUN] Cleanup completed, exiting process');
      // Give time for logs to be flushed
      await delay(100);
      process.exit(0);
    };

    logger.debug('[DAEMON RUN] Daemon started successfully, waiting for shutdown request');

    const shutdownRequest = await resolvesWhenShutdownRequested;
    await cleanupAndShutdown(shutdownRequest.source, shutdownRequest.errorMessage);
  } catch (error) {
    logger.debug('[DAEMON RUN][FATAL] Failed somewhere unexpectedly - exiting with code 1', error);
    await releaseDaemonLock(daemonLockHandle);
    process.exit(1);
  }
}
