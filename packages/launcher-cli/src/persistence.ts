/**
 * Persistence for launcher settings and daemon bookkeeping
 *
 * Settings live in the state directory (settings.json). Daemon state and the
 * daemon lock live in the runtime directory so a full reset never deletes the
 * lock of a running daemon.
 */

import { FileHandle } from 'node:fs/promises'
import { readFile, writeFile, mkdir, open, unlink, rename, stat } from 'node:fs/promises'
import { chmodSync, existsSync, writeFileSync, readFileSync, unlinkSync, mkdirSync } from 'node:fs'
import { constants } from 'node:fs'
import { dirname } from 'node:path'
import * as z from 'zod';
import { configuration } from '@/configuration'
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';

export const SUPPORTED_SCHEMA_VERSION = 1;

export const MEMORY_LIMIT_CHOICES = ['1g', '2g', '4g', '8g'] as const;
// "0" means no CPU ceiling
export const CPU_LIMIT_CHOICES = ['1.0', '2.0', '4.0', '0'] as const;

export const LauncherSettingsSchema = z.object({
  schemaVersion: z.number().int().default(SUPPORTED_SCHEMA_VERSION),
  healthCheckIntervalMs: z.number().int().min(1000).max(60_000).default(5000),
  openBrowserOnStart: z.boolean().default(true),
  dockerImage: z.string().min(1).default(configuration.defaultImage),
  memoryLimit: z.enum(MEMORY_LIMIT_CHOICES).default('2g'),
  cpuLimit: z.enum(CPU_LIMIT_CHOICES).default('2.0'),
  port: z.number().int().min(1).max(65535).default(configuration.defaultPort),
  randomizePort: z.boolean().default(false),
  debugMode: z.boolean().default(false),
});

export type LauncherSettings = z.infer<typeof LauncherSettingsSchema>;

export const defaultSettings: LauncherSettings = LauncherSettingsSchema.parse({});

/**
 * Daemon state persisted locally, written by the daemon so CLI invocations can find it
 */
const DaemonLocallyPersistedStateSchema = z.object({
  pid: z.number().int(),
  httpPort: z.number().int(),
  /** Bearer credential for the control server */
  controlToken: z.string().min(1),
  startTime: z.string(),
  startedWithCliVersion: z.string(),
  lastHeartbeat: z.string().optional(),
  daemonLogPath: z.string().optional(),
});

export type DaemonLocallyPersistedState = z.infer<typeof DaemonLocallyPersistedStateSchema>;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export async function readSettings(): Promise<LauncherSettings> {
  if (!existsSync(configuration.settingsFile)) {
    return { ...defaultSettings }
  }

  try {
    const content = await readFile(configuration.settingsFile, 'utf8')
    const raw: unknown = JSON.parse(content)
    const parsed = LauncherSettingsSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn(`Ignoring invalid settings in ${configuration.settingsFile}: ${parsed.error.issues.map(issue => issue.path.join('.')).join(', ')}`)
      return { ...defaultSettings }
    }

    if (parsed.data.schemaVersion > SUPPORTED_SCHEMA_VERSION) {
      logger.warn(
        `Settings schema v${parsed.data.schemaVersion} > supported v${SUPPORTED_SCHEMA_VERSION}. ` +
        'Update openclaw-launcher for full functionality.'
      );
    }
    return parsed.data
  } catch (error) {
    logger.warn(`Failed to read settings: ${error instanceof Error ? error.message : String(error)}`);
    return { ...defaultSettings }
  }
}

export async function writeSettings(settings: LauncherSettings): Promise<void> {
  await mkdir(dirname(configuration.settingsFile), { recursive: true })
  const tmpFile = configuration.settingsFile + '.tmp';
  await writeFile(tmpFile, JSON.stringify(LauncherSettingsSchema.parse(settings), null, 2))
  await rename(tmpFile, configuration.settingsFile)
}

/**
 * Atomically update settings with multi-process safety via file locking
 * @param updater Function that takes current settings and returns updated settings
 * @returns The updated settings
 */
export async function updateSettings(
  updater: (current: LauncherSettings) => LauncherSettings | Promise<LauncherSettings>
): Promise<LauncherSettings> {
  const LOCK_RETRY_INTERVAL_MS = 100;
  const MAX_LOCK_ATTEMPTS = 50;        // 5 seconds total
  const STALE_LOCK_TIMEOUT_MS = 10000;

  const lockFile = configuration.settingsFile + '.lock';
  let fileHandle: FileHandle | undefined;
  let attempts = 0;

  await mkdir(dirname(configuration.settingsFile), { recursive: true });

  while (attempts < MAX_LOCK_ATTEMPTS) {
    try {
      fileHandle = await open(lockFile, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY);
      break;
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) {
        throw err;
      }
      attempts++;
      await delay(LOCK_RETRY_INTERVAL_MS);

      const stats = await stat(lockFile).catch(() => null);
      if (stats && Date.now() - stats.mtimeMs > STALE_LOCK_TIMEOUT_MS) {
        logger.debug('[PERSISTENCE] Removing stale settings lock');
        await unlink(lockFile).catch((error) => logger.debug('[PERSISTENCE] Stale lock already gone', error));
      }
    }
  }

  if (!fileHandle) {
    throw new Error(`Failed to acquire settings lock after ${MAX_LOCK_ATTEMPTS * LOCK_RETRY_INTERVAL_MS / 1000} seconds`);
  }

  try {
    const current = await readSettings();
    const updated = LauncherSettingsSchema.parse(await updater(current));
    await writeSettings(updated);
    return updated;
  } finally {
    await fileHandle.close();
    await unlink(lockFile).catch((error) => logger.debug('[PERSISTENCE] Failed to remove settings lock', error));
  }
}

function parseBooleanSetting(key: string, value: string): boolean {
  if (value !== 'true' && value !== 'false') {
    throw new Error(`${key} must be true or false`);
  }
  return value === 'true';
}

/**
 * Parses a `settings set <key> <value>` pair into a settings patch
 */
export function parseSettingAssignment(key: string, value: string): Partial<LauncherSettings> {
  switch (key) {
    case 'healthCheckIntervalMs':
      return { healthCheckIntervalMs: LauncherSettingsSchema.shape.healthCheckIntervalMs.parse(Number(value)) };
    case 'port':
      return { port: LauncherSettingsSchema.shape.port.parse(Number(value)) };
    case 'openBrowserOnStart':
      return { openBrowserOnStart: parseBooleanSetting(key, value) };
    case 'randomizePort':
      return { randomizePort: parseBooleanSetting(key, value) };
    case 'debugMode':
      return { debugMode: parseBooleanSetting(key, value) };
    case 'dockerImage':
      return { dockerImage: LauncherSettingsSchema.shape.dockerImage.parse(value) };
    case 'memoryLimit':
      return { memoryLimit: z.enum(MEMORY_LIMIT_CHOICES).parse(value) };
    case 'cpuLimit':
      return { cpuLimit: z.enum(CPU_LIMIT_CHOICES).parse(value) };
    default:
      throw new Error(`Unknown setting: ${key}`);
  }
}

/**
 * Read daemon state from local file
 */
export async function readDaemonState(): Promise<DaemonLocallyPersistedState | null> {
  try {
    if (!existsSync(configuration.daemonStateFile)) {
      return null;
    }
    const content = await readFile(configuration.daemonStateFile, 'utf-8');
    return DaemonLocallyPersistedStateSchema.parse(JSON.parse(content));
  } catch (error) {
    logger.debug(`[PERSISTENCE] Daemon state file corrupted: ${configuration.daemonStateFile}`, error);
    return null;
  }
}

/**
 * Write daemon state to local file (synchronously so signal handlers can call it).
 * Owner-only: the file carries the control token.
 */
export function writeDaemonState(state: DaemonLocallyPersistedState): void {
  mkdirSync(dirname(configuration.daemonStateFile), { recursive: true, mode: 0o700 });
  writeFileSync(configuration.daemonStateFile, JSON.stringify(state, null, 2), { encoding: 'utf-8', mode: 0o600 });
  // mode only applies when the file is created
  chmodSync(configuration.daemonStateFile, 0o600);
}

/**
 * Clean up daemon state file and lock file
 */
export async function clearDaemonState(): Promise<void> {
  if (existsSync(configuration.daemonStateFile)) {
    await unlink(configuration.daemonStateFile);
  }
  if (existsSync(configuration.daemonLockFile)) {
    await unlink(configuration.daemonLockFile).catch((error) => {
      // Still held by a running daemon
      logger.debug('[PERSISTENCE] Could not remove daemon lock file', error);
    });
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means it exists but belongs to someone else
    return hasErrorCode(error, 'EPERM');
  }
}

/**
 * Acquire an exclusive lock file for the daemon.
 * The lock file proves the daemon is running and prevents multiple instances.
 * Returns the file handle to hold for the daemon's lifetime, or null if locked.
 */
export async function acquireDaemonLock(
  maxAttempts: number = 5,
  delayIncrementMs: number = 200
): Promise<FileHandle | null> {
  await mkdir(dirname(configuration.daemonLockFile), { recursive: true });

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const fileHandle = await open(
        configuration.daemonLockFile,
        constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY
      );
      await fileHandle.writeFile(String(process.pid));
      return fileHandle;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
      const lockPid = Number(readLockFile());
      if (lockPid > 0 && !isProcessAlive(lockPid)) {
        logger.debug(`[PERSISTENCE] Removing stale daemon lock held by dead PID ${lockPid}`);
        unlinkSync(configuration.daemonLockFile);
        continue;
      }

      if (attempt === maxAttempts) {
        return null;
      }
      await delay(attempt * delayIncrementMs);
    }
  }
  return null;
}

function readLockFile(): string {
  try {
    return readFileSync(configuration.daemonLockFile, 'utf-8').trim();
  } catch (error) {
    logger.debug('[PERSISTENCE] Could not read daemon lock file', error);
    return '';
  }
}

/**
 * Release daemon lock by closing handle and deleting lock file
 */
export async function releaseDaemonLock(lockHandle: FileHandle): Promise<void> {
  await lockHandle.close().catch((error) => logger.debug('[PERSISTENCE] Lock handle already closed', error));
  if (existsSync(configuration.daemonLockFile)) {
    await unlink(configuration.daemonLockFile).catch((error) => logger.debug('[PERSISTENCE] Could not remove daemon lock file', error));
  }
}
