import spawn from 'cross-spawn';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { join } from 'node:path';
import { projectPath } from '@/projectPath';
import { logger } from '@/ui/logger';

/**
 * Entry script of this installation; it registers tsx before loading the sources
 */
export function launcherEntryPoint(): string {
  return join(projectPath(), 'bin', 'openclaw-launcher.mjs');
}

/**
 * Runs another launcher command with the same Node binary as the current process
 */
export function spawnLauncherCLI(args: string[], options: SpawnOptions = {}): ChildProcess {
  const fullArgs = [launcherEntryPoint(), ...args];
  logger.debug(`[SPAWN] ${process.execPath} ${fullArgs.join(' ')}`);
  return spawn(process.execPath, fullArgs, options);
}
