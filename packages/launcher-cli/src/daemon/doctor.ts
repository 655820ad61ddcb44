/**
 * Daemon doctor utilities
 *
 * Process discovery and cleanup for launcher daemons that outlived their state file
 */

import psList from 'ps-list';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';

export type LauncherProcessType =
  | 'current'
  | 'daemon'
  | 'dev-daemon'
  | 'doctor'
  | 'dev-doctor'
  | 'cli'
  | 'dev-cli';

export type LauncherProcessInfo = { pid: number; command: string; type: LauncherProcessType };

const RUNAWAY_TYPES: readonly LauncherProcessType[] = ['daemon', 'dev-daemon'];

/**
 * Classify a process as launcher-related.
 * Returns null when the process is unrelated.
 */
export function classifyLauncherProcess(proc: { pid: number; name?: string; cmd?: string }): LauncherProcessInfo | null {
  const cmd = proc.cmd || '';
  const name = proc.name || '';

  const isLauncher =
    cmd.includes('openclaw-launcher') ||
    cmd.includes('launcher-cli/src/index.ts') ||
    name === 'openclaw-launcher';

  if (!isLauncher) {
    return null;
  }

  const dev = cmd.includes('tsx') || cmd.includes('src/index.ts');
  let type: LauncherProcessType;
  if (proc.pid === process.pid) {
    type = 'current';
  } else if (cmd.includes('daemon start-sync')) {
    type = dev ? 'dev-daemon' : 'daemon';
  } else if (cmd.includes('doctor')) {
    type = dev ? 'dev-doctor' : 'doctor';
  } else {
    type = dev ? 'dev-cli' : 'cli';
  }

  return { pid: proc.pid, command: cmd || name, type };
}

/**
 * Find all launcher processes (including current process)
 */
export async function findAllLauncherProcesses(): Promise<LauncherProcessInfo[]> {
  try {
    const processes = await psList();
    const allProcesses: LauncherProcessInfo[] = [];

    for (const proc of processes) {
      const classified = classifyLauncherProcess(proc);
      if (!classified) continue;
      allProcesses.push(classified);
    }

    return allProcesses;
  } catch (error) {
    logger.debug('[DOCTOR] Could not list processes', error);
    return [];
  }
}

/**
 * Daemons other than the current process
 */
export async function findRunawayLauncherProcesses(): Promise<Array<{ pid: number; command: string }>> {
  const allProcesses = await findAllLauncherProcesses();
  return allProcesses
    .filter((p) => p.pid !== process.pid && RUNAWAY_TYPES.includes(p.type))
    .map((p) => ({ pid: p.pid, command: p.command }));
}

/**
 * Kill all runaway launcher daemons. The gateway container is left alone.
 */
export async function killRunawayLauncherProcesses(): Promise<{ killed: number; errors: Array<{ pid: number; error: string }> }> {
  const runawayProcesses = await findRunawayLauncherProcesses();
  const errors: Array<{ pid: number; error: string }> = [];
  let killed = 0;

  for (const { pid, command } of runawayProcesses) {
    try {
      console.log(`Killing runaway process PID ${pid}: ${command}`);
      process.kill(pid, 'SIGTERM');

      await delay(1000);

      const processes = await psList();
      if (processes.some((p) => p.pid === pid)) {
        console.log(`Process PID ${pid} ignored SIGTERM, using SIGKILL`);
        process.kill(pid, 'SIGKILL');
      }

      console.log(`Successfully killed runaway process PID ${pid}`);
      killed++;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      errors.push({ pid, error: errorMessage });
      console.log(`Failed to kill process PID ${pid}: ${errorMessage}`);
    }
  }

  return { killed, errors };
}
