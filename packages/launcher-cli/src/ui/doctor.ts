/**
 * Diagnostics printed by `doctor` and `daemon status`
 */

import chalk from 'chalk'
import { arch, platform, release } from 'node:os'
import { configuration } from '@/configuration'
import { SpawnCommandRunner } from '@/docker/commandRunner'
import { DockerClient } from '@/docker/dockerClient'
import { discoverEngine } from '@/docker/dockerPaths'
import { checkIfDaemonRunningAndCleanupStaleState } from '@/daemon/controlClient'
import { findAllLauncherProcesses } from '@/daemon/doctor'
import { StateStore } from '@/launcher/stateStore'
import { readSettings } from '@/persistence'
import { projectPath } from '@/projectPath'
import { getLatestDaemonLog } from '@/ui/logger'

export function getEnvironmentInfo(): Record<string, unknown> {
  return {
    PWD: process.env.PWD,
    OPENCLAW_LAUNCHER_HOME: process.env.OPENCLAW_LAUNCHER_HOME,
    OPENCLAW_LAUNCHER_RUNTIME_DIR: process.env.OPENCLAW_LAUNCHER_RUNTIME_DIR,
    DEBUG: process.env.DEBUG,
    launcherHomeDir: configuration.launcherHomeDir,
    runtimeDir: configuration.runtimeDir,
    logsDir: configuration.logsDir,
    projectRoot: projectPath(),
    cliVersion: configuration.currentCliVersion,
    nodeVersion: process.version,
    platform: `${platform()} ${release()} ${arch()}`,
    isDaemonProcess: configuration.isDaemonProcess,
    argv: process.argv,
  }
}

function section(title: string): void {
  console.log('')
  console.log(chalk.bold.cyan(title))
}

function row(label: string, value: string): void {
  console.log(`  ${chalk.gray(label.padEnd(18))} ${value}`)
}

function yesNo(value: boolean): string {
  return value ? chalk.green('yes') : chalk.red('no')
}

async function printDaemonSection(): Promise<void> {
  section('Daemon')
  const state = await checkIfDaemonRunningAndCleanupStaleState()
  if (!state) {
    row('Running', yesNo(false))
  } else {
    row('Running', yesNo(true))
    row('PID', String(state.pid))
    row('Control port', String(state.httpPort))
    row('Started', state.startTime)
    row('Version', state.startedWithCliVersion)
    row('Last heartbeat', state.lastHeartbeat ?? 'never')
  }
  const latestLog = getLatestDaemonLog()
  row('Latest log', latestLog ? latestLog.path : 'none')

  const processes = await findAllLauncherProcesses()
  section('Launcher processes')
  if (processes.length === 0) {
    console.log(chalk.gray('  none'))
  }
  for (const proc of processes) {
    console.log(`  ${String(proc.pid).padEnd(8)} ${chalk.yellow(proc.type.padEnd(12))} ${proc.command}`)
  }
}

/**
 * `filter` narrows the output to the daemon section
 */
export async function runDoctorCommand(filter: 'all' | 'daemon' = 'all'): Promise<void> {
  if (filter === 'daemon') {
    await printDaemonSection()
    return
  }

  console.log(chalk.bold('OpenClaw launcher doctor'))

  section('Environment')
  row('Version', configuration.currentCliVersion)
  row('Node', process.version)
  row('Platform', `${platform()} ${arch()}`)
  row('State dir', configuration.launcherHomeDir)
  row('Runtime dir', configuration.runtimeDir)

  section('Docker')
  const discovery = discoverEngine()
  row('CLI', discovery.binary ? `${discovery.binary.path} (${discovery.binary.backend})` : chalk.red('not found'))
  row('Desktop app', discovery.app ? `${discovery.app.path} (${discovery.app.backend})` : 'not found')
  const docker = new DockerClient(new SpawnCommandRunner())
  const responding = discovery.binary !== null && await docker.isEngineResponding()
  row('Engine running', yesNo(responding))
  if (responding) {
    row('Gateway container', yesNo(await docker.isContainerRunning(configuration.containerName)))
  }

  section('Launcher state')
  const store = new StateStore()
  row('Initialized', yesNo(store.isInitialized()))
  row('API key profile', yesNo(store.hasApiKeyProfile()))
  row('OAuth credentials', yesNo(store.hasOAuthCredentials()))

  section('Settings')
  const settings = await readSettings()
  for (const [key, value] of Object.entries(settings)) {
    row(key, String(value))
  }

  await printDaemonSection()
}
