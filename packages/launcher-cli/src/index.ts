/**
 * CLI entry point for the openclaw-launcher command
 *
 * Simple argument parsing without any CLI framework dependencies
 */

import chalk from 'chalk'
import { z } from 'zod'
import { createInterface } from 'node:readline/promises'
import { configuration } from './configuration'
import { logger, getLatestDaemonLog } from './ui/logger'
import { readSettings, updateSettings, parseSettingAssignment } from './persistence'
import { startDaemon } from './daemon/run'
import {
  checkIfDaemonRunningAndCleanupStaleState,
  fetchContainerLogs,
  getLauncherStatus,
  openControlUi,
  requestLifecycle,
  stopDaemon,
  type LifecycleRoute,
} from './daemon/controlClient'
import { killRunawayLauncherProcesses } from './daemon/doctor'
import { runDoctorCommand } from './ui/doctor'
import { createTerminalAuthPrompt, runAuthPrompt } from './ui/auth'
import { followLauncher } from './ui/follow'
import { formatStatusReport } from './ui/format'
import type { LauncherSnapshot } from './launcher/types'
import { ensureDaemonRunning } from './utils/daemonLifecycle'
import { spawnLauncherCLI } from './utils/spawnLauncherCLI'
import { delay } from './utils/time'

const TailSchema = z.coerce.number().int().min(1).max(10_000)

function printHelp(): void {
  console.log(`
${chalk.bold('openclaw-launcher')} - Run the OpenClaw gateway in a locked-down Docker container

${chalk.bold('Usage:')}
  openclaw-launcher [start]          Start (or recover) the gateway and follow progress
  openclaw-launcher stop             Stop the gateway container
  openclaw-launcher restart          Restart the gateway container
  openclaw-launcher reset [--yes]    Remove the container and all local state
  openclaw-launcher reauth           Forget saved credentials and sign in again
  openclaw-launcher status           Show gateway state, health and Control UI address
  openclaw-launcher logs [--tail N]  Print the gateway container logs
  openclaw-launcher open             Open the Control UI in the browser
  openclaw-launcher settings         Show settings
  openclaw-launcher settings set <key> <value>
                                     Change a setting (takes effect on next start)
  openclaw-launcher daemon           Manage the background service
  openclaw-launcher doctor           System diagnostics & troubleshooting

${chalk.bold('Options:')}
  -v, --version                      Print the version
  -h, --help                         Show this help
`)
}

function printDaemonHelp(): void {
  console.log(`
${chalk.bold('openclaw-launcher daemon')} - Daemon management

${chalk.bold('Usage:')}
  openclaw-launcher daemon start     Start the daemon (detached)
  openclaw-launcher daemon stop      Stop the daemon (the gateway container keeps running)
  openclaw-launcher daemon status    Show daemon status
  openclaw-launcher daemon logs      Print the path of the latest daemon log

  If you want to kill all launcher daemons run
  ${chalk.cyan('openclaw-launcher doctor clean')}

${chalk.bold('Note:')} The daemon owns the launch state and runs health checks while the gateway is up.
`)
}

async function requireDaemon(): Promise<void> {
  if (!(await ensureDaemonRunning())) {
    throw new Error(`Launcher daemon did not start. See ${configuration.logsDir}`)
  }
}

async function requireStatus(): Promise<LauncherSnapshot> {
  const snapshot = await getLauncherStatus()
  if (!snapshot) {
    throw new Error('Launcher daemon is not reachable')
  }
  return snapshot
}

function printOutcome(snapshot: LauncherSnapshot): void {
  console.log('')
  if (snapshot.state === 'running') {
    console.log(chalk.green('OpenClaw is running'))
  }
  for (const line of formatStatusReport(snapshot)) {
    console.log(line)
  }
}

/**
 * Follows the daemon until it settles, prompting for sign-in whenever it asks
 */
async function followWithAuth(): Promise<LauncherSnapshot> {
  for (;;) {
    const snapshot = await followLauncher()
    if (!snapshot) {
      throw new Error('Launcher daemon stopped answering')
    }
    if (snapshot.state !== 'needsAuth' && snapshot.state !== 'waitingForAuthInput') {
      return snapshot
    }

    const prompt = createTerminalAuthPrompt()
    try {
      await runAuthPrompt(prompt.deps)
    } finally {
      prompt.close()
    }
  }
}

async function runLifecycle(route: LifecycleRoute, label: string): Promise<LauncherSnapshot> {
  await requireDaemon()
  const accepted = await requestLifecycle(route)
  if (accepted === null) {
    throw new Error('Launcher daemon is not reachable')
  }
  if (!accepted) {
    const current = await requireStatus()
    if (current.busy) {
      console.log(chalk.yellow('Another operation is in progress, following it instead'))
    } else if (current.state !== 'needsAuth' && current.state !== 'waitingForAuthInput') {
      throw new Error(`Cannot ${label} while the launcher is ${current.state}`)
    }
  }
  return followWithAuth()
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await rl.question(question)
    return answer.trim().toLowerCase() === 'yes'
  } finally {
    rl.close()
  }
}

async function handleSettingsCommand(args: string[]): Promise<void> {
  if (args.length === 0) {
    const settings = await readSettings()
    console.log(JSON.stringify(settings, null, 2))
    return
  }
  if (args[0] !== 'set' || args.length !== 3) {
    throw new Error('Usage: openclaw-launcher settings set <key> <value>')
  }
  const [, key, value] = args
  const patch = parseSettingAssignment(key, value)
  await updateSettings((current) => ({ ...current, ...patch }))
  console.log(`Updated ${key}. It takes effect the next time the gateway container starts.`)
}

async function handleDaemonCommand(args: string[]): Promise<void> {
  const daemonSubcommand = args[0]

  if (daemonSubcommand === 'start') {
    // Spawn detached daemon process
    const child = spawnLauncherCLI(['daemon', 'start-sync'], {
      detached: true,
      stdio: 'ignore',
      env: process.env
    })
    child.unref()

    // Wait for daemon to write state file (up to 5 seconds)
    let started = false
    for (let i = 0; i < 50; i++) {
      const state = await checkIfDaemonRunningAndCleanupStaleState()
      if (state && state.pid === child.pid) {
        started = true
        break
      }
      await delay(100)
    }

    if (!started) {
      throw new Error('Failed to start daemon')
    }
    console.log('Daemon started successfully')
  } else if (daemonSubcommand === 'start-sync') {
    await startDaemon()
  } else if (daemonSubcommand === 'stop') {
    await stopDaemon()
    console.log('Daemon stopped')
  } else if (daemonSubcommand === 'status') {
    await runDoctorCommand('daemon')
  } else if (daemonSubcommand === 'logs') {
    const latest = getLatestDaemonLog()
    console.log(latest ? latest.path : 'No daemon logs found')
  } else {
    printDaemonHelp()
  }
}

async function main(args: string[]): Promise<void> {
  // If --version is passed - do not log, its likely a daemon inquiring about our version
  if (!args.includes('--version')) {
    logger.debug('Starting openclaw-launcher with args: ', process.argv)
  }

  const subcommand = args[0] ?? 'start'

  switch (subcommand) {
    case '-v':
    case '--version':
      console.log(`openclaw-launcher version: ${configuration.currentCliVersion}`)
      return
    case '-h':
    case '--help':
    case 'help':
      printHelp()
      return
    case 'start': {
      const snapshot = await runLifecycle('/start', 'start')
      printOutcome(snapshot)
      if (snapshot.state === 'error') {
        process.exitCode = 1
      }
      return
    }
    case 'stop':
      await runLifecycle('/stop', 'stop')
      console.log('OpenClaw stopped')
      return
    case 'restart': {
      const snapshot = await runLifecycle('/restart', 'restart')
      printOutcome(snapshot)
      if (snapshot.state === 'error') {
        process.exitCode = 1
      }
      return
    }
    case 'reset': {
      if (!args.includes('--yes')) {
        const confirmed = await confirm(
          `This removes the container and everything in ${configuration.launcherHomeDir}, including the gateway token and credentials.\nType "yes" to continue: `
        )
        if (!confirmed) {
          console.log('Reset cancelled')
          return
        }
      }
      await runLifecycle('/reset', 'reset')
      console.log('Everything was reset. Run `openclaw-launcher start` to set up again.')
      return
    }
    case 'reauth': {
      const snapshot = await runLifecycle('/reauth', 're-authenticate')
      printOutcome(snapshot)
      return
    }
    case 'status': {
      if (!(await checkIfDaemonRunningAndCleanupStaleState())) {
        console.log('Launcher daemon is not running. Run `openclaw-launcher start`.')
        return
      }
      for (const line of formatStatusReport(await requireStatus())) {
        console.log(line)
      }
      return
    }
    case 'logs': {
      const tailIndex = args.indexOf('--tail')
      let tail: number | undefined
      if (tailIndex !== -1) {
        const parsed = TailSchema.safeParse(args[tailIndex + 1])
        if (!parsed.success) {
          throw new Error('--tail must be a whole number between 1 and 10000')
        }
        tail = parsed.data
      }
      await requireDaemon()
      const logs = await fetchContainerLogs(tail)
      if (logs === null) {
        throw new Error('Launcher daemon is not reachable')
      }
      console.log(logs)
      return
    }
    case 'open': {
      await requireDaemon()
      const url = await openControlUi()
      if (url === undefined) {
        throw new Error('Launcher daemon is not reachable')
      }
      console.log(url ?? 'Nothing to open yet. Run `openclaw-launcher start` first.')
      return
    }
    case 'settings':
      await handleSettingsCommand(args.slice(1))
      return
    case 'daemon':
      await handleDaemonCommand(args.slice(1))
      return
    case 'doctor':
      if (args[1] === 'clean') {
        const result = await killRunawayLauncherProcesses()
        console.log(`Cleaned up ${result.killed} runaway processes`)
        if (result.errors.length > 0) {
          console.log('Errors:', result.errors)
        }
        return
      }
      await runDoctorCommand()
      return
    default:
      printHelp()
      throw new Error(`Unknown command: ${subcommand}`)
  }
}

main(process.argv.slice(2)).then(() => {
  // Keep the daemon's own process alive; it exits through its shutdown path
  if (!configuration.isDaemonProcess) {
    process.exit()
  }
}).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error')
  if (process.env.DEBUG) {
    console.error(error)
  }
  process.exit(1)
})
