/**
 * Global configuration for the OpenClaw launcher
 *
 * Centralized paths and constants. Every directory can be redirected through
 * environment variables so tests and parallel installs never touch ~/.openclaw-launcher
 */

import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { projectPath } from './projectPath'

class Configuration {
  // State directory: gateway secret, config mounted into the container, credentials
  public readonly launcherHomeDir: string
  // Location used by the shell-script launcher before the state directory was renamed
  public readonly legacyHomeDir: string
  // Runtime directory: logs, daemon state and lock. Survives `reset`
  public readonly runtimeDir: string
  public readonly logsDir: string
  public readonly settingsFile: string
  public readonly daemonStateFile: string
  public readonly daemonLockFile: string

  public readonly containerName = 'openclaw'
  public readonly defaultImage = 'ghcr.io/openclaw/openclaw:latest'
  public readonly defaultPort = 18789
  public readonly containerPort = 18789
  public readonly controlUiBasePath = '/openclaw'
  public readonly engineDownloadUrl = 'https://www.docker.com/products/docker-desktop/'

  public readonly isDaemonProcess: boolean
  public readonly currentCliVersion: string

  constructor() {
    const args = process.argv.slice(2)
    this.isDaemonProcess = args.length >= 2 && args[0] === 'daemon' && args[1] === 'start-sync'

    this.launcherHomeDir = expandHome(process.env.OPENCLAW_LAUNCHER_HOME) ?? join(homedir(), '.openclaw-launcher')
    this.legacyHomeDir = expandHome(process.env.OPENCLAW_LAUNCHER_LEGACY_HOME) ?? join(homedir(), '.openclaw-docker')
    this.runtimeDir = expandHome(process.env.OPENCLAW_LAUNCHER_RUNTIME_DIR) ?? join(homedir(), '.cache', 'openclaw-launcher')

    this.logsDir = join(this.runtimeDir, 'logs')
    this.settingsFile = join(this.launcherHomeDir, 'settings.json')
    this.daemonStateFile = join(this.runtimeDir, 'daemon.state.json')
    this.daemonLockFile = join(this.runtimeDir, 'daemon.state.json.lock')

    this.currentCliVersion = readPackageVersion()
  }
}

function expandHome(value: string | undefined): string | undefined {
  if (!value) {
    return undefined
  }
  return value.startsWith('~') ? join(homedir(), value.slice(1)) : value
}

export function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(projectPath(), 'package.json'), 'utf-8'))
    if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
      return raw.version
    }
  } catch {
    // Running from an unusual layout; fall through
  }
  return '0.0.0'
}

export const configuration: Configuration = new Configuration()
