import chalk from 'chalk'
import type { LaunchStep, LauncherSnapshot, LauncherState, StepStatus } from '@/launcher/types'
import { describeLaunchFailure } from '@/launcher/types'
import { formatUptime } from '@/utils/time'

const STEP_ICONS: Record<StepStatus, string> = {
  pending: '○',
  running: '…',
  done: '✓',
  warning: '!',
  error: '✗',
}

const STATE_LABELS: Record<LauncherState, string> = {
  idle: 'Not started',
  working: 'Starting',
  needsAuth: 'Waiting for sign-in',
  waitingForAuthInput: 'Waiting for sign-in',
  running: 'Running',
  stopped: 'Stopped',
  error: 'Error',
}

export function colorForStatus(status: StepStatus): (text: string) => string {
  switch (status) {
    case 'done':
      return chalk.green
    case 'warning':
      return chalk.yellow
    case 'error':
      return chalk.red
    case 'running':
      return chalk.cyan
    case 'pending':
      return chalk.gray
  }
}

export function formatStep(step: LaunchStep): string {
  return colorForStatus(step.status)(`${STEP_ICONS[step.status]} ${step.message}`)
}

export function stateLabel(state: LauncherState): string {
  return STATE_LABELS[state]
}

/**
 * Lifecycle has come to rest; a follower can stop watching
 */
export function isSettled(snapshot: LauncherSnapshot): boolean {
  return !snapshot.busy && snapshot.state !== 'working'
}

/**
 * The `status` command output, one entry per line
 */
export function formatStatusReport(snapshot: LauncherSnapshot, now: number = Date.now()): string[] {
  const lines = [`${chalk.bold('State:')}      ${stateLabel(snapshot.state)}${snapshot.busy ? chalk.gray(' (busy)') : ''}`]

  if (snapshot.state === 'running') {
    const health = snapshot.health.healthy
      ? chalk.green('healthy')
      : chalk.yellow(`unhealthy (${snapshot.health.consecutiveFailures} failed checks)`)
    lines.push(`${chalk.bold('Gateway:')}    ${health}`)
    const uptimeMs = snapshot.health.uptimeSeconds !== undefined
      ? snapshot.health.uptimeSeconds * 1000
      : snapshot.containerStartedAt !== null ? now - snapshot.containerStartedAt : null
    if (uptimeMs !== null) {
      lines.push(`${chalk.bold('Uptime:')}     ${formatUptime(uptimeMs)}`)
    }
  }
  if (snapshot.port !== null) {
    lines.push(`${chalk.bold('Port:')}       ${snapshot.port}`)
  }
  if (snapshot.controlUiUrl) {
    lines.push(`${chalk.bold('Control UI:')} ${snapshot.controlUiUrl}`)
  }
  if (snapshot.authExpired) {
    lines.push(chalk.yellow('OAuth sign-in expired. Run `openclaw-launcher reauth` to sign in again.'))
  }
  if (snapshot.lastFailure) {
    lines.push(chalk.red(`Last failure: ${describeLaunchFailure(snapshot.lastFailure)}`))
  }
  if (snapshot.remediation?.kind === 'openDownloadPage') {
    lines.push(`Install Docker from ${snapshot.remediation.url}`)
  } else if (snapshot.remediation?.kind === 'openEngineApp') {
    lines.push(snapshot.remediation.path ? `Open ${snapshot.remediation.path} and try again` : 'Start Docker and try again')
  }
  return lines
}
