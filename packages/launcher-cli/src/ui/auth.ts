/**
 * Interactive sign-in when the launcher reports `needsAuth`
 */

import chalk from 'chalk'
import { createInterface } from 'node:readline/promises'
import {
  requestLifecycle,
  submitApiKey,
  submitOAuthCode,
} from '@/daemon/controlClient'
import type { LauncherSnapshot } from '@/launcher/types'
import { waitForSnapshot } from './follow'

export type AuthChoice = 'oauth' | 'apiKey' | 'skip'

export interface AuthPromptDeps {
  ask: (question: string) => Promise<string>
  requestLifecycle: typeof requestLifecycle
  submitOAuthCode: typeof submitOAuthCode
  submitApiKey: typeof submitApiKey
  waitForSnapshot: (predicate: (snapshot: LauncherSnapshot) => boolean) => Promise<LauncherSnapshot | null>
}

export function parseAuthChoice(input: string): AuthChoice | null {
  switch (input.trim().toLowerCase()) {
    case '':
    case '1':
    case 'oauth':
      return 'oauth'
    case '2':
    case 'key':
    case 'api-key':
      return 'apiKey'
    case '3':
    case 'skip':
      return 'skip'
    default:
      return null
  }
}

function ensureAccepted(accepted: boolean | null, what: string): void {
  if (accepted === null) {
    throw new Error('Launcher daemon is not reachable')
  }
  if (!accepted) {
    throw new Error(`The launcher is not waiting for ${what}`)
  }
}

export async function runAuthPrompt(deps: AuthPromptDeps): Promise<AuthChoice> {
  console.log('')
  console.log(chalk.bold('Connect OpenClaw to Anthropic'))
  console.log(`  ${chalk.cyan('1')} Sign in with Claude (opens your browser)`)
  console.log(`  ${chalk.cyan('2')} Use an Anthropic API key`)
  console.log(`  ${chalk.cyan('3')} Skip for now (set it up later in the Control UI)`)

  let choice = parseAuthChoice(await deps.ask('Choice [1]: '))
  while (choice === null) {
    choice = parseAuthChoice(await deps.ask('Please enter 1, 2 or 3: '))
  }

  switch (choice) {
    case 'oauth': {
      ensureAccepted(await deps.requestLifecycle('/auth/oauth'), 'sign-in')
      const pending = await deps.waitForSnapshot((snapshot) => snapshot.authorizeUrl !== null && !snapshot.busy)
      if (!pending?.authorizeUrl) {
        throw new Error('Sign-in did not start')
      }
      console.log('')
      console.log('If the browser did not open, visit:')
      console.log(chalk.underline(pending.authorizeUrl))
      const code = await deps.ask('Paste the authorization code: ')
      ensureAccepted(await deps.submitOAuthCode(code.trim()), 'an authorization code')
      break
    }
    case 'apiKey': {
      ensureAccepted(await deps.requestLifecycle('/auth/show-api-key'), 'an API key')
      await deps.waitForSnapshot((snapshot) => snapshot.authInputMode === 'apiKey' && !snapshot.busy)
      const key = await deps.ask('Anthropic API key (leave empty to skip): ')
      ensureAccepted(await deps.submitApiKey(key), 'an API key')
      break
    }
    case 'skip':
      ensureAccepted(await deps.requestLifecycle('/auth/skip'), 'sign-in')
      break
  }
  return choice
}

/**
 * Prompt dependencies bound to the terminal and the running daemon
 */
export function createTerminalAuthPrompt(): { deps: AuthPromptDeps; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  return {
    deps: {
      ask: (question) => rl.question(question),
      requestLifecycle,
      submitOAuthCode,
      submitApiKey,
      waitForSnapshot: (predicate) => waitForSnapshot(predicate),
    },
    close: () => rl.close(),
  }
}
