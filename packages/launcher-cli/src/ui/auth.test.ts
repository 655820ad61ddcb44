import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('./follow', () => ({
  waitForSnapshot: vi.fn(),
}))

import type { LauncherSnapshot } from '@/launcher/types'
import { parseAuthChoice, runAuthPrompt, type AuthPromptDeps } from './auth'

const waiting: LauncherSnapshot = {
  state: 'waitingForAuthInput',
  busy: false,
  steps: [],
  gatewayToken: 'a'.repeat(64),
  port: 18789,
  controlUiUrl: null,
  health: { healthy: false, consecutiveFailures: 0 },
  containerStartedAt: null,
  pullProgress: null,
  authInputMode: 'oauthCode',
  authorizeUrl: 'https://claude.ai/oauth/authorize?code=true',
  authExpired: false,
  lastFailure: null,
  remediation: null,
}

function createDeps(answers: string[]) {
  const queue = [...answers]
  return {
    ask: vi.fn(async (_question: string) => queue.shift() ?? ''),
    requestLifecycle: vi.fn<AuthPromptDeps['requestLifecycle']>(async () => true),
    submitOAuthCode: vi.fn<AuthPromptDeps['submitOAuthCode']>(async () => true),
    submitApiKey: vi.fn<AuthPromptDeps['submitApiKey']>(async () => true),
    waitForSnapshot: vi.fn<AuthPromptDeps['waitForSnapshot']>(async () => waiting),
  } satisfies AuthPromptDeps
}

describe('auth prompt', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('parses menu answers', () => {
    expect(parseAuthChoice('')).toBe('oauth')
    expect(parseAuthChoice(' 2 ')).toBe('apiKey')
    expect(parseAuthChoice('SKIP')).toBe('skip')
    expect(parseAuthChoice('4')).toBeNull()
  })

  it('runs the browser sign-in and submits the pasted code', async () => {
    const deps = createDeps(['1', '  abc123#state  '])

    expect(await runAuthPrompt(deps)).toBe('oauth')

    expect(deps.requestLifecycle).toHaveBeenCalledWith('/auth/oauth')
    expect(deps.submitOAuthCode).toHaveBeenCalledWith('abc123#state')
  })

  it('asks again after an invalid choice and saves an API key', async () => {
    const deps = createDeps(['9', '2', 'test-secret'])

    expect(await runAuthPrompt(deps)).toBe('apiKey')

    expect(deps.ask).toHaveBeenCalledTimes(3)
    expect(deps.requestLifecycle).toHaveBeenCalledWith('/auth/show-api-key')
    expect(deps.submitApiKey).toHaveBeenCalledWith('test-secret')
  })

  it('skips without prompting for secrets', async () => {
    const deps = createDeps(['3'])

    expect(await runAuthPrompt(deps)).toBe('skip')

    expect(deps.requestLifecycle).toHaveBeenCalledWith('/auth/skip')
    expect(deps.submitApiKey).not.toHaveBeenCalled()
    expect(deps.submitOAuthCode).not.toHaveBeenCalled()
  })

  it('fails when the daemon refuses the request', async () => {
    const deps = createDeps(['3'])
    deps.requestLifecycle.mockResolvedValue(false)

    await expect(runAuthPrompt(deps)).rejects.toThrow('The launcher is not waiting for sign-in')
  })

  it('fails when the daemon is gone', async () => {
    const deps = createDeps(['1'])
    deps.requestLifecycle.mockResolvedValue(null)

    await expect(runAuthPrompt(deps)).rejects.toThrow('Launcher daemon is not reachable')
  })
})
