import { beforeEach, describe, expect, it, vi } from 'vitest'

const inkInstance = vi.hoisted(() => ({
  rerender: vi.fn(),
  unmount: vi.fn(),
}))

vi.mock('ink', () => ({
  render: vi.fn(() => inkInstance),
}))

vi.mock('@/daemon/controlClient', () => ({
  getLauncherStatus: vi.fn(),
}))

vi.mock('@/utils/time', () => ({
  delay: vi.fn(async () => undefined),
}))

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
  },
}))

import { getLauncherStatus } from '@/daemon/controlClient'
import type { LauncherSnapshot } from '@/launcher/types'
import { delay } from '@/utils/time'
import { followLauncher, waitForSnapshot } from './follow'

const base: LauncherSnapshot = {
  state: 'working',
  busy: true,
  steps: [],
  gatewayToken: null,
  port: null,
  controlUiUrl: null,
  health: { healthy: false, consecutiveFailures: 0 },
  containerStartedAt: null,
  pullProgress: null,
  authInputMode: null,
  authorizeUrl: null,
  authExpired: false,
  lastFailure: null,
  remediation: null,
}

describe('followLauncher', () => {
  beforeEach(() => {
    vi.mocked(getLauncherStatus).mockReset()
    vi.mocked(delay).mockClear()
    inkInstance.rerender.mockClear()
    inkInstance.unmount.mockClear()
  })

  it('polls until the launcher settles and returns the settled snapshot', async () => {
    const running: LauncherSnapshot = { ...base, state: 'running', busy: false }
    vi.mocked(getLauncherStatus)
      .mockResolvedValueOnce(base)
      .mockResolvedValueOnce({ ...base, state: 'running' })
      .mockResolvedValueOnce(running)

    expect(await followLauncher({ pollIntervalMs: 25 })).toEqual(running)

    expect(getLauncherStatus).toHaveBeenCalledTimes(3)
    expect(inkInstance.rerender).toHaveBeenCalledTimes(3)
    expect(delay).toHaveBeenCalledTimes(2)
    expect(delay).toHaveBeenCalledWith(25)
    expect(inkInstance.unmount).toHaveBeenCalledTimes(1)
  })

  it('returns null and unmounts when the daemon stops answering', async () => {
    vi.mocked(getLauncherStatus).mockResolvedValueOnce(base).mockResolvedValueOnce(null)

    expect(await followLauncher()).toBeNull()

    expect(inkInstance.unmount).toHaveBeenCalledTimes(1)
  })

  it('waits for a matching snapshot without rendering', async () => {
    const waiting: LauncherSnapshot = { ...base, state: 'waitingForAuthInput', busy: false, authInputMode: 'apiKey' }
    vi.mocked(getLauncherStatus).mockResolvedValueOnce(base).mockResolvedValueOnce(waiting)

    expect(await waitForSnapshot((snapshot) => snapshot.authInputMode === 'apiKey')).toEqual(waiting)

    expect(inkInstance.rerender).not.toHaveBeenCalled()
  })
})
