import { describe, it, expect, jest, beforeEach } from '@jest/globals'
import { ChildProcess } from 'node:child_process'
import { launch } from 'chrome-launcher'
import { CdpPageDriver } from './cdp-page-driver'
import { launchChromeSession, type CdpConnection } from './chrome-session'

jest.mock('chrome-launcher', () => ({
  launch: jest.fn(),
}))

jest.mock('chrome-remote-interface', () => jest.fn())

jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  },
}))

const mockLaunch = jest.mocked(launch)

function fakeConnection(): CdpConnection {
  return {
    Page: {
      enable: jest.fn(async () => undefined),
      navigate: jest.fn(async () => ({})),
      captureScreenshot: jest.fn(async () => ({ data: '' })),
    },
    Runtime: {
      enable: jest.fn(async () => undefined),
      evaluate: jest.fn(async () => ({ result: {} })),
    },
    Emulation: {
      setDeviceMetricsOverride: jest.fn(async () => undefined),
    },
    close: jest.fn(async () => undefined),
  }
}

describe('launchChromeSession', () => {
  let kill: jest.Mock<() => Promise<undefined>>

  beforeEach(() => {
    jest.clearAllMocks()
    kill = jest.fn(async () => undefined)
    const chrome = {
      pid: 4321,
      port: 9333,
      process: new ChildProcess(),
      remoteDebuggingPipes: null,
      kill,
    }
    mockLaunch.mockResolvedValue(chrome)
  })

  it('launches headless Chrome and attaches a page driver', async () => {
    const connection = fakeConnection()
    const connect = jest.fn(async (_port: number) => connection)

    const session = await launchChromeSession({}, connect)

    expect(mockLaunch).toHaveBeenCalledWith({
      chromeFlags: [
        '--no-sandbox',
        '--disable-dev-shm-usage',
        '--disable-blink-features=AutomationControlled',
        '--window-size=1920,1080',
        '--headless',
      ],
      logLevel: 'error',
    })
    expect(connect).toHaveBeenCalledWith(9333)
    expect(connection.Emulation.setDeviceMetricsOverride).toHaveBeenCalledWith({
      width: 1920,
      height: 1080,
      deviceScaleFactor: 1,
      mobile: false,
    })
    expect(session.port).toBe(9333)
    expect(session.driver).toBeInstanceOf(CdpPageDriver)
  })

  it('uses custom flags and a visible window', async () => {
    await launchChromeSession(
      { headless: false, chromeFlags: ['--custom-flag'], viewport: { width: 1280, height: 800 }, logLevel: 'verbose' },
      async () => fakeConnection(),
    )

    expect(mockLaunch).toHaveBeenCalledWith({
      chromeFlags: ['--custom-flag', '--window-size=1280,800'],
      logLevel: 'verbose',
    })
  })

  it('closes the connection and kills Chrome', async () => {
    const connection = fakeConnection()
    const session = await launchChromeSession({}, async () => connection)

    await session.close()

    expect(connection.close).toHaveBeenCalledTimes(1)
    expect(kill).toHaveBeenCalledTimes(1)
  })

  it('tolerates a failing kill on close', async () => {
    kill.mockRejectedValue(new Error('Kill failed'))
    const session = await launchChromeSession({}, async () => fakeConnection())

    await expect(session.close()).resolves.toBeUndefined()
  })

  it('kills Chrome when the DevTools connection fails', async () => {
    const connect = jest.fn(async (_port: number): Promise<CdpConnection> => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:9333')
    })

    await expect(launchChromeSession({}, connect)).rejects.toThrow('ECONNREFUSED')
    expect(kill).toHaveBeenCalledTimes(1)
  })
})
