import { launch } from 'chrome-launcher'
import CDP from 'chrome-remote-interface'
import { logger } from '../logger'
import { CdpPageDriver, type CdpClient } from './cdp-page-driver'
import type { PageDriver } from './page-driver'

export interface ChromeSessionOptions {
  headless?: boolean
  chromeFlags?: string[]
  logLevel?: 'silent' | 'error' | 'info' | 'verbose'
  viewport?: { width: number; height: number }
}

export interface CdpConnection extends CdpClient {
  Page: CdpClient['Page'] & { enable(): Promise<void> }
  Runtime: CdpClient['Runtime'] & { enable(): Promise<void> }
  Emulation: {
    setDeviceMetricsOverride(params: {
      width: number
      height: number
      deviceScaleFactor: number
      mobile: boolean
    }): Promise<void>
  }
  close(): Promise<void>
}

export type ConnectCdp = (port: number) => Promise<CdpConnection>

const connectCdp: ConnectCdp = (port) => CDP({ port })

/**
 * One Chrome process plus the DevTools connection driving its first tab
 */
export interface ChromeSession {
  readonly port: number
  readonly driver: PageDriver
  close(): Promise<void>
}

/**
 * Launches Chrome and attaches to it over CDP. Chrome is killed again when
 * the connection cannot be set up.
 */
export async function launchChromeSession(
  options: ChromeSessionOptions = {},
  connect: ConnectCdp = connectCdp,
): Promise<ChromeSession> {
  const headless = options.headless ?? true
  const viewport = options.viewport ?? { width: 1920, height: 1080 }
  const baseFlags = options.chromeFlags ?? [
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-blink-features=AutomationControlled',
  ]
  const chromeFlags = [...baseFlags, `--window-size=${viewport.width},${viewport.height}`]
  if (headless) chromeFlags.push('--headless')

  const chrome = await launch({ chromeFlags, logLevel: options.logLevel ?? 'error' })
  logger.debug(`Launched Chrome (port: ${chrome.port})`)

  let client: CdpConnection
  try {
    client = await connect(chrome.port)
    await Promise.all([client.Page.enable(), client.Runtime.enable()])
    await client.Emulation.setDeviceMetricsOverride({ ...viewport, deviceScaleFactor: 1, mobile: false })
  } catch (error) {
    await killChrome(chrome.port, () => chrome.kill())
    throw error
  }

  return {
    port: chrome.port,
    driver: new CdpPageDriver(client),
    async close() {
      try {
        await client.close()
      } catch (error) {
        logger.debug(`Failed to close CDP connection (port: ${chrome.port}): ${error}`)
      }
      await killChrome(chrome.port, () => chrome.kill())
    },
  }
}

async function killChrome(port: number, kill: () => unknown): Promise<void> {
  try {
    await kill()
  } catch (error) {
    logger.warn(`Failed to kill Chrome instance (port: ${port}): ${error}`)
  }
}
