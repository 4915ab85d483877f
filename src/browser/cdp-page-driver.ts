import { z } from 'zod'
import { sleep } from '../core/utils/sleep'
import { locatorExpression, type LocatorAction } from './locator-script'
import type { Locator, PageDriver } from './page-driver'

/**
 * The DevTools protocol surface the driver uses. A chrome-remote-interface
 * client satisfies it.
 */
export interface CdpClient {
  Page: {
    navigate(params: { url: string }): Promise<{ errorText?: string }>
    captureScreenshot(params: { format: 'png'; captureBeyondViewport: boolean }): Promise<{ data: string }>
  }
  Runtime: {
    evaluate(params: { expression: string; returnByValue: boolean; awaitPromise: boolean }): Promise<{
      result: { value?: unknown }
      exceptionDetails?: { text: string; exception?: { description?: string } }
    }>
  }
}

export interface CdpPageDriverOptions {
  // Interval between checks while waiting for an element
  pollMs?: number
}

const OptionalString = z.string().nullable()

export class CdpPageDriver implements PageDriver {
  private readonly pollMs: number

  constructor(
    private readonly client: CdpClient,
    options: CdpPageDriverOptions = {},
  ) {
    this.pollMs = options.pollMs ?? 250
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const { errorText } = await this.client.Page.navigate({ url })
    if (errorText) {
      throw new Error(`Navigation to ${url} failed: ${errorText}`)
    }

    const ready = await this.poll(timeoutMs, async () => {
      const state = await this.evaluate('document.readyState', z.string())
      return state !== 'loading'
    })
    if (!ready) {
      throw new Error(`Navigation to ${url} timed out after ${timeoutMs}ms`)
    }
  }

  currentUrl(): Promise<string> {
    return this.evaluate('location.href', z.string())
  }

  count(locator: Locator): Promise<number> {
    return this.run(locator, 'count', z.number())
  }

  waitFor(locator: Locator, timeoutMs: number): Promise<boolean> {
    return this.poll(timeoutMs, async () => (await this.count(locator)) > 0)
  }

  waitForGone(locator: Locator, timeoutMs: number): Promise<boolean> {
    return this.poll(timeoutMs, async () => (await this.count(locator)) === 0)
  }

  click(locator: Locator): Promise<boolean> {
    return this.run(locator, 'click', z.boolean())
  }

  fill(locator: Locator, value: string): Promise<boolean> {
    return this.run(locator, 'fill', z.boolean(), value)
  }

  async readValue(locator: Locator): Promise<string | undefined> {
    return (await this.run(locator, 'value', OptionalString)) ?? undefined
  }

  async readText(locator: Locator): Promise<string | undefined> {
    return (await this.run(locator, 'text', OptionalString)) ?? undefined
  }

  isChecked(locator: Locator): Promise<boolean> {
    return this.run(locator, 'checked', z.boolean())
  }

  pause(ms: number): Promise<void> {
    return sleep(ms)
  }

  async screenshot(): Promise<Buffer> {
    const { data } = await this.client.Page.captureScreenshot({ format: 'png', captureBeyondViewport: true })
    return Buffer.from(data, 'base64')
  }

  content(): Promise<string> {
    return this.evaluate('document.documentElement.outerHTML', z.string())
  }

  private run<T>(locator: Locator, action: LocatorAction, schema: z.ZodType<T>, input?: string): Promise<T> {
    return this.evaluate(locatorExpression(locator, action, input), schema)
  }

  private async evaluate<T>(expression: string, schema: z.ZodType<T>): Promise<T> {
    const { result, exceptionDetails } = await this.client.Runtime.evaluate({
      expression,
      returnByValue: true,
      awaitPromise: true,
    })
    if (exceptionDetails) {
      throw new Error(`Page script failed: ${exceptionDetails.exception?.description ?? exceptionDetails.text}`)
    }
    return schema.parse(result.value)
  }

  // Checks immediately, then every pollMs until the condition holds or time runs out
  private async poll(timeoutMs: number, condition: () => Promise<boolean>): Promise<boolean> {
    const deadline = Date.now() + timeoutMs
    for (;;) {
      if (await condition()) return true
      if (Date.now() >= deadline) return false
      await sleep(Math.min(this.pollMs, Math.max(0, deadline - Date.now())))
    }
  }
}
