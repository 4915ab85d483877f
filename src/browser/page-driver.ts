/**
 * Describes an element on the target page.
 *
 * `css` selects candidates. `label` scopes the search to the container of a
 * `label`, `dt` or heading whose text contains (or equals, with `exactLabel`)
 * the given string. `text` keeps candidates whose own text matches. `nth`
 * picks among the remaining matches (default 0).
 */
export interface Locator {
  css: string
  label?: string
  exactLabel?: boolean
  text?: string
  exactText?: boolean
  nth?: number
}

/**
 * The page operations the worker and the parameter handlers need. Lookups
 * that find nothing resolve `false`/`undefined` instead of throwing; only a
 * broken session throws.
 */
export interface PageDriver {
  navigate(url: string, timeoutMs: number): Promise<void>
  currentUrl(): Promise<string>
  count(locator: Locator): Promise<number>
  waitFor(locator: Locator, timeoutMs: number): Promise<boolean>
  waitForGone(locator: Locator, timeoutMs: number): Promise<boolean>
  click(locator: Locator): Promise<boolean>
  fill(locator: Locator, value: string): Promise<boolean>
  readValue(locator: Locator): Promise<string | undefined>
  readText(locator: Locator): Promise<string | undefined>
  isChecked(locator: Locator): Promise<boolean>
  pause(ms: number): Promise<void>
  screenshot(): Promise<Buffer>
  content(): Promise<string>
}
