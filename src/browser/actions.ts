import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { logger } from '../logger'
import { METRIC_KEYS, type FailureArtifacts } from '../core/types'
import type { PageDriver } from './page-driver'
import type { RawResults } from './result-parser'
import {
  LOGIN_EMAIL,
  LOGIN_PASSWORD,
  LOGIN_SUBMIT,
  MODAL_DIALOG,
  NEW_BACKTEST_BUTTON,
  RESULTS_READY,
  RESULT_LOCATORS,
  RUN_BUTTON,
  RUNNING_INDICATOR,
  SIGNED_IN_MARKERS,
  SIGN_IN_BUTTON,
} from './selectors'

export interface ActionTimings {
  // Longest wait for a single element or page load
  timeoutMs: number
  // Longest wait for a backtest to finish
  runTimeoutMs: number
  // Pause that lets the page settle after an interaction
  settleMs: number
}

export async function login(
  page: PageDriver,
  loginUrl: string,
  email: string,
  password: string,
  timings: ActionTimings,
): Promise<boolean> {
  await page.navigate(loginUrl, timings.timeoutMs)
  await page.pause(timings.settleMs)

  if ((await page.count(SIGN_IN_BUTTON)) > 0) {
    await page.click(SIGN_IN_BUTTON)
    await page.pause(timings.settleMs)
  }

  if (!(await page.waitFor(LOGIN_EMAIL, timings.timeoutMs))) {
    logger.debug('Login form did not appear')
    return false
  }
  if (!(await page.fill(LOGIN_EMAIL, email)) || !(await page.fill(LOGIN_PASSWORD, password))) {
    return false
  }
  if (!(await page.click(LOGIN_SUBMIT))) {
    return false
  }
  await page.pause(timings.settleMs)

  for (const marker of SIGNED_IN_MARKERS) {
    if ((await page.count(marker)) > 0) return true
  }
  const url = (await page.currentUrl()).toLowerCase()
  return url.includes('dashboard') || url.includes('app.')
}

export async function navigateToTarget(page: PageDriver, url: string, timings: ActionTimings): Promise<boolean> {
  try {
    await page.navigate(url, timings.timeoutMs)
  } catch (error) {
    logger.debug(`Navigation to ${url} failed:`, error)
    return false
  }
  await page.pause(timings.settleMs)
  return true
}

export async function openNewBacktestModal(page: PageDriver, timings: ActionTimings): Promise<boolean> {
  if (!(await page.waitFor(NEW_BACKTEST_BUTTON, timings.timeoutMs))) return false
  if (!(await page.click(NEW_BACKTEST_BUTTON))) return false
  return page.waitFor(MODAL_DIALOG, timings.timeoutMs)
}

/**
 * Starts the backtest and waits for the running indicator to go away and
 * the results summary to show up
 */
export async function runBacktest(page: PageDriver, timings: ActionTimings): Promise<boolean> {
  if (!(await page.click(RUN_BUTTON))) return false
  await page.pause(timings.settleMs)

  if (!(await page.waitForGone(RUNNING_INDICATOR, timings.runTimeoutMs))) {
    return false
  }
  return page.waitFor(RESULTS_READY, timings.timeoutMs)
}

export async function extractResults(page: PageDriver): Promise<RawResults> {
  const raw: RawResults = {}
  for (const key of METRIC_KEYS) {
    const text = await page.readText(RESULT_LOCATORS[key])
    if (text !== undefined) raw[key] = text
  }
  return raw
}

/**
 * Writes a screenshot and the page HTML for a failed task. Each artifact is
 * best effort; the ones that could not be captured are left out.
 */
export async function captureFailureArtifacts(
  page: PageDriver,
  artifactsDir: string,
  taskId: number,
): Promise<FailureArtifacts> {
  const artifacts: FailureArtifacts = {}
  try {
    await mkdir(artifactsDir, { recursive: true })
  } catch (error) {
    logger.warn(`Cannot create artifacts directory ${artifactsDir}:`, error)
    return artifacts
  }

  const screenshotPath = path.join(artifactsDir, `task_${taskId}_screenshot.png`)
  try {
    await writeFile(screenshotPath, await page.screenshot())
    artifacts.screenshotPath = screenshotPath
  } catch (error) {
    logger.debug(`Screenshot for task ${taskId} failed:`, error)
  }

  const htmlPath = path.join(artifactsDir, `task_${taskId}_page.html`)
  try {
    await writeFile(htmlPath, await page.content(), 'utf8')
    artifacts.htmlPath = htmlPath
  } catch (error) {
    logger.debug(`HTML capture for task ${taskId} failed:`, error)
  }
  return artifacts
}
