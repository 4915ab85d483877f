import type { MetricKey } from '../core/types'
import type { Locator } from './page-driver'

// Login
export const SIGN_IN_BUTTON: Locator = { css: 'span.btn-primary, a, button', text: 'Sign in', exactText: true }
export const LOGIN_EMAIL: Locator = { css: "input[type='email']" }
export const LOGIN_PASSWORD: Locator = { css: "input[type='password']" }
export const LOGIN_SUBMIT: Locator = { css: "form button[type='submit']" }
export const SIGNED_IN_MARKERS: Locator[] = [
  { css: 'a, button, span', text: 'Sign out' },
  { css: 'a, button, span, h1, h2', text: 'Dashboard' },
]

// Backtest dialog
export const NEW_BACKTEST_BUTTON: Locator = { css: 'button', text: 'New Backtest' }
export const MODAL_DIALOG: Locator = { css: "[id^='headlessui-dialog'], [role='dialog']" }
export const RUN_BUTTON: Locator = { css: "[role='dialog'] button, button", text: 'Run', exactText: true }
export const RUNNING_INDICATOR: Locator = { css: 'div, span, p, h2, h3', text: 'Running Backtest', exactText: true }
export const RESULTS_READY: Locator = { css: 'dt', text: 'CAGR' }

// Summary values, read from the dd next to each dt
export const RESULT_LOCATORS: Record<MetricKey, Locator> = {
  pl: { css: 'dd', label: 'P/L' },
  cagr: { css: 'dd', label: 'CAGR' },
  maxDrawdown: { css: 'dd', label: 'Max Drawdown' },
  mar: { css: 'dd', label: 'MAR Ratio' },
  winPercentage: { css: 'dd', label: 'Win Percentage' },
  totalPremium: { css: 'dd', label: 'Total Premium' },
  captureRate: { css: 'dd', label: 'Capture Rate' },
  startingCapital: { css: 'dd', label: 'Starting Capital' },
  endingCapital: { css: 'dd', label: 'Ending Capital' },
  totalTrades: { css: 'dd', label: 'Trades', exactLabel: true },
  winners: { css: 'dd', label: 'Winners' },
  avgPerTrade: { css: 'dd', label: 'Avg Per Trade' },
  avgWinner: { css: 'dd', label: 'Avg Winner' },
  avgLoser: { css: 'dd', label: 'Avg Loser' },
  maxWinner: { css: 'dd', label: 'Max Winner' },
  maxLoser: { css: 'dd', label: 'Max Loser' },
  avgMinutesInTrade: { css: 'dd', label: 'Avg Minutes In Trade' },
}
