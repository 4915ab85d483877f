import type { Locator } from './page-driver'

export type LocatorAction = 'count' | 'click' | 'fill' | 'value' | 'text' | 'checked'

// Runs inside the page. Resolves a Locator to elements in document order, then
// applies one action to the nth match.
const PAGE_FUNCTION = `(query, action, input) => {
  const norm = (value) => (value || '').replace(/\\s+/g, ' ').trim()
  const matches = (value, wanted, exact) => (exact ? norm(value) === wanted : norm(value).includes(wanted))
  const within = (root) => (root.matches(query.css) ? [root] : Array.from(root.querySelectorAll(query.css)))

  let found
  if (query.label === undefined) {
    found = Array.from(document.querySelectorAll(query.css))
  } else {
    const seen = new Set()
    const markers = document.querySelectorAll('label, dt, h1, h2, h3, h4, h5, h6, span, button')
    for (const marker of markers) {
      if (!matches(marker.textContent, query.label, query.exactLabel)) continue
      let hits = []
      for (let sibling = marker.nextElementSibling; sibling && hits.length === 0; sibling = sibling.nextElementSibling) {
        hits = within(sibling)
      }
      for (let scope = marker.parentElement, depth = 0; scope && hits.length === 0 && depth < 4; depth++) {
        hits = Array.from(scope.querySelectorAll(query.css))
        scope = scope.parentElement
      }
      hits.forEach((element) => seen.add(element))
    }
    found = Array.from(seen).sort((a, b) => (a.compareDocumentPosition(b) & Node.DOCUMENT_POSITION_FOLLOWING ? -1 : 1))
  }
  if (query.text !== undefined) {
    found = found.filter((element) => matches(element.textContent, query.text, query.exactText))
  }
  if (action === 'count') return found.length

  const element = found[query.nth || 0]
  switch (action) {
    case 'click':
      if (!element) return false
      element.scrollIntoView({ block: 'center' })
      element.click()
      return true
    case 'fill': {
      if (!element) return false
      const proto = element instanceof HTMLTextAreaElement ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype
      const setter = Object.getOwnPropertyDescriptor(proto, 'value').set
      element.focus()
      setter.call(element, input)
      element.dispatchEvent(new Event('input', { bubbles: true }))
      element.dispatchEvent(new Event('change', { bubbles: true }))
      element.blur()
      return true
    }
    case 'value':
      return element && 'value' in element ? String(element.value) : null
    case 'text':
      return element ? norm(element.textContent) : null
    case 'checked':
      return Boolean(element && element.checked)
  }
  return null
}`

/**
 * Builds the expression evaluated through `Runtime.evaluate` for one locator action
 */
export function locatorExpression(locator: Locator, action: LocatorAction, input?: string): string {
  const query = JSON.stringify(locator)
  return `(${PAGE_FUNCTION})(${query}, ${JSON.stringify(action)}, ${JSON.stringify(input ?? null)})`
}
