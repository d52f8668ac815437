import type { Locator, Page } from 'playwright'
import ariaRoles from './aria-roles.json'

type AriaRole = Parameters<Page['getByRole']>[0]

const ROLES: ReadonlySet<string> = new Set(ariaRoles)

function isAriaRole(value: string): value is AriaRole {
  return ROLES.has(value)
}

export type TargetStrategy = 'role' | 'text' | 'label' | 'placeholder' | 'testid' | 'title' | 'css'

export type TargetRef =
  | { strategy: 'role'; role: AriaRole; name?: string }
  | { strategy: Exclude<TargetStrategy, 'role'>; value: string }

const PREFIXES: ReadonlySet<string> = new Set(['text', 'label', 'placeholder', 'testid', 'title', 'css'])

function isPrefixStrategy(value: string): value is Exclude<TargetStrategy, 'role'> {
  return PREFIXES.has(value)
}

/**
 * Parse an element target.
 *
 *   "button/Submit"      getByRole('button', { name: 'Submit' })
 *   "heading"            getByRole('heading')
 *   "text:Welcome"       getByText('Welcome')
 *   "label:Email"        getByLabel('Email')
 *   "placeholder:Search" getByPlaceholder('Search')
 *   "testid:submit-btn"  getByTestId('submit-btn')
 *   "title:Close"        getByTitle('Close')
 *   "css:#submit"        locator('#submit')
 *
 * Anything else is taken as a CSS selector, so `#main > a` works unprefixed.
 */
export function parseTarget(ref: string): TargetRef {
  const colonIdx = ref.indexOf(':')
  if (colonIdx > 0) {
    const prefix = ref.slice(0, colonIdx).toLowerCase()
    if (isPrefixStrategy(prefix)) {
      const value = ref.slice(colonIdx + 1)
      if (!value) {
        throw new Error(`Empty value in target ref: "${ref}"`)
      }
      return { strategy: prefix, value }
    }
  }

  const slashIdx = ref.indexOf('/')
  if (slashIdx > 0) {
    const role = ref.slice(0, slashIdx).toLowerCase()
    const name = ref.slice(slashIdx + 1)
    if (isAriaRole(role) && name) {
      return { strategy: 'role', role, name }
    }
  }

  const lower = ref.toLowerCase()
  if (isAriaRole(lower)) {
    return { strategy: 'role', role: lower }
  }

  return { strategy: 'css', value: ref }
}

export function resolveTarget(page: Page, ref: string): Locator {
  const target = parseTarget(ref)

  switch (target.strategy) {
    case 'role':
      return target.name !== undefined
        ? page.getByRole(target.role, { name: target.name })
        : page.getByRole(target.role)
    case 'text':
      return page.getByText(target.value)
    case 'label':
      return page.getByLabel(target.value)
    case 'placeholder':
      return page.getByPlaceholder(target.value)
    case 'testid':
      return page.getByTestId(target.value)
    case 'title':
      return page.getByTitle(target.value)
    case 'css':
      return page.locator(target.value)
  }
}
