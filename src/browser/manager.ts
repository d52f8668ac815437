import { type Browser, type BrowserContext, chromium, type Page } from 'playwright'
import type { PageProbe } from '../tools/types'
import { log } from '../util/logger'
import { resolveTarget } from './targeting'

export interface BrowserOptions {
  headless?: boolean
  defaultTimeoutMs?: number
}

export interface PageSnapshot {
  url: string
  title: string
  status?: number
  content: string
}

const MAX_SNAPSHOT_LENGTH = 50000

/** Collapse whitespace and cap the length of extracted page text. */
export function cleanPageText(text: string, maxLength: number = MAX_SNAPSHOT_LENGTH): string {
  const cleaned = text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim()

  return cleaned.length > maxLength
    ? `${cleaned.slice(0, maxLength)}\n\n[Truncated: content exceeded ${maxLength} characters]`
    : cleaned
}

/**
 * One Chromium instance with a single active page, launched on first use.
 * Operations are sequential; workflows and the agent share the same page.
 */
export class BrowserManager implements PageProbe {
  private browser: Browser | undefined
  private context: BrowserContext | undefined
  private page: Page | undefined
  private readonly headless: boolean
  private readonly defaultTimeoutMs: number
  private status: number | undefined

  constructor(options: BrowserOptions = {}) {
    this.headless = options.headless ?? true
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000
  }

  get isOpen(): boolean {
    return this.browser?.isConnected() ?? false
  }

  /** Status code of the last navigation's main response */
  get lastStatus(): number | undefined {
    return this.status
  }

  private async ensurePage(): Promise<Page> {
    if (!this.browser || !this.browser.isConnected()) {
      this.browser = await chromium.launch({ headless: this.headless })
      this.context = await this.browser.newContext()
      this.page = undefined
      log.info('browser', `Launched chromium (headless: ${this.headless})`)
    }

    if (!this.page || this.page.isClosed()) {
      this.page = await this.context?.newPage()
      this.page?.setDefaultTimeout(this.defaultTimeoutMs)
    }

    if (!this.page) {
      throw new Error('Failed to create browser page')
    }

    return this.page
  }

  async navigate(url: string): Promise<PageSnapshot> {
    const page = await this.ensurePage()
    const response = await page.goto(url, { waitUntil: 'domcontentloaded' })

    if (!response) {
      throw new Error(`Navigation to ${url} returned no response`)
    }

    this.status = response.status()
    log.info('browser', `Navigated to ${url} (${this.status})`)
    return this.snapshot()
  }

  async snapshot(): Promise<PageSnapshot> {
    const page = await this.ensurePage()

    const title = await page.title()
    const url = page.url()
    const content = await page.evaluate(() => {
      function describe(node: Node): string {
        if (node.nodeType === Node.TEXT_NODE) {
          return node.textContent?.trim() ?? ''
        }
        if (!(node instanceof HTMLElement)) return ''

        const tag = node.tagName.toLowerCase()
        if (tag === 'script' || tag === 'style' || tag === 'noscript') return ''
        const style = window.getComputedStyle(node)
        if (style.display === 'none' || style.visibility === 'hidden') return ''

        const parts: string[] = []
        for (const child of Array.from(node.childNodes)) {
          const text = describe(child)
          if (text) parts.push(text)
        }
        const joined = parts.join(' ')
        const label = node.getAttribute('aria-label')

        if (node instanceof HTMLInputElement || node instanceof HTMLTextAreaElement) {
          const name = label ?? node.getAttribute('placeholder') ?? node.name
          return `[${node.type || 'input'}: ${name}]`
        }
        if (node instanceof HTMLImageElement) return `[image: ${label ?? node.alt}]`
        if (!joined) return ''
        if (tag === 'a') return `[link: ${label ?? joined}]`
        if (tag === 'button' || node.getAttribute('role') === 'button') return `[button: ${label ?? joined}]`
        if (tag === 'select') return `[select: ${label ?? joined}]`
        if (/^h[1-6]$/.test(tag)) return `\n## ${joined}\n`
        if (tag === 'li') return `- ${joined}`
        if (tag === 'p' || tag === 'div' || tag === 'section' || tag === 'article') return `${joined}\n`
        return joined
      }

      return describe(document.body)
    })

    return { url, title, status: this.status, content: cleanPageText(content) }
  }

  async click(target: string): Promise<PageSnapshot> {
    const page = await this.ensurePage()
    await resolveTarget(page, target).click()
    try {
      await page.waitForLoadState('domcontentloaded')
    } catch (error) {
      log.debug('browser', 'No load state after click', error)
    }
    return this.snapshot()
  }

  async fill(target: string, value: string): Promise<PageSnapshot> {
    const page = await this.ensurePage()
    await resolveTarget(page, target).fill(value)
    return this.snapshot()
  }

  /** Inner text of the target, or of the whole body when no target is given */
  async extract(target?: string): Promise<string> {
    const page = await this.ensurePage()
    const text = target
      ? await resolveTarget(page, target).first().innerText()
      : await page.locator('body').innerText()
    return cleanPageText(text)
  }

  async waitFor(target: string, timeoutMs?: number): Promise<PageSnapshot> {
    const page = await this.ensurePage()
    await resolveTarget(page, target).first().waitFor({
      state: 'visible',
      timeout: timeoutMs ?? this.defaultTimeoutMs,
    })
    return this.snapshot()
  }

  async elementExists(selector: string): Promise<boolean> {
    const page = await this.ensurePage()
    return (await resolveTarget(page, selector).count()) > 0
  }

  async evaluate(expression: string): Promise<unknown> {
    const page = await this.ensurePage()
    return page.evaluate(expression)
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close()
      this.browser = undefined
      this.context = undefined
      this.page = undefined
      log.info('browser', 'Closed browser')
    }
  }
}
