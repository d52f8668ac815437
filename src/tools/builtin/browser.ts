import type { BrowserManager, PageSnapshot } from '../../browser'
import { numberParam, stringParam, type Tool, type ToolParameters, type ToolResult } from '../types'

/** The part of BrowserManager the tools drive */
export type BrowserSession = Pick<
  BrowserManager,
  'navigate' | 'click' | 'fill' | 'extract' | 'snapshot' | 'waitFor' | 'evaluate' | 'close'
>

const TARGET_HELP =
  'Element target: "role/Name" (e.g. "button/Submit"), "text:value", "label:value", ' +
  '"placeholder:value", "testid:value", "title:value", or a CSS selector.'

export function formatSnapshot(snap: PageSnapshot): string {
  const status = snap.status !== undefined ? `\nStatus: ${snap.status}` : ''
  return `URL: ${snap.url}\nTitle: ${snap.title}${status}\n\n${snap.content}`
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function browserTool(
  name: string,
  description: string,
  parameters: ToolParameters,
  failure: string,
  run: (params: Record<string, unknown>) => Promise<ToolResult>,
): Tool {
  return {
    definition: { name, description, parameters },
    async execute(params) {
      for (const key of parameters.required ?? []) {
        if (params[key] === undefined) {
          return { success: false, output: `Missing required parameter: ${key}` }
        }
      }
      try {
        return await run(params)
      } catch (error) {
        return { success: false, output: `${failure}: ${errorMessage(error)}` }
      }
    },
  }
}

/**
 * Browser tools sharing one session, so navigation state carries across calls.
 */
export function createBrowserTools(session: BrowserSession): Tool[] {
  const target = { type: 'string', description: TARGET_HELP }

  return [
    browserTool(
      'browser_navigate',
      'Navigate the browser to a URL. Returns a text snapshot of the page.',
      {
        type: 'object',
        properties: { url: { type: 'string', description: 'Absolute http(s) URL' } },
        required: ['url'],
      },
      'Navigation failed',
      async (params) => {
        const url = stringParam(params, 'url') ?? ''
        if (!url.startsWith('http://') && !url.startsWith('https://')) {
          return { success: false, output: 'URL must start with http:// or https://' }
        }
        const snap = await session.navigate(url)
        return { success: true, output: formatSnapshot(snap), http_status: snap.status }
      },
    ),

    browserTool(
      'browser_click',
      'Click an element on the current page. Returns the page snapshot after the click.',
      { type: 'object', properties: { target }, required: ['target'] },
      'Click failed',
      async (params) => {
        const snap = await session.click(stringParam(params, 'target') ?? '')
        return { success: true, output: formatSnapshot(snap) }
      },
    ),

    browserTool(
      'browser_fill',
      'Type a value into a form field, replacing its content.',
      {
        type: 'object',
        properties: {
          target,
          value: { type: 'string', description: 'Text to enter' },
        },
        required: ['target', 'value'],
      },
      'Fill failed',
      async (params) => {
        const value = params.value
        const snap = await session.fill(
          stringParam(params, 'target') ?? '',
          typeof value === 'string' ? value : JSON.stringify(value),
        )
        return { success: true, output: formatSnapshot(snap) }
      },
    ),

    browserTool(
      'browser_extract',
      'Return the visible text of an element, or of the whole page when no target is given.',
      { type: 'object', properties: { target } },
      'Extract failed',
      async (params) => ({
        success: true,
        output: await session.extract(stringParam(params, 'target')),
      }),
    ),

    browserTool(
      'browser_snapshot',
      'Return a text snapshot of the current page with links, buttons and inputs marked.',
      { type: 'object', properties: {} },
      'Snapshot failed',
      async () => ({ success: true, output: formatSnapshot(await session.snapshot()) }),
    ),

    browserTool(
      'browser_wait',
      'Wait until an element is visible.',
      {
        type: 'object',
        properties: {
          target,
          timeout_ms: { type: 'number', description: 'Maximum wait in milliseconds' },
        },
        required: ['target'],
      },
      'Wait failed',
      async (params) => {
        const snap = await session.waitFor(
          stringParam(params, 'target') ?? '',
          numberParam(params, 'timeout_ms'),
        )
        return { success: true, output: formatSnapshot(snap) }
      },
    ),

    browserTool(
      'browser_eval',
      'Evaluate a JavaScript expression in the page and return its JSON result.',
      {
        type: 'object',
        properties: { expression: { type: 'string', description: 'Expression to evaluate' } },
        required: ['expression'],
      },
      'Evaluation failed',
      async (params) => {
        const result = await session.evaluate(stringParam(params, 'expression') ?? '')
        const output = typeof result === 'string' ? result : JSON.stringify(result ?? null)
        return { success: true, output }
      },
    ),

    browserTool(
      'browser_close',
      'Close the browser. The next browser tool call starts a fresh one.',
      { type: 'object', properties: {} },
      'Close failed',
      async () => {
        await session.close()
        return { success: true, output: 'Browser closed' }
      },
    ),
  ]
}
