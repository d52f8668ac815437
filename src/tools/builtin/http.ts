import { numberParam, stringParam, type Tool, type ToolResult } from '../types'

const DEFAULT_TIMEOUT_MS = 15000
const MAX_BODY_LENGTH = 50000
const METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']

/**
 * Reduce an HTML document to readable text.
 * Not a parser: script and style blocks are dropped, block tags become line breaks.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript)[\s\S]*?<\/\1>/gi, '')
    .replace(/<\/?(p|div|br|hr|h[1-6]|li|tr|blockquote|pre|section|article|header|footer|nav|main)(\s[^>]*)?\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (_match, dec: string) => String.fromCharCode(Number(dec)))
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

function formatBody(contentType: string, raw: string): string {
  let body = raw
  if (contentType.includes('application/json')) {
    try {
      body = JSON.stringify(JSON.parse(raw), null, 2)
    } catch {
      body = raw
    }
  } else if (contentType.includes('text/html')) {
    body = htmlToText(raw)
  }

  return body.length > MAX_BODY_LENGTH
    ? `${body.slice(0, MAX_BODY_LENGTH)}\n\n[Truncated: body exceeded ${MAX_BODY_LENGTH} characters]`
    : body
}

function toHeaders(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {}
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, v] of Object.entries(value)) {
      headers[key] = typeof v === 'string' ? v : String(v)
    }
  }
  return headers
}

/**
 * Any completed exchange is a successful call, whatever its status;
 * the status is recorded for `http_status` conditions.
 */
export const httpRequestTool: Tool = {
  definition: {
    name: 'http_request',
    description: 'Send an HTTP request and return the status line and the response body as text.',
    parameters: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Absolute http(s) URL' },
        method: { type: 'string', description: 'HTTP method', enum: METHODS, default: 'GET' },
        headers: { type: 'object', description: 'Request headers' },
        body: { type: 'string', description: 'Request body; objects are sent as JSON' },
        timeout_ms: { type: 'number', description: `Request timeout (default: ${DEFAULT_TIMEOUT_MS})` },
      },
      required: ['url'],
    },
  },

  async execute(params: Record<string, unknown>): Promise<ToolResult> {
    const url = stringParam(params, 'url') ?? ''
    const method = (stringParam(params, 'method') ?? 'GET').toUpperCase()
    const timeoutMs = numberParam(params, 'timeout_ms') ?? DEFAULT_TIMEOUT_MS

    if (!url.startsWith('http://') && !url.startsWith('https://')) {
      return { success: false, output: 'URL must start with http:// or https://' }
    }
    if (!METHODS.includes(method)) {
      return { success: false, output: `Unsupported method: ${method}` }
    }

    const headers = toHeaders(params.headers)
    let body: string | undefined
    if (typeof params.body === 'string') {
      body = params.body
    } else if (params.body !== undefined && params.body !== null) {
      body = JSON.stringify(params.body)
      headers['content-type'] ??= 'application/json'
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      })

      const raw = method === 'HEAD' ? '' : await response.text()
      const text = formatBody(response.headers.get('content-type') ?? '', raw)
      const statusLine = `HTTP ${response.status} ${response.statusText}`.trimEnd()

      return {
        success: true,
        output: text ? `${statusLine}\n\n${text}` : statusLine,
        http_status: response.status,
      }
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { success: false, output: `Request timed out after ${timeoutMs}ms` }
      }
      const message = error instanceof Error ? error.message : String(error)
      return { success: false, output: `Request failed: ${message}` }
    }
  },
}
