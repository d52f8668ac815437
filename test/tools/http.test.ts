import { afterEach, describe, expect, test, vi } from 'vitest'
import { htmlToText, httpRequestTool } from '../../src/tools/builtin/http'

describe('htmlToText', () => {
  test('drops scripts and styles and breaks on block tags', () => {
    const html =
      '<html><head><style>p{}</style></head><body><h1>Title</h1>' +
      '<p>Hello &amp; welcome</p><script>x()</script></body></html>'
    expect(htmlToText(html)).toBe('Title\n\nHello & welcome')
  })

  test('decodes numeric entities and collapses spaces', () => {
    expect(htmlToText('<span>a&#33;   b</span>')).toBe('a! b')
  })
})

describe('http_request', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  test('returns the status line and body', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) =>
        new Response('all good', { status: 200, statusText: 'OK', headers: { 'content-type': 'text/plain' } }),
    )
    vi.stubGlobal('fetch', fetchMock)

    const result = await httpRequestTool.execute({ url: 'http://localhost:8080/health' })

    expect(result).toEqual({ success: true, output: 'HTTP 200 OK\n\nall good', http_status: 200 })
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET')
  })

  test('error statuses are still successful calls', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404, statusText: 'Not Found' })))

    const result = await httpRequestTool.execute({ url: 'http://localhost:8080/missing' })

    expect(result).toEqual({ success: true, output: 'HTTP 404 Not Found', http_status: 404 })
  })

  test('pretty-prints JSON bodies', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        async () =>
          new Response('{"ok":true}', { status: 200, statusText: 'OK', headers: { 'content-type': 'application/json' } }),
      ),
    )

    const result = await httpRequestTool.execute({ url: 'http://localhost:8080/api' })

    expect(result.output).toBe('HTTP 200 OK\n\n{\n  "ok": true\n}')
  })

  test('object bodies are sent as JSON', async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init?: RequestInit) => new Response('', { status: 201, statusText: 'Created' }),
    )
    vi.stubGlobal('fetch', fetchMock)

    await httpRequestTool.execute({ url: 'http://localhost:8080/items', method: 'post', body: { name: 'a' } })

    const init = fetchMock.mock.calls[0]?.[1]
    expect(init?.method).toBe('POST')
    expect(init?.body).toBe('{"name":"a"}')
    expect(init?.headers).toEqual({ 'content-type': 'application/json' })
  })

  test('rejects bad URLs and methods without a request', async () => {
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)

    expect(await httpRequestTool.execute({ url: 'ftp://localhost/file' })).toEqual({
      success: false,
      output: 'URL must start with http:// or https://',
    })
    expect(await httpRequestTool.execute({ url: 'http://localhost', method: 'TRACE' })).toEqual({
      success: false,
      output: 'Unsupported method: TRACE',
    })
    expect(fetchMock).not.toHaveBeenCalled()
  })

  test('network failures are failed results', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      }),
    )

    expect(await httpRequestTool.execute({ url: 'http://localhost:1/' })).toEqual({
      success: false,
      output: 'Request failed: fetch failed',
    })
  })

  test('timeouts are reported with the limit', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
      }),
    )

    expect(await httpRequestTool.execute({ url: 'http://localhost/slow', timeout_ms: 50 })).toEqual({
      success: false,
      output: 'Request timed out after 50ms',
    })
  })
})
