export { type BrowserSession, createBrowserTools, formatSnapshot } from './browser'
export { htmlToText, httpRequestTool } from './http'
