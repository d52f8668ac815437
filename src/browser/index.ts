export { type BrowserOptions, BrowserManager, cleanPageText, type PageSnapshot } from './manager'
export { parseTarget, resolveTarget, type TargetRef, type TargetStrategy } from './targeting'
