import { lookupVariable } from './conditions'
import type { JsonValue, StepResult, Variables } from './types'

export interface InterpolationContext {
  variables: Variables
  /** Latest result recorded under each step name */
  results: ReadonlyMap<string, StepResult>
}

const PLACEHOLDER = /\{\{\s*([^{}]+?)\s*\}\}/g
const WHOLE_PLACEHOLDER = /^\{\{\s*([^{}]+?)\s*\}\}$/

function child(value: JsonValue | undefined, key: string): JsonValue | undefined {
  if (Array.isArray(value)) {
    return /^\d+$/.test(key) ? value[Number(key)] : undefined
  }
  if (value !== null && typeof value === 'object') {
    return Object.hasOwn(value, key) ? value[key] : undefined
  }
  return undefined
}

/**
 * `steps.<name>.output` and `steps.<name>.success` read step results;
 * anything else is a dotted path into the variables.
 */
export function resolveReference(reference: string, ctx: InterpolationContext): JsonValue | undefined {
  const [head = '', ...path] = reference.split('.')

  if (head === 'steps' && path.length === 2) {
    const [step = '', field] = path
    const result = ctx.results.get(step)
    if (!result) return undefined
    if (field === 'output') return result.output
    if (field === 'success') return result.success
    return undefined
  }

  let value = lookupVariable(ctx.variables, head)
  for (const key of path) {
    value = child(value, key)
  }
  return value
}

function asText(value: JsonValue | undefined): string {
  if (value === undefined) return ''
  return typeof value === 'string' ? value : JSON.stringify(value)
}

export function interpolate(value: JsonValue, ctx: InterpolationContext): JsonValue {
  if (typeof value === 'string') {
    const whole = WHOLE_PLACEHOLDER.exec(value)
    if (whole) {
      return resolveReference(whole[1] ?? '', ctx) ?? null
    }
    return value.replace(PLACEHOLDER, (_match, reference: string) => asText(resolveReference(reference, ctx)))
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolate(item, ctx))
  }

  if (value !== null && typeof value === 'object') {
    return interpolateRecord(value, ctx)
  }

  return value
}

export function interpolateRecord(
  record: Record<string, JsonValue>,
  ctx: InterpolationContext,
): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {}
  for (const [key, item] of Object.entries(record)) {
    result[key] = interpolate(item, ctx)
  }
  return result
}
