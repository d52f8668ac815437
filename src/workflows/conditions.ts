import { Value } from '@sinclair/typebox/value'
import type { ToolRunner } from '../tools/types'
import { conditionFailed, errorMessage } from './errors'
import type { Condition, JsonValue, Variables } from './types'

/** Own-property lookup, so names like `constructor` are never inherited */
export function lookupVariable(variables: Variables, name: string): JsonValue | undefined {
  return Object.hasOwn(variables, name) ? variables[name] : undefined
}

export function describeCondition(condition: Condition): string {
  switch (condition.type) {
    case 'equals':
      return `${condition.variable} == ${JSON.stringify(condition.value)}`
    case 'contains':
      return `${condition.variable} contains ${JSON.stringify(condition.substring)}`
    case 'exists':
      return `${condition.variable} exists`
    case 'element_exists':
      return `element ${condition.selector} exists`
    case 'javascript':
      return `javascript ${condition.expression}`
    case 'http_status':
      return `http status == ${condition.expected}`
  }
}

/**
 * Variable conditions are evaluated locally. Page and HTTP conditions go
 * through the tool runner and fail with `condition_failed` when it cannot
 * answer them. `httpStatus` replaces the runner's last status when the caller
 * tracks responses itself.
 */
export async function evaluateCondition(
  condition: Condition,
  variables: Variables,
  tools?: ToolRunner,
  httpStatus?: () => number | undefined,
): Promise<boolean> {
  switch (condition.type) {
    case 'equals': {
      const value = lookupVariable(variables, condition.variable)
      return value !== undefined && Value.Equal(value, condition.value)
    }
    case 'contains': {
      const value = lookupVariable(variables, condition.variable)
      return typeof value === 'string' && value.includes(condition.substring)
    }
    case 'exists':
      return lookupVariable(variables, condition.variable) !== undefined
    case 'element_exists':
    case 'javascript': {
      const probe = tools?.getProbe()
      if (!probe) {
        throw conditionFailed(`${describeCondition(condition)} (no page available)`)
      }
      try {
        return condition.type === 'element_exists'
          ? await probe.elementExists(condition.selector)
          : Boolean(await probe.evaluate(condition.expression))
      } catch (error) {
        throw conditionFailed(`${describeCondition(condition)}: ${errorMessage(error)}`)
      }
    }
    case 'http_status': {
      if (!tools) {
        throw conditionFailed(`${describeCondition(condition)} (no tool runner)`)
      }
      const status = httpStatus ? httpStatus() : tools.lastHttpStatus()
      return status === condition.expected
    }
  }
}
