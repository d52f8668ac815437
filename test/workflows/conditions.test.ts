import { describe, expect, test } from 'vitest'
import { describeCondition, evaluateCondition, lookupVariable } from '../../src/workflows/conditions'
import { isWorkflowError } from '../../src/workflows/errors'
import { fakeTools } from './helpers'

describe('lookupVariable', () => {
  test('ignores inherited properties', () => {
    expect(lookupVariable({}, 'constructor')).toBeUndefined()
    expect(lookupVariable({ constructor: 1 }, 'constructor')).toBe(1)
  })
})

describe('describeCondition', () => {
  test('renders every condition kind', () => {
    expect(describeCondition({ type: 'equals', variable: 'count', value: 3 })).toBe('count == 3')
    expect(describeCondition({ type: 'contains', variable: 'body', substring: 'ok' })).toBe('body contains "ok"')
    expect(describeCondition({ type: 'exists', variable: 'token' })).toBe('token exists')
    expect(describeCondition({ type: 'element_exists', selector: '#app' })).toBe('element #app exists')
    expect(describeCondition({ type: 'javascript', expression: 'window.ready' })).toBe('javascript window.ready')
    expect(describeCondition({ type: 'http_status', expected: 204 })).toBe('http status == 204')
  })
})

describe('evaluateCondition', () => {
  test('equals compares structurally', async () => {
    const variables = { user: { name: 'ada', roles: ['admin'] } }
    expect(await evaluateCondition({ type: 'equals', variable: 'user', value: { name: 'ada', roles: ['admin'] } }, variables)).toBe(true)
    expect(await evaluateCondition({ type: 'equals', variable: 'user', value: { name: 'ada' } }, variables)).toBe(false)
  })

  test('equals is false for an unbound variable, even against null', async () => {
    expect(await evaluateCondition({ type: 'equals', variable: 'missing', value: null }, {})).toBe(false)
    expect(await evaluateCondition({ type: 'equals', variable: 'empty', value: null }, { empty: null })).toBe(true)
  })

  test('contains only matches strings', async () => {
    expect(await evaluateCondition({ type: 'contains', variable: 'body', substring: 'ready' }, { body: 'all ready' })).toBe(true)
    expect(await evaluateCondition({ type: 'contains', variable: 'body', substring: 'ready' }, { body: ['ready'] })).toBe(false)
  })

  test('exists is true for bound null', async () => {
    expect(await evaluateCondition({ type: 'exists', variable: 'x' }, { x: null })).toBe(true)
    expect(await evaluateCondition({ type: 'exists', variable: 'x' }, {})).toBe(false)
  })

  test('page conditions use the probe', async () => {
    const tools = fakeTools(undefined, {
      elementExists: async (selector) => selector === '#app',
      evaluate: async (expression) => (expression === 'document.title' ? 'Home' : 0),
    })

    expect(await evaluateCondition({ type: 'element_exists', selector: '#app' }, {}, tools)).toBe(true)
    expect(await evaluateCondition({ type: 'element_exists', selector: '#nope' }, {}, tools)).toBe(false)
    expect(await evaluateCondition({ type: 'javascript', expression: 'document.title' }, {}, tools)).toBe(true)
    expect(await evaluateCondition({ type: 'javascript', expression: 'zero' }, {}, tools)).toBe(false)
  })

  test('page conditions without a page fail', async () => {
    const error = await evaluateCondition({ type: 'element_exists', selector: '#app' }, {}, fakeTools()).catch(
      (e: unknown) => e,
    )
    expect(isWorkflowError(error, 'condition_failed')).toBe(true)
    expect(error instanceof Error && error.message).toBe(
      'Conditional evaluation failed: element #app exists (no page available)',
    )
  })

  test('probe errors are wrapped', async () => {
    const tools = fakeTools(undefined, {
      elementExists: async () => false,
      evaluate: async () => {
        throw new Error('ReferenceError: foo is not defined')
      },
    })
    await expect(evaluateCondition({ type: 'javascript', expression: 'foo' }, {}, tools)).rejects.toThrow(
      'Conditional evaluation failed: javascript foo: ReferenceError: foo is not defined',
    )
  })

  test('http_status needs a tool runner', async () => {
    await expect(evaluateCondition({ type: 'http_status', expected: 200 }, {})).rejects.toThrow(
      'Conditional evaluation failed: http status == 200 (no tool runner)',
    )
  })

  test('http_status is false before any response', async () => {
    expect(await evaluateCondition({ type: 'http_status', expected: 200 }, {}, fakeTools())).toBe(false)
  })

  test('a status source overrides the runner', async () => {
    const tools = fakeTools()
    expect(await evaluateCondition({ type: 'http_status', expected: 201 }, {}, tools, () => 201)).toBe(true)
    expect(await evaluateCondition({ type: 'http_status', expected: 201 }, {}, tools, () => undefined)).toBe(false)
  })
})
