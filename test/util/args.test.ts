import { afterEach, describe, expect, test } from 'vitest'
import { applyLogLevel, flagValue, positionals } from '../../src/util/args'
import { log } from '../../src/util/logger'

describe('applyLogLevel', () => {
  afterEach(() => {
    log.setLevel('info')
  })

  test.each([['--quiet'], ['-q']])('sets error level for %s', (flag) => {
    applyLogLevel([flag])
    expect(log.getLevel()).toBe('error')
  })

  test.each([['--verbose'], ['-v'], ['--debug'], ['-d']])('sets debug level for %s', (flag) => {
    applyLogLevel([flag])
    expect(log.getLevel()).toBe('debug')
  })

  test('does not change level for no matching flags', () => {
    log.setLevel('warn')
    applyLogLevel(['--some-other-flag'])
    expect(log.getLevel()).toBe('warn')
  })
})

describe('flagValue', () => {
  test('returns the argument after the flag', () => {
    expect(flagValue(['run', 'wf.yaml', '--state', 'out.json'], '--state')).toBe('out.json')
  })

  test('undefined when absent or last', () => {
    expect(flagValue(['run'], '--state')).toBeUndefined()
    expect(flagValue(['run', '--state'], '--state')).toBeUndefined()
  })
})

describe('positionals', () => {
  test('skips flags and the values of value flags', () => {
    expect(
      positionals(['find', '--context', 'docs', '-v', 'the', '--max-iterations', '3', 'title', '--headed']),
    ).toEqual(['find', 'the', 'title'])
  })

  test('keeps everything when there are no flags', () => {
    expect(positionals(['wf.json', 'state.json'])).toEqual(['wf.json', 'state.json'])
  })
})
