import { log } from './logger'

/**
 * Apply log level based on CLI args.
 * Mutates the global logger level.
 */
export function applyLogLevel(args: string[]): void {
  if (args.includes('--quiet') || args.includes('-q')) {
    log.setLevel('error')
  } else if (args.includes('--verbose') || args.includes('-v') || args.includes('--debug') || args.includes('-d')) {
    log.setLevel('debug')
  }
}

/** Value following `--name`, or undefined when the flag is absent or last. */
export function flagValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name)
  if (index === -1) return undefined
  return args[index + 1]
}

const VALUE_FLAGS = new Set(['--config', '--state', '--context', '--max-iterations'])

/** Arguments that are neither flags nor flag values. */
export function positionals(args: string[]): string[] {
  const result: string[] = []
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue
    if (VALUE_FLAGS.has(arg)) {
      i++
      continue
    }
    if (arg.startsWith('-')) continue
    result.push(arg)
  }
  return result
}
