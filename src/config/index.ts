import { Value } from '@sinclair/typebox/value'
import { existsSync, readFileSync } from 'fs'
import { homedir } from 'os'
import { resolve } from 'path'
import { parse } from 'smol-toml'
import { isLogLevel, log } from '../util/logger'
import { type RuntimeConfig, type TaskloomConfig, TaskloomConfigSchema } from './schema'

export { type ProviderType, type RuntimeConfig, type TaskloomConfig, TaskloomConfigSchema } from './schema'

const DEFAULT_MODELS = {
  ollama: 'llama3:70b',
  openai: 'gpt-4o',
  anthropic: 'claude-sonnet-4-20250514',
} as const

export interface LoadConfigOptions {
  /** Explicit config file; skips the search */
  path?: string
  /** Directory searched first for taskloom.toml (default: process.cwd()) */
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export function expandPath(path: string): string {
  return resolve(path.replace(/^~/, homedir()))
}

function findConfigFile(cwd: string): string | null {
  const candidates = [
    resolve(cwd, 'taskloom.toml'),
    resolve(homedir(), '.taskloom', 'taskloom.toml'),
    resolve(homedir(), '.config', 'taskloom', 'taskloom.toml'),
  ]

  for (const path of candidates) {
    if (existsSync(path)) return path
  }

  return null
}

function isTaskloomConfig(value: unknown): value is TaskloomConfig {
  return Value.Check(TaskloomConfigSchema, value)
}

export function parseConfig(content: string, source = 'taskloom.toml'): TaskloomConfig {
  const parsed: unknown = parse(content)

  if (!isTaskloomConfig(parsed)) {
    const problems = [...Value.Errors(TaskloomConfigSchema, parsed)]
      .map(e => `${e.path || '/'}: ${e.message}`)
      .join('; ')
    throw new Error(`Invalid config in ${source}: ${problems}`)
  }

  return parsed
}

export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const env = options.env ?? process.env
  const configPath = options.path ?? findConfigFile(options.cwd ?? process.cwd())
  const toml: TaskloomConfig = configPath ? parseConfig(readFileSync(configPath, 'utf-8'), configPath) : {}

  if (configPath) {
    log.debug('config', `Loaded ${configPath}`)
  }

  const providerType = toml.provider?.type ?? 'ollama'

  // Build runtime config with snake_case from TOML mapped to camelCase
  const config: RuntimeConfig = {
    provider: {
      type: providerType,
      endpoint: toml.provider?.endpoint ?? 'http://localhost:11434',
      model: toml.provider?.model ?? DEFAULT_MODELS[providerType],
      temperature: toml.provider?.temperature ?? 0.7,
      maxTokens: toml.provider?.max_tokens ?? 2048,
    },
    browser: {
      headless: toml.browser?.headless ?? true,
      defaultTimeoutMs: toml.browser?.default_timeout_ms ?? 30000,
    },
    workflow: {
      maxAttempts: toml.workflow?.max_attempts ?? 3,
      backoffMs: toml.workflow?.backoff_ms ?? 1000,
      exponential: toml.workflow?.exponential ?? true,
      stateDir: expandPath(toml.workflow?.state_dir ?? '~/.taskloom/state'),
    },
    agent: {
      maxIterations: toml.agent?.max_iterations ?? 10,
      ...(toml.agent?.system_prompt !== undefined && { systemPrompt: toml.agent.system_prompt }),
    },
    logging: {
      level: toml.logging?.level ?? 'info',
    },
  }

  // Secrets and model overrides from the environment
  if (providerType === 'openai') {
    config.provider.apiKey = env.OPENAI_API_KEY
    config.provider.model = env.OPENAI_MODEL ?? config.provider.model
    config.provider.baseUrl = env.OPENAI_BASE_URL
  } else if (providerType === 'anthropic') {
    config.provider.apiKey = env.ANTHROPIC_API_KEY
    config.provider.model = env.ANTHROPIC_MODEL ?? config.provider.model
  }

  const envLevel = env.TASKLOOM_LOG_LEVEL
  if (envLevel !== undefined) {
    if (isLogLevel(envLevel)) {
      config.logging.level = envLevel
    } else {
      log.warn('config', `Ignoring TASKLOOM_LOG_LEVEL=${envLevel}`)
    }
  }

  return config
}
