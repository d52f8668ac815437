#!/usr/bin/env node

import { type AppServices, createAppServices, shutdownServices } from './bootstrap'
import {
  listToolsCommand,
  resumeWorkflowCommand,
  runAgentCommand,
  runWorkflowCommand,
  showStatus,
} from './commands'
import { loadConfig, type RuntimeConfig } from './config'
import { applyLogLevel, flagValue } from './util/args'
import { log } from './util/logger'

type Command = (services: AppServices, args: string[]) => Promise<number>

const COMMANDS: Record<string, Command> = {
  run: runWorkflowCommand,
  resume: resumeWorkflowCommand,
  agent: runAgentCommand,
  tools: listToolsCommand,
  status: showStatus,
}

async function main(): Promise<number> {
  const args = process.argv.slice(2)
  const command = args[0] ?? 'help'

  if (command === 'help' || command === '--help' || command === '-h') {
    showHelp()
    return 0
  }

  const handler = COMMANDS[command]
  if (!handler) {
    console.error(`Unknown command: ${command}`)
    showHelp()
    return 1
  }

  let config: RuntimeConfig
  try {
    config = loadConfig({ path: flagValue(args, '--config') })
  } catch (error) {
    console.error('Failed to load config:', error instanceof Error ? error.message : error)
    return 1
  }

  log.setLevel(config.logging.level)
  applyLogLevel(args)
  if (args.includes('--headed')) {
    config.browser.headless = false
  }

  const services = createAppServices(config)
  try {
    return await handler(services, args.slice(1))
  } finally {
    await shutdownServices(services)
  }
}

function showHelp() {
  console.log(`
taskloom - workflow and agent task runner

Usage:
  taskloom <command> [options]

Commands:
  run <definition>            Run a workflow (built-in name, .json or .yaml file)
  resume <definition> <state> Resume a workflow from a saved state file
  agent <goal>                Let the agent work on a goal with the available tools
  tools                       List the available tools
  status                      Show configuration and check the provider
  help                        Show this help message

Options:
  --config <path>         Config file (default: ./taskloom.toml, ~/.taskloom/taskloom.toml)
  --state <file>          State file for run (default: <state_dir>/<workflow id>.json)
  --context <text>        Extra context for agent
  --max-iterations <n>    Iteration cap for agent
  --headed                Show the browser window
  -v, --verbose           Enable verbose/debug logging
  -d, --debug             Alias for --verbose
  -q, --quiet             Only show errors

Examples:
  taskloom run endpoint-check
  taskloom run ./workflows/login.yaml --state ./login-state.json
  taskloom resume ./workflows/login.yaml ./login-state.json
  taskloom agent "Find the title of https://example.com" --max-iterations 5
`)
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  })
