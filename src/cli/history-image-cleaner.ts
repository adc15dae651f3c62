#!/usr/bin/env node

import { CliArguments, parseArguments } from './arguments'
import { CommandRegistry, CommandResult, defaultCommands } from '../commands'
import {
  CreateCleanerOptions,
  HistoryImageCleaner,
  createHistoryImageCleaner,
} from '../cleaner/HistoryImageCleaner'
import { debugLog } from '../logging/debugLog'

export interface RunDeps {
  registry?: CommandRegistry
  createCleaner?: (options: CreateCleanerOptions) => HistoryImageCleaner
}

const usage = (registry: CommandRegistry): string =>
  `Usage: history-image-cleaner [command] [options]

Extract and preserve base64 encoded images from Claude Code history.

Commands:
${registry.usage()}

Options:
  --recover-from-backup [FILE]  Same as "recover"; picks the largest backup when FILE is omitted
  --list-backups                Same as "list-backups"
  --config-file FILE            Use this history file instead of auto-detection
  -v, --verbose                 List every extracted image and skipped payload
  -h, --help                    Show this help`

export async function run(argv: string[], deps: RunDeps = {}): Promise<CommandResult> {
  const registry = deps.registry ?? CommandRegistry.createWithDefaults(defaultCommands)

  let args: CliArguments
  try {
    args = parseArguments(argv)
  } catch (error) {
    return {
      exitCode: 1,
      message: `${error instanceof Error ? error.message : String(error)}\n\n${usage(registry)}`,
    }
  }

  if (args.help) {
    return { exitCode: 0, message: usage(registry) }
  }

  const command = registry.get(args.command)
  if (!command) {
    return { exitCode: 1, message: `Unknown command: ${args.command}\n\n${usage(registry)}` }
  }

  debugLog({ event: 'command_start', command: command.name, argv })

  const createCleaner = deps.createCleaner ?? createHistoryImageCleaner
  const cleaner = createCleaner({ historyFile: args.historyFile })
  const result = await command.execute(cleaner, {
    verbose: args.verbose,
    backupFile: args.backupFile,
  })

  debugLog({ event: 'command_complete', command: command.name, exitCode: result.exitCode })
  return result
}

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2))
    .then((result) => {
      if (result.exitCode === 0) {
        console.log(result.message)
      } else {
        console.error(result.message)
      }
      process.exitCode = result.exitCode
    })
    .catch((error) => {
      console.error('history-image-cleaner failed:', error)
      process.exitCode = 1
    })
}
