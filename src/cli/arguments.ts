export interface CliArguments {
  command: string
  backupFile?: string
  historyFile?: string
  verbose: boolean
  help: boolean
}

const AUTO_BACKUP = 'auto'

const takesValue = (next: string | undefined): next is string => next !== undefined && !next.startsWith('-')

/**
 * Accepts both the command form (`recover [FILE]`) and the flag form
 * (`--recover-from-backup [FILE]`, `--list-backups`). Throws on anything
 * it does not understand.
 */
export function parseArguments(argv: string[]): CliArguments {
  const args: CliArguments = { command: 'clean', verbose: false, help: false }
  let commandSet = false

  const setCommand = (command: string): void => {
    if (commandSet && args.command !== command) {
      throw new Error(`Conflicting commands: ${args.command} and ${command}`)
    }
    args.command = command
    commandSet = true
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const next = argv[i + 1]

    switch (arg) {
      case '--help':
      case '-h':
        args.help = true
        break
      case '--verbose':
      case '-v':
        args.verbose = true
        break
      case '--config-file':
        if (!takesValue(next)) {
          throw new Error('--config-file requires a file path')
        }
        args.historyFile = next
        i++
        break
      case '--list-backups':
        setCommand('list-backups')
        break
      case '--recover-from-backup':
        setCommand('recover')
        if (takesValue(next)) {
          args.backupFile = next === AUTO_BACKUP ? undefined : next
          i++
        }
        break
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`)
        }
        if (!commandSet) {
          setCommand(arg)
        } else if (args.command === 'recover' && args.backupFile === undefined) {
          args.backupFile = arg === AUTO_BACKUP ? undefined : arg
        } else {
          throw new Error(`Unexpected argument: ${arg}`)
        }
    }
  }

  return args
}
