import { HistoryImageCleaner } from '../cleaner/HistoryImageCleaner'

export interface CommandResult {
  exitCode: number
  message: string
}

export interface CommandOptions {
  verbose: boolean
  backupFile?: string
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  execute: (cleaner: HistoryImageCleaner, options: CommandOptions) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}
