import { Command, CommandResult } from './types'
import { HistoryImageCleaner } from '../cleaner/HistoryImageCleaner'
import { describeError, formatMegabytes } from './format'

export const ListBackupsCommand: Command = {
  name: 'list-backups',
  aliases: ['--list-backups'],
  description: 'List available backup files',
  execute: async (cleaner: HistoryImageCleaner): Promise<CommandResult> => {
    try {
      const backups = await cleaner.listBackups()
      if (backups.length === 0) {
        return { exitCode: 0, message: 'No backup files found' }
      }

      let message = 'Available backup files:\n'
      for (const backup of backups) {
        message += `  ${backup.name} (${formatMegabytes(backup.sizeBytes)})\n`
      }
      return { exitCode: 0, message: message.trimEnd() }
    } catch (error) {
      return {
        exitCode: 1,
        message: `Failed to list backups: ${describeError(error)}`,
      }
    }
  },
}
