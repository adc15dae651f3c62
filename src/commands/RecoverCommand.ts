import { Command, CommandOptions, CommandResult } from './types'
import { HistoryImageCleaner } from '../cleaner/HistoryImageCleaner'
import { describeError, formatMegabytes } from './format'

export const RecoverCommand: Command = {
  name: 'recover',
  aliases: ['--recover-from-backup'],
  description: 'Recover images from a backup and merge them with the current history',
  execute: async (cleaner: HistoryImageCleaner, options: CommandOptions): Promise<CommandResult> => {
    try {
      const summary = await cleaner.recover(options.backupFile)
      const { delta, backupReport } = summary.result
      const projectsWithNewHistory = Object.values(delta.projects)
        .filter((project) => project.newItemIndices.length > 0).length

      let message = 'Data recovery completed successfully!\n\n'
      message += `   Backup file: ${summary.backupPath} (${formatMegabytes(summary.backupSize)})\n`
      message += `   Current file: ${summary.historyPath} (${formatMegabytes(summary.currentSize)})\n`
      message += `   Images recovered: ${backupReport.imagesExtracted}\n`
      message += `   New projects added: ${delta.newProjects.length}\n`
      message += `   Projects with new history: ${projectsWithNewHistory}\n`
      message += `   Final file size: ${formatMegabytes(summary.newSize)}\n`
      message += `   Images location: ${summary.imagesDir}\n`
      message += `   Recovery backup: ${summary.recoveryBackupPath}\n`

      if (delta.divergedProjects.length > 0) {
        message += '\nHistory diverged from the backup in these projects; both sides were kept, please review:\n'
        for (const projectId of delta.divergedProjects) {
          const project = delta.projects[projectId]
          message += `   ${projectId} (${project.newItemIndices.length} new, ${project.backupOnlyCount} only in backup)\n`
        }
      }

      if (options.verbose) {
        for (const projectId of delta.newProjects) {
          message += `   + project ${projectId}\n`
        }
        for (const image of summary.result.images) {
          message += `   ✓ ${image.reference} (${image.byteLength} bytes)\n`
        }
      }

      return { exitCode: 0, message: message.trimEnd() }
    } catch (error) {
      return {
        exitCode: 1,
        message: `Failed to recover from backup: ${describeError(error)}`,
      }
    }
  },
}
