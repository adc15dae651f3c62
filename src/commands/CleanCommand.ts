import { Command, CommandOptions, CommandResult } from './types'
import { HistoryImageCleaner } from '../cleaner/HistoryImageCleaner'
import { describeError, formatMegabytes, formatPath } from './format'

export const CleanCommand: Command = {
  name: 'clean',
  description: 'Extract embedded images from the history file and replace them with file references',
  execute: async (cleaner: HistoryImageCleaner, options: CommandOptions): Promise<CommandResult> => {
    try {
      const summary = await cleaner.clean()
      const { report } = summary

      let message = `Found Claude config: ${summary.historyPath}\n`
      message += `Images will be saved to: ${summary.imagesDir}\n`
      message += `Original file size: ${formatMegabytes(summary.originalSize)}\n\n`

      message += `Items cleaned: ${report.itemsCleaned}\n`
      message += `Images extracted: ${report.imagesExtracted}\n`
      message += `Total size removed: ${formatMegabytes(report.bytesRemoved)}\n`
      if (report.skipped.length > 0) {
        message += `Payloads left untouched: ${report.skipped.length}\n`
      }
      if (report.extractionFailures.length > 0) {
        message += `Images that could not be written: ${report.extractionFailures.length}\n`
      }

      if (options.verbose) {
        for (const image of summary.images) {
          message += `   ✓ ${image.reference} (${image.byteLength} bytes)\n`
        }
        for (const skipped of report.skipped) {
          message += `   - ${skipped.projectId}${formatPath(skipped.path)}: ${skipped.reason}\n`
        }
        for (const failure of report.extractionFailures) {
          message += `   ✗ ${failure.projectId}${formatPath(failure.path)}: ${failure.error}\n`
        }
      }

      if (!summary.changed || summary.newSize === null) {
        message += 'No images found to clean.'
        return { exitCode: 0, message }
      }

      message += `\nBackup saved to: ${summary.backupPath}\n`
      message += 'Cleaned history saved!\n'
      if (report.imagesExtracted > 0) {
        message += `${report.imagesExtracted} images preserved and extracted to files\n`
        message += `Images location: ${summary.imagesDir}\n`
      }
      message += `New file size: ${formatMegabytes(summary.newSize)}\n`
      if (summary.originalSize > 0) {
        message += `Size reduction: ${((1 - summary.newSize / summary.originalSize) * 100).toFixed(1)}%`
      }

      return { exitCode: 0, message: message.trimEnd() }
    } catch (error) {
      return {
        exitCode: 1,
        message: `Failed to clean history: ${describeError(error)}`,
      }
    }
  },
}
