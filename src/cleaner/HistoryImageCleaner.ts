import fs from 'fs'
import {
  BackupInfo,
  CleanerConfig,
  CleanReport,
  ExtractedImage,
  HistoryFile,
  RecoveryResult,
} from '../contracts'
import { ConfigLoader } from '../config/ConfigLoader'
import { findHistoryFile, historyFileCandidates, imagesDirectory } from '../config/paths'
import { createCleanContext } from '../cleaning/CleanContext'
import { clean } from '../cleaning/TreeCleaner'
import { FileImageStore } from '../extraction/FileImageStore'
import { ImageStore } from '../extraction/ImageStore'
import { formatRunTimestamp } from '../extraction/naming'
import { recoverDocument } from '../recovery/recoverDocument'
import { HistoryFileStore } from '../storage/HistoryFileStore'
import { debugLog } from '../logging/debugLog'

export interface HistoryImageCleanerOptions {
  historyPath: string
  imagesDir: string
  config: CleanerConfig
  fileStore?: HistoryFileStore
  imageStore?: ImageStore
  now?: () => Date
}

export interface CleanSummary {
  historyPath: string
  imagesDir: string
  changed: boolean
  originalSize: number
  newSize: number | null
  backupPath: string | null
  report: CleanReport
  images: ExtractedImage[]
}

export interface RecoverySummary {
  historyPath: string
  imagesDir: string
  backupPath: string
  backupSize: number
  currentSize: number
  newSize: number
  recoveryBackupPath: string
  result: RecoveryResult
}

export class HistoryImageCleaner {
  private fileStore: HistoryFileStore
  private imageStore: ImageStore
  private now: () => Date

  constructor(private options: HistoryImageCleanerOptions) {
    this.fileStore = options.fileStore ?? new HistoryFileStore(options.config.output.indent)
    this.imageStore = options.imageStore ?? new FileImageStore(options.imagesDir)
    this.now = options.now ?? (() => new Date())
  }

  get historyPath(): string {
    return this.options.historyPath
  }

  get imagesDir(): string {
    return this.options.imagesDir
  }

  /**
   * Extract every embedded image of the history file to the image store and
   * rewrite the file with references. Nothing is written when no payload
   * was found.
   */
  async clean(): Promise<CleanSummary> {
    this.ensureHistoryFile()
    const file = await this.fileStore.load(this.historyPath)
    const runTimestamp = formatRunTimestamp(this.now())

    const context = createCleanContext({
      runTimestamp,
      store: this.imageStore,
      thresholds: this.options.config.thresholds,
    })
    const result = clean(file.document, 'lossless', context)

    const summary: CleanSummary = {
      historyPath: this.historyPath,
      imagesDir: this.imagesDir,
      changed: false,
      originalSize: file.sizeBytes,
      newSize: null,
      backupPath: null,
      report: result.report,
      images: result.images,
    }

    if (result.report.itemsCleaned === 0) {
      debugLog({ event: 'clean_no_changes', file: this.historyPath })
      return summary
    }

    summary.backupPath = await this.fileStore.writeBackup(this.historyPath, 'backup', runTimestamp)
    summary.newSize = await this.fileStore.saveAtomic(
      this.historyPath,
      this.fileStore.withDocument(file.root, result.document)
    )
    summary.changed = true
    return summary
  }

  /**
   * Recover images from a backup taken before a destructive cleanup, keeping
   * whatever the current file gained since. With no path, the largest backup
   * above the configured size is used.
   */
  async recover(backupPath?: string): Promise<RecoverySummary> {
    this.ensureHistoryFile()

    const resolvedBackup = backupPath ?? (await this.findRecoveryBackup())
    if (!resolvedBackup) {
      throw new Error(
        'No suitable backup files found. Specify a backup file manually, ' +
        'or use --list-backups to see available files.'
      )
    }

    let backup: HistoryFile
    try {
      backup = await this.fileStore.load(resolvedBackup)
    } catch (error) {
      throw new Error(
        `Backup file could not be read: ${resolvedBackup} (${error instanceof Error ? error.message : String(error)})`
      )
    }
    const current = await this.fileStore.load(this.historyPath)

    const runTimestamp = formatRunTimestamp(this.now())
    const context = createCleanContext({
      runTimestamp,
      store: this.imageStore,
      thresholds: this.options.config.thresholds,
    })
    const result = recoverDocument(backup.document, current.document, context)

    const recoveryBackupPath = await this.fileStore.writeBackup(this.historyPath, 'recovery-backup', runTimestamp)
    const newSize = await this.fileStore.saveAtomic(
      this.historyPath,
      this.fileStore.withDocument(current.root, result.document)
    )

    return {
      historyPath: this.historyPath,
      imagesDir: this.imagesDir,
      backupPath: resolvedBackup,
      backupSize: backup.sizeBytes,
      currentSize: current.sizeBytes,
      newSize,
      recoveryBackupPath,
      result,
    }
  }

  async listBackups(): Promise<BackupInfo[]> {
    return this.fileStore.listBackups(this.historyPath)
  }

  private async findRecoveryBackup(): Promise<string | null> {
    const backup = await this.fileStore.findRecoveryBackup(
      this.historyPath,
      this.options.config.backups.autoDetectMinBytes
    )
    if (backup) {
      debugLog({ event: 'backup_auto_detected', backup: backup.path, bytes: backup.sizeBytes })
    }
    return backup?.path ?? null
  }

  private ensureHistoryFile(): void {
    if (fs.existsSync(this.historyPath)) {
      return
    }
    const searched = historyFileCandidates().map((candidate) => `  - ${candidate}`).join('\n')
    throw new Error(`Claude config file not found: ${this.historyPath}\nSearched in:\n${searched}`)
  }
}

export interface CreateCleanerOptions {
  historyFile?: string
  configLoader?: ConfigLoader
}

/**
 * Resolve paths from the command line, the config file and the platform
 * defaults, in that order.
 */
export function createHistoryImageCleaner(options: CreateCleanerOptions = {}): HistoryImageCleaner {
  const config = (options.configLoader ?? new ConfigLoader()).getConfig()
  return new HistoryImageCleaner({
    historyPath: options.historyFile ?? config.historyFile ?? findHistoryFile(),
    imagesDir: config.imagesDir ?? imagesDirectory(),
    config,
  })
}
