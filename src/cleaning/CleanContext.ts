import { CleanReport, ExtractedImage, PayloadThresholds } from '../contracts'
import { ImageStore } from '../extraction/ImageStore'
import { DEFAULT_THRESHOLDS } from './PayloadLocator'

/**
 * Mutable state for one cleaning run. The image sequence keeps counting
 * across projects, so every file of a run gets a distinct number.
 */
export interface CleanContext {
  runTimestamp: string
  sequence: number
  store?: ImageStore
  thresholds: PayloadThresholds
  report: CleanReport
  images: ExtractedImage[]
}

export interface CleanContextOptions {
  runTimestamp: string
  store?: ImageStore
  thresholds?: PayloadThresholds
}

export const emptyReport = (): CleanReport => ({
  itemsCleaned: 0,
  imagesExtracted: 0,
  bytesRemoved: 0,
  skipped: [],
  extractionFailures: [],
})

export function createCleanContext(options: CleanContextOptions): CleanContext {
  return {
    runTimestamp: options.runTimestamp,
    sequence: 0,
    store: options.store,
    thresholds: options.thresholds ?? DEFAULT_THRESHOLDS,
    report: emptyReport(),
    images: [],
  }
}
