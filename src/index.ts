export * from './contracts'
export { detect, detectBase64, parseDataUri, decodeBase64, extensionFor } from './detection/FormatDetector'
export { classifyPayload, locatePayloads, DEFAULT_THRESHOLDS } from './cleaning/PayloadLocator'
export type { CleanContext } from './cleaning/CleanContext'
export { createCleanContext } from './cleaning/CleanContext'
export {
  clean,
  destructiveClean,
  IMAGE_REMOVED,
  imageFileMarker,
  parseImageFileMarker,
} from './cleaning/TreeCleaner'
export type { ImageStore, ImageWrite, StoredImage } from './extraction/ImageStore'
export { FileImageStore } from './extraction/FileImageStore'
export { MemoryImageStore } from './extraction/MemoryImageStore'
export { projectSlug, formatRunTimestamp } from './extraction/naming'
export { diff } from './recovery/DeltaComparator'
export { merge } from './recovery/MergeEngine'
export { recoverDocument } from './recovery/recoverDocument'
export { HistoryFileStore } from './storage/HistoryFileStore'
export { ConfigLoader } from './config/ConfigLoader'
export { HistoryImageCleaner, createHistoryImageCleaner } from './cleaner/HistoryImageCleaner'
