export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export interface JsonObject {
  [key: string]: JsonValue
}

// Keys and indices from a root value down to one nested value
export type JsonPath = Array<string | number>

export type ProjectRecord = JsonObject

// Project identifier (usually an absolute path) -> project record, in file order
export type Document = Record<string, ProjectRecord>

export interface HistoryFile {
  path: string
  root: JsonObject
  document: Document
  sizeBytes: number
}

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'webp' | 'bmp' | 'svg'

export type DetectedFormat = ImageFormat | 'unknown'

export interface DataUri {
  format: DetectedFormat
  subtype: string
  payload: string
}

export type PayloadMatch =
  | { kind: 'data-uri'; dataUri: DataUri }
  | { kind: 'detected'; format: ImageFormat }
  | { kind: 'heuristic' }
  // data:image/ URI that is not base64 encoded (e.g. a utf8 SVG)
  | { kind: 'text-data-uri' }

export interface LocatedPayload {
  path: JsonPath
  value: string
  match: PayloadMatch
}

export interface PayloadThresholds {
  minHeuristicLength: number
  minDetectedLength: number
}

export type CleanMode = 'lossless' | 'destructive'

export interface ExtractedImage {
  projectId: string
  format: ImageFormat
  byteLength: number
  reference: string
  path: string
}

export interface SkippedPayload {
  projectId: string
  path: JsonPath
  reason: 'malformed' | 'unsupported-format'
}

export interface ExtractionFailure {
  projectId: string
  path: JsonPath
  error: string
}

export interface CleanReport {
  itemsCleaned: number
  imagesExtracted: number
  bytesRemoved: number
  skipped: SkippedPayload[]
  extractionFailures: ExtractionFailure[]
}

export interface CleanResult {
  document: Document
  report: CleanReport
  images: ExtractedImage[]
}

export type ProjectDeltaStatus = 'unchanged' | 'appended' | 'diverged'

export interface ProjectDelta {
  status: ProjectDeltaStatus
  // Indices into the current document's history, ascending
  newItemIndices: number[]
  matchedCount: number
  backupOnlyCount: number
}

export interface DeltaReport {
  newProjects: string[]
  projects: Record<string, ProjectDelta>
  divergedProjects: string[]
  backupOnlyProjects: string[]
}

export interface RecoveryResult {
  document: Document
  delta: DeltaReport
  backupReport: CleanReport
  images: ExtractedImage[]
}

export interface BackupInfo {
  name: string
  path: string
  sizeBytes: number
}

export interface CleanerConfig {
  historyFile?: string
  imagesDir?: string
  thresholds: PayloadThresholds
  backups: {
    autoDetectMinBytes: number
  }
  output: {
    indent: number
  }
}
