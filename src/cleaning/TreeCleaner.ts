import {
  CleanMode,
  CleanResult,
  DetectedFormat,
  Document,
  JsonObject,
  JsonPath,
  JsonValue,
  LocatedPayload,
  PayloadThresholds,
  ProjectRecord,
  SkippedPayload,
} from '../contracts'
import { isJsonObject } from '../contracts/schemas'
import { decodeBase64, detect } from '../detection/FormatDetector'
import { debugLog } from '../logging/debugLog'
import { CleanContext, createCleanContext } from './CleanContext'
import { locatePayloads, pathKey } from './PayloadLocator'

export const IMAGE_REMOVED = '[IMAGE_REMOVED]'

const IMAGE_FILE_PATTERN = /^\[IMAGE_FILE:(.*)\]$/

export const imageFileMarker = (reference: string): string => `[IMAGE_FILE:${reference}]`

export function parseImageFileMarker(value: string): string | null {
  const match = IMAGE_FILE_PATTERN.exec(value)
  return match ? match[1] : null
}

export const isImageMarker = (value: string): boolean =>
  value === IMAGE_REMOVED || IMAGE_FILE_PATTERN.test(value)

type Replacements = Map<string, string>

function rebuildObject(value: JsonObject, path: JsonPath, replacements: Replacements): JsonObject {
  const result: JsonObject = {}
  for (const [key, child] of Object.entries(value)) {
    result[key] = rebuild(child, [...path, key], replacements)
  }
  return result
}

// Copies the whole tree, swapping in replacements at their paths
function rebuild(value: JsonValue, path: JsonPath, replacements: Replacements): JsonValue {
  if (typeof value === 'string') {
    if (replacements.size === 0) return value
    return replacements.get(pathKey(path)) ?? value
  }
  if (Array.isArray(value)) {
    return value.map((child, i) => rebuild(child, [...path, i], replacements))
  }
  if (isJsonObject(value)) {
    return rebuildObject(value, path, replacements)
  }
  return value
}

function skip(
  context: CleanContext,
  projectId: string,
  payload: LocatedPayload,
  reason: SkippedPayload['reason']
): null {
  context.report.skipped.push({ projectId, path: payload.path, reason })
  debugLog({ event: 'payload_skipped', projectId, path: payload.path, reason, length: payload.value.length })
  return null
}

function remove(context: CleanContext, payload: LocatedPayload): string {
  context.report.itemsCleaned += 1
  context.report.bytesRemoved += payload.value.length
  return IMAGE_REMOVED
}

/**
 * Lossless handling of one payload: the replacement string, or null when the
 * payload must stay as it is.
 */
function extract(context: CleanContext, projectId: string, payload: LocatedPayload): string | null {
  const { store } = context
  if (!store) {
    throw new Error('Lossless cleaning requires an image store')
  }

  const { match } = payload
  if (match.kind === 'text-data-uri') {
    return skip(context, projectId, payload, 'unsupported-format')
  }
  const encoded = match.kind === 'data-uri' ? match.dataUri.payload : payload.value
  const bytes = decodeBase64(encoded)
  if (!bytes) {
    return skip(context, projectId, payload, 'malformed')
  }

  let format: DetectedFormat
  if (match.kind === 'data-uri') {
    format = match.dataUri.format !== 'unknown' ? match.dataUri.format : detect(bytes)
    if (format === 'unknown') {
      return skip(context, projectId, payload, 'unsupported-format')
    }
  } else {
    format = detect(bytes)
    if (format === 'unknown') {
      // No format means no extension; an unidentified blob is discarded
      return remove(context, payload)
    }
  }

  context.sequence += 1
  try {
    const stored = store.save({
      projectId,
      runTimestamp: context.runTimestamp,
      sequence: context.sequence,
      format,
      bytes,
    })
    context.sequence = stored.sequence
    context.images.push({
      projectId,
      format,
      byteLength: bytes.length,
      reference: stored.reference,
      path: stored.path,
    })
    context.report.imagesExtracted += 1
    context.report.itemsCleaned += 1
    context.report.bytesRemoved += payload.value.length
    return imageFileMarker(stored.reference)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    context.report.extractionFailures.push({ projectId, path: payload.path, error: message })
    debugLog({ event: 'extraction_failed', projectId, path: payload.path, error: message })
    return remove(context, payload)
  }
}

export function cleanProject(
  projectId: string,
  record: ProjectRecord,
  mode: CleanMode,
  context: CleanContext
): ProjectRecord {
  const replacements: Replacements = new Map()

  for (const payload of locatePayloads(record, context.thresholds)) {
    const replacement = mode === 'destructive'
      ? remove(context, payload)
      : extract(context, projectId, payload)
    if (replacement !== null) {
      replacements.set(pathKey(payload.path), replacement)
    }
  }

  return rebuildObject(record, [], replacements)
}

/**
 * Rebuild a document with every image payload replaced.
 *
 * lossless: images are written through the context's store and referenced
 * with `[IMAGE_FILE:...]`; unidentifiable raw blobs become `[IMAGE_REMOVED]`.
 * destructive: every payload becomes `[IMAGE_REMOVED]` and nothing is written.
 */
export function clean(document: Document, mode: CleanMode, context: CleanContext): CleanResult {
  const cleaned: Document = {}
  for (const [projectId, record] of Object.entries(document)) {
    cleaned[projectId] = cleanProject(projectId, record, mode, context)
  }

  debugLog({
    event: 'clean_complete',
    mode,
    projects: Object.keys(document).length,
    itemsCleaned: context.report.itemsCleaned,
    imagesExtracted: context.report.imagesExtracted,
    skipped: context.report.skipped.length,
  })

  return { document: cleaned, report: context.report, images: context.images }
}

/**
 * What an old, destructive cleanup would have left of `document`
 */
export function destructiveClean(document: Document, thresholds?: PayloadThresholds): CleanResult {
  return clean(document, 'destructive', createCleanContext({ runTimestamp: '', thresholds }))
}
