import { JsonPath, JsonValue, LocatedPayload, PayloadMatch, PayloadThresholds } from '../contracts'
import { isJsonObject } from '../contracts/schemas'
import { detectBase64, parseDataUri } from '../detection/FormatDetector'

export const DEFAULT_THRESHOLDS: PayloadThresholds = {
  minHeuristicLength: 32768,
  minDetectedLength: 1024,
}

const IMAGE_DATA_URI_PREFIX = /^data:image\//i

// Base64 alphabet, tolerating MIME line breaks and trailing padding
const RAW_BASE64_PATTERN = /^[A-Za-z0-9+/\r\n]+={0,2}[\r\n]*$/

/**
 * Decide whether a single string carries an image payload.
 *
 * Image data URIs always qualify, base64 or not. Unwrapped base64 qualifies
 * when its decoded head has a known magic number (above `minDetectedLength`),
 * or, with no magic number, when it is at least `minHeuristicLength`
 * characters long.
 */
export function classifyPayload(
  value: string,
  thresholds: PayloadThresholds = DEFAULT_THRESHOLDS
): PayloadMatch | null {
  const dataUri = parseDataUri(value)
  if (dataUri) {
    return { kind: 'data-uri', dataUri }
  }
  if (IMAGE_DATA_URI_PREFIX.test(value)) {
    return { kind: 'text-data-uri' }
  }

  const minLength = Math.min(thresholds.minDetectedLength, thresholds.minHeuristicLength)
  if (value.length < minLength || !RAW_BASE64_PATTERN.test(value)) {
    return null
  }

  if (value.length >= thresholds.minDetectedLength) {
    const format = detectBase64(value)
    if (format !== 'unknown') {
      return { kind: 'detected', format }
    }
  }

  if (value.length >= thresholds.minHeuristicLength) {
    return { kind: 'heuristic' }
  }

  return null
}

function* walk(value: JsonValue, path: JsonPath, thresholds: PayloadThresholds): Generator<LocatedPayload> {
  if (typeof value === 'string') {
    const match = classifyPayload(value, thresholds)
    if (match) {
      yield { path, value, match }
    }
    return
  }

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      yield* walk(value[i], [...path, i], thresholds)
    }
    return
  }

  if (isJsonObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      yield* walk(child, [...path, key], thresholds)
    }
  }
}

/**
 * Every image payload inside `value`, in document order. The result can be
 * iterated any number of times; each pass walks the tree afresh.
 */
export function locatePayloads(
  value: JsonValue,
  thresholds: PayloadThresholds = DEFAULT_THRESHOLDS
): Iterable<LocatedPayload> {
  return {
    [Symbol.iterator]: () => walk(value, [], thresholds),
  }
}

export const pathKey = (path: JsonPath): string => JSON.stringify(path)
