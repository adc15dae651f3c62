import { JsonValue, PayloadThresholds } from '../contracts'
import { isJsonObject } from '../contracts/schemas'
import { classifyPayload, DEFAULT_THRESHOLDS } from '../cleaning/PayloadLocator'
import { isImageMarker } from '../cleaning/TreeCleaner'

const IMAGE_TOKEN = '\u0000image'

/**
 * Canonical text for comparing two values while ignoring how their images
 * are stored: inline base64, `[IMAGE_FILE:...]` and `[IMAGE_REMOVED]` all
 * collapse to one token. Object keys are sorted.
 */
export function comparisonKey(value: JsonValue, thresholds: PayloadThresholds = DEFAULT_THRESHOLDS): string {
  return JSON.stringify(normalize(value, thresholds))
}

function normalize(value: JsonValue, thresholds: PayloadThresholds): JsonValue {
  if (typeof value === 'string') {
    return isImageMarker(value) || classifyPayload(value, thresholds) ? IMAGE_TOKEN : value
  }
  if (Array.isArray(value)) {
    return value.map((child) => normalize(child, thresholds))
  }
  if (isJsonObject(value)) {
    const sorted: { [key: string]: JsonValue } = {}
    for (const key of Object.keys(value).sort()) {
      sorted[key] = normalize(value[key], thresholds)
    }
    return sorted
  }
  return value
}
