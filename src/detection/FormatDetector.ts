import { DataUri, DetectedFormat, ImageFormat } from '../contracts'

interface Signature {
  format: ImageFormat
  minLength: number
  matches: (bytes: Uint8Array) => boolean
}

const startsWith = (bytes: Uint8Array, prefix: number[], offset = 0): boolean =>
  prefix.every((byte, i) => bytes[offset + i] === byte)

const ascii = (text: string): number[] => Array.from(text, (char) => char.charCodeAt(0))

// Checked in order; the length guard runs before any byte is read
const SIGNATURES: Signature[] = [
  {
    format: 'png',
    minLength: 8,
    matches: (bytes) => startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  {
    format: 'jpeg',
    minLength: 3,
    matches: (bytes) => startsWith(bytes, [0xff, 0xd8, 0xff]),
  },
  {
    format: 'gif',
    minLength: 6,
    matches: (bytes) => startsWith(bytes, ascii('GIF87a')) || startsWith(bytes, ascii('GIF89a')),
  },
  {
    format: 'webp',
    minLength: 12,
    matches: (bytes) => startsWith(bytes, ascii('RIFF')) && startsWith(bytes, ascii('WEBP'), 8),
  },
  {
    format: 'bmp',
    minLength: 2,
    matches: (bytes) => startsWith(bytes, ascii('BM')),
  },
]

export const SVG_SCAN_BYTES = 256

// Enough base64 characters to cover SVG_SCAN_BYTES once decoded
const DETECTION_PREFIX_CHARS = Math.ceil(SVG_SCAN_BYTES / 3) * 4

const EXTENSIONS: Record<ImageFormat, string> = {
  png: '.png',
  jpeg: '.jpg',
  gif: '.gif',
  webp: '.webp',
  bmp: '.bmp',
  svg: '.svg',
}

const DATA_URI_SUBTYPES: Record<string, ImageFormat> = {
  png: 'png',
  jpeg: 'jpeg',
  jpg: 'jpeg',
  pjpeg: 'jpeg',
  gif: 'gif',
  webp: 'webp',
  bmp: 'bmp',
  'x-ms-bmp': 'bmp',
  'svg+xml': 'svg',
}

const DATA_URI_PATTERN = /^data:image\/([^;,\s]+);base64,/i
const STRICT_BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/
const WHITESPACE_PATTERN = /\s+/g

/**
 * Classify raw bytes by their magic number, falling back to a textual
 * `<svg` probe when no binary signature matches.
 */
export function detect(bytes: Uint8Array): DetectedFormat {
  for (const signature of SIGNATURES) {
    if (bytes.length >= signature.minLength && signature.matches(bytes)) {
      return signature.format
    }
  }

  const head = Buffer.from(bytes.subarray(0, SVG_SCAN_BYTES)).toString('utf8').toLowerCase()
  if (head.includes('<svg')) {
    return 'svg'
  }

  return 'unknown'
}

/**
 * Classify base64 text by decoding only its leading characters.
 * Characters outside the alphabet are ignored the way Buffer does it.
 */
export function detectBase64(text: string): DetectedFormat {
  const head = text.slice(0, DETECTION_PREFIX_CHARS * 2).replace(WHITESPACE_PATTERN, '')
  const bytes = Buffer.from(head.slice(0, DETECTION_PREFIX_CHARS), 'base64')
  if (bytes.length === 0) {
    return 'unknown'
  }
  return detect(bytes)
}

export function parseDataUri(text: string): DataUri | null {
  const match = DATA_URI_PATTERN.exec(text)
  if (!match) {
    return null
  }

  const subtype = match[1].toLowerCase()
  return {
    format: DATA_URI_SUBTYPES[subtype] ?? 'unknown',
    subtype,
    payload: text.slice(match[0].length),
  }
}

/**
 * Strict decode used before anything is written to disk.
 * Returns null for text that is not valid base64.
 */
export function decodeBase64(text: string): Buffer | null {
  let clean = text.replace(WHITESPACE_PATTERN, '')
  if (!STRICT_BASE64_PATTERN.test(clean)) {
    return null
  }

  const unpadded = clean.replace(/=+$/, '')
  if (unpadded.length === 0 || unpadded.length % 4 === 1) {
    return null
  }

  const missingPadding = clean.length % 4
  if (missingPadding) {
    clean += '='.repeat(4 - missingPadding)
  }
  return Buffer.from(clean, 'base64')
}

export function extensionFor(format: ImageFormat): string {
  return EXTENSIONS[format]
}
