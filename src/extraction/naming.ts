import crypto from 'crypto'
import path from 'path'
import { ImageFormat } from '../contracts'
import { extensionFor } from '../detection/FormatDetector'

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Local time as YYYYMMDD_HHMMSS, shared by run directories and backup names
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/**
 * Directory name for a project: readable basename plus a hash of the full
 * identifier, so two projects that share a basename never share a folder.
 */
export function projectSlug(projectId: string): string {
  const hash = crypto.createHash('md5').update(projectId, 'utf8').digest('hex').slice(0, 8)
  const baseName = path.posix.basename(projectId.replace(/\\/g, '/'))
  const safeName = baseName.replace(/[^A-Za-z0-9._-]/g, '_') || 'unknown'
  return `${safeName}_${hash}`
}

export function imageFileName(sequence: number, format: ImageFormat): string {
  return `image_${pad(sequence, 3)}${extensionFor(format)}`
}

// References always use forward slashes, whatever the host separator is
export function imageReference(
  projectId: string,
  runTimestamp: string,
  sequence: number,
  format: ImageFormat
): string {
  return [projectSlug(projectId), runTimestamp, imageFileName(sequence, format)].join('/')
}
