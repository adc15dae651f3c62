import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when HISTORY_IMAGE_CLEANER_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.HISTORY_IMAGE_CLEANER_DEBUG === 'true' || process.env.HISTORY_IMAGE_CLEANER_DEBUG === '1'

export const debugLogPath = (): string => join(homedir(), '.history-image-cleaner', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(dirname(logPath), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
