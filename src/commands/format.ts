import { JsonPath } from '../contracts'

export const formatMegabytes = (bytes: number): string => `${(bytes / 1024 / 1024).toFixed(1)} MB`

export const formatPath = (path: JsonPath): string =>
  path.map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`)).join('')

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
