import { z } from 'zod'
import { JsonValue } from './types'

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
)

export const JsonObjectSchema = z.record(JsonValueSchema)

export const ProjectRecordSchema = z.record(JsonValueSchema)

export const DocumentSchema = z.record(ProjectRecordSchema)

export const CleanerConfigSchema = z.object({
  historyFile: z.string().optional(),
  imagesDir: z.string().optional(),
  thresholds: z.object({
    minHeuristicLength: z.number().int().positive().default(32768),
    minDetectedLength: z.number().int().positive().default(1024),
  }).default({
    minHeuristicLength: 32768,
    minDetectedLength: 1024,
  }),
  backups: z.object({
    autoDetectMinBytes: z.number().int().nonnegative().default(5 * 1024 * 1024),
  }).default({
    autoDetectMinBytes: 5 * 1024 * 1024,
  }),
  output: z.object({
    indent: z.number().int().min(0).max(10).default(2),
  }).default({
    indent: 2,
  }),
})

export const isJsonObject = (value: JsonValue | undefined): value is { [key: string]: JsonValue } =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
