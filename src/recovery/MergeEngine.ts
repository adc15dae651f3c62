import { DeltaReport, Document, JsonValue, PayloadThresholds, ProjectDelta, ProjectRecord } from '../contracts'
import { DEFAULT_THRESHOLDS } from '../cleaning/PayloadLocator'
import { debugLog } from '../logging/debugLog'
import { HISTORY_KEY, historyOf } from './DeltaComparator'
import { comparisonKey } from './normalize'

function mergeProject(
  backup: ProjectRecord,
  current: ProjectRecord,
  delta: ProjectDelta,
  thresholds: PayloadThresholds
): ProjectRecord {
  const currentHistory = historyOf(current)
  const hasHistory = Array.isArray(backup[HISTORY_KEY]) || Array.isArray(current[HISTORY_KEY])
  const history: JsonValue[] = [
    ...historyOf(backup).map((item) => structuredClone(item)),
    ...delta.newItemIndices.map((index) => structuredClone(currentHistory[index])),
  ]

  const pick = (key: string): JsonValue => {
    if (hasHistory && key === HISTORY_KEY) {
      return history
    }
    if (!Object.hasOwn(current, key)) {
      return structuredClone(backup[key])
    }
    if (!Object.hasOwn(backup, key)) {
      return structuredClone(current[key])
    }
    // Same content apart from image storage: keep the backup's recovered images
    const same = comparisonKey(backup[key], thresholds) === comparisonKey(current[key], thresholds)
    return structuredClone(same ? backup[key] : current[key])
  }

  const merged: ProjectRecord = {}
  for (const key of Object.keys(backup)) {
    merged[key] = pick(key)
  }
  for (const key of Object.keys(current)) {
    if (!Object.hasOwn(merged, key)) {
      merged[key] = pick(key)
    }
  }
  return merged
}

/**
 * Combine a losslessly cleaned backup with the items the delta found only in
 * `current`. Backup projects keep their order and their recovered images;
 * new history items are appended in their original order; new projects are
 * copied from `current` after the backup's projects.
 */
export function merge(
  backupLossless: Document,
  delta: DeltaReport,
  current: Document,
  thresholds: PayloadThresholds = DEFAULT_THRESHOLDS
): Document {
  const merged: Document = {}

  for (const [projectId, backupRecord] of Object.entries(backupLossless)) {
    const projectDelta = delta.projects[projectId]
    if (projectDelta && Object.hasOwn(current, projectId)) {
      merged[projectId] = mergeProject(backupRecord, current[projectId], projectDelta, thresholds)
    } else {
      merged[projectId] = structuredClone(backupRecord)
    }
  }

  for (const projectId of delta.newProjects) {
    if (Object.hasOwn(current, projectId) && !Object.hasOwn(merged, projectId)) {
      merged[projectId] = structuredClone(current[projectId])
    }
  }

  debugLog({
    event: 'merge_complete',
    projects: Object.keys(merged).length,
    newProjects: delta.newProjects.length,
    divergedProjects: delta.divergedProjects,
  })

  return merged
}
