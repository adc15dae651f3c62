import { DeltaReport, Document, JsonValue, PayloadThresholds, ProjectDelta, ProjectRecord } from '../contracts'
import { DEFAULT_THRESHOLDS } from '../cleaning/PayloadLocator'
import { debugLog } from '../logging/debugLog'
import { comparisonKey } from './normalize'

export const HISTORY_KEY = 'history'

export function historyOf(record: ProjectRecord | undefined): JsonValue[] {
  const history = record?.[HISTORY_KEY]
  return Array.isArray(history) ? history : []
}

const range = (from: number, to: number): number[] =>
  Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i)

/**
 * Order-preserving match of two key sequences. Shared head and tail are
 * matched directly; the middle is matched by a longest common subsequence
 * filled in from the end backward. Returns the current-side indices that
 * have no counterpart, plus how many backup entries went unmatched.
 */
function matchDiverged(backup: string[], current: string[]): { unmatched: number[]; backupOnly: number } {
  let head = 0
  while (head < backup.length && head < current.length && backup[head] === current[head]) {
    head++
  }

  let tail = 0
  while (
    tail < backup.length - head &&
    tail < current.length - head &&
    backup[backup.length - 1 - tail] === current[current.length - 1 - tail]
  ) {
    tail++
  }

  const b = backup.slice(head, backup.length - tail)
  const c = current.slice(head, current.length - tail)
  const n = b.length
  const m = c.length
  const width = m + 1

  // lcs[i * width + j] = LCS length of b[i..] and c[j..]
  const lcs = new Uint32Array((n + 1) * width)
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] = b[i] === c[j]
        ? lcs[(i + 1) * width + j + 1] + 1
        : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1])
    }
  }

  const unmatched: number[] = []
  let backupOnly = 0
  let i = 0
  let j = 0
  while (i < n && j < m) {
    if (b[i] === c[j]) {
      i++
      j++
    } else if (lcs[(i + 1) * width + j] >= lcs[i * width + j + 1]) {
      backupOnly++
      i++
    } else {
      unmatched.push(head + j)
      j++
    }
  }
  backupOnly += n - i
  for (; j < m; j++) {
    unmatched.push(head + j)
  }

  return { unmatched, backupOnly }
}

export function compareHistories(backup: string[], current: string[]): ProjectDelta {
  const isPrefix = backup.length <= current.length && backup.every((key, i) => key === current[i])

  if (isPrefix) {
    return {
      status: backup.length === current.length ? 'unchanged' : 'appended',
      newItemIndices: range(backup.length, current.length),
      matchedCount: backup.length,
      backupOnlyCount: 0,
    }
  }

  const { unmatched, backupOnly } = matchDiverged(backup, current)
  return {
    status: 'diverged',
    newItemIndices: unmatched,
    matchedCount: current.length - unmatched.length,
    backupOnlyCount: backupOnly,
  }
}

/**
 * Projects and history items of `current` that `backupDestructive` (a
 * backup passed through the destructive cleaner) does not contain.
 * Items are compared with image payloads and markers treated as equal.
 */
export function diff(
  current: Document,
  backupDestructive: Document,
  thresholds: PayloadThresholds = DEFAULT_THRESHOLDS
): DeltaReport {
  const report: DeltaReport = {
    newProjects: [],
    projects: {},
    divergedProjects: [],
    backupOnlyProjects: [],
  }

  const keysOf = (record: ProjectRecord): string[] =>
    historyOf(record).map((item) => comparisonKey(item, thresholds))

  for (const [projectId, record] of Object.entries(current)) {
    if (!Object.hasOwn(backupDestructive, projectId)) {
      report.newProjects.push(projectId)
      continue
    }

    const projectDelta = compareHistories(keysOf(backupDestructive[projectId]), keysOf(record))
    report.projects[projectId] = projectDelta
    if (projectDelta.status === 'diverged') {
      report.divergedProjects.push(projectId)
    }
  }

  for (const projectId of Object.keys(backupDestructive)) {
    if (!Object.hasOwn(current, projectId)) {
      report.backupOnlyProjects.push(projectId)
    }
  }

  debugLog({
    event: 'diff_complete',
    newProjects: report.newProjects.length,
    projectsWithNewItems: Object.values(report.projects).filter((p) => p.newItemIndices.length > 0).length,
    divergedProjects: report.divergedProjects,
  })

  return report
}
