import { Document, RecoveryResult } from '../contracts'
import { CleanContext } from '../cleaning/CleanContext'
import { clean, destructiveClean } from '../cleaning/TreeCleaner'
import { diff } from './DeltaComparator'
import { merge } from './MergeEngine'

/**
 * Rebuild a complete document from a full-fidelity backup and the current
 * document. The backup is first reduced the way an old destructive cleanup
 * would have left it, which lets it be compared with `current`; it is then
 * cleaned losslessly (images go through the context's store) and merged with
 * whatever `current` has that the backup does not.
 */
export function recoverDocument(backup: Document, current: Document, context: CleanContext): RecoveryResult {
  const simulated = destructiveClean(backup, context.thresholds)
  const delta = diff(current, simulated.document, context.thresholds)
  const lossless = clean(backup, 'lossless', context)
  const document = merge(lossless.document, delta, current, context.thresholds)

  return {
    document,
    delta,
    backupReport: lossless.report,
    images: lossless.images,
  }
}
