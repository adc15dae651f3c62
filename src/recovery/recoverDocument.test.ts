import { describe, it, expect, beforeEach } from 'vitest'
import { recoverDocument } from './recoverDocument'
import { comparisonKey } from './normalize'
import { historyOf } from './DeltaComparator'
import { createCleanContext } from '../cleaning/CleanContext'
import { MemoryImageStore } from '../extraction/MemoryImageStore'
import { projectSlug } from '../extraction/naming'
import { Document, JsonValue } from '../contracts'
import { dataUri, pngBytes } from '../../test/helpers/images'

const RUN = '20240105_090307'

const message = (text: string, image?: string): JsonValue => ({
  display: text,
  pastedContents: image === undefined ? {} : { '1': { id: 1, type: 'image', content: image } },
})

const hasImage = (n: number): boolean => n === 2 || n === 5

const imageBytes = (n: number): Buffer => pngBytes(64, n)

describe('recoverDocument', () => {
  let store: MemoryImageStore

  // Backup from before a destructive cleanup: seven items, two with inline images
  const backup: Document = {
    '/work/app': {
      allowedTools: ['Read'],
      history: Array.from({ length: 7 }, (_, i) =>
        message(`message ${i + 1}`, hasImage(i + 1) ? dataUri('png', imageBytes(i + 1)) : undefined)
      ),
    },
  }

  // Current file: the same seven items with images removed, three more appended,
  // and a project created after the backup
  const current: Document = {
    '/work/app': {
      allowedTools: ['Read'],
      history: [
        ...Array.from({ length: 7 }, (_, i) => message(`message ${i + 1}`, hasImage(i + 1) ? '[IMAGE_REMOVED]' : undefined)),
        message('message 8'),
        message('message 9', '[IMAGE_REMOVED]'),
        message('message 10'),
      ],
    },
    '/work/new': {
      history: [message('fresh start')],
    },
  }

  beforeEach(() => {
    store = new MemoryImageStore()
  })

  it('should restore backup images and keep items added since', () => {
    const result = recoverDocument(backup, current, createCleanContext({ runTimestamp: RUN, store }))
    const slug = projectSlug('/work/app')

    expect(result.document['/work/app']).toEqual({
      allowedTools: ['Read'],
      history: [
        message('message 1'),
        message('message 2', `[IMAGE_FILE:${slug}/${RUN}/image_001.png]`),
        message('message 3'),
        message('message 4'),
        message('message 5', `[IMAGE_FILE:${slug}/${RUN}/image_002.png]`),
        message('message 6'),
        message('message 7'),
        message('message 8'),
        message('message 9', '[IMAGE_REMOVED]'),
        message('message 10'),
      ],
    })
    expect(store.read(`${slug}/${RUN}/image_001.png`)?.equals(imageBytes(2))).toBe(true)
    expect(store.read(`${slug}/${RUN}/image_002.png`)?.equals(imageBytes(5))).toBe(true)
    expect(result.delta.projects['/work/app'].newItemIndices).toEqual([7, 8, 9])
    expect(result.backupReport.imagesExtracted).toBe(2)
    expect(result.images).toHaveLength(2)
  })

  it('should copy projects created after the backup', () => {
    const result = recoverDocument(backup, current, createCleanContext({ runTimestamp: RUN, store }))

    expect(result.delta.newProjects).toEqual(['/work/new'])
    expect(Object.keys(result.document)).toEqual(['/work/app', '/work/new'])
    expect(result.document['/work/new']).toEqual({ history: [message('fresh start')] })
  })

  it('should lose no item from either side', () => {
    const result = recoverDocument(backup, current, createCleanContext({ runTimestamp: RUN, store }))
    const mergedKeys = historyOf(result.document['/work/app']).map((item) => comparisonKey(item))

    for (const item of [...historyOf(backup['/work/app']), ...historyOf(current['/work/app'])]) {
      expect(mergedKeys).toContain(comparisonKey(item))
    }
  })

  it('should add nothing when run again on its own output', () => {
    const first = recoverDocument(backup, current, createCleanContext({ runTimestamp: RUN, store }))
    const second = recoverDocument(
      backup,
      first.document,
      createCleanContext({ runTimestamp: RUN, store: new MemoryImageStore() })
    )

    expect(second.document).toEqual(first.document)
    expect(historyOf(second.document['/work/app'])).toHaveLength(10)
  })

  it('should not repeat an item whose text data URI was stripped', () => {
    const svg = 'data:image/svg+xml;utf8,<svg xmlns="x"/>'
    const result = recoverDocument(
      { '/work/app': { history: [message('drawing', svg)] } },
      { '/work/app': { history: [message('drawing', '[IMAGE_REMOVED]'), message('later')] } },
      createCleanContext({ runTimestamp: RUN, store })
    )

    expect(result.delta.divergedProjects).toEqual([])
    expect(result.document['/work/app'].history).toEqual([message('drawing', svg), message('later')])
  })

  it('should leave both inputs untouched', () => {
    const before = JSON.stringify({ backup, current })

    recoverDocument(backup, current, createCleanContext({ runTimestamp: RUN, store }))

    expect(JSON.stringify({ backup, current })).toBe(before)
  })
})
