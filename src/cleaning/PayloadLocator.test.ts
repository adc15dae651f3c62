import { describe, it, expect } from 'vitest'
import { classifyPayload, locatePayloads } from './PayloadLocator'
import { dataUri, jpegBytes, pngBytes, unknownBlob } from '../../test/helpers/images'

describe('PayloadLocator', () => {
  describe('classifyPayload', () => {
    it('should accept data URIs of any length', () => {
      const match = classifyPayload('data:image/gif;base64,R0lGODlh')
      expect(match).toEqual({
        kind: 'data-uri',
        dataUri: { format: 'gif', subtype: 'gif', payload: 'R0lGODlh' },
      })
    })

    it('should accept image data URIs that are not base64', () => {
      expect(classifyPayload('data:image/svg+xml;utf8,<svg xmlns="x"/>')).toEqual({ kind: 'text-data-uri' })
      expect(classifyPayload('DATA:IMAGE/svg+xml,%3Csvg%2F%3E')).toEqual({ kind: 'text-data-uri' })
      expect(classifyPayload('data:text/plain,hello')).toBeNull()
    })

    it('should accept raw base64 with a known magic number', () => {
      const raw = pngBytes(800).toString('base64')
      expect(raw.length).toBe(1080)
      expect(classifyPayload(raw)).toEqual({ kind: 'detected', format: 'png' })
    })

    it('should ignore short raw base64 even with a magic number', () => {
      expect(classifyPayload(pngBytes(8).toString('base64'))).toBeNull()
    })

    it('should accept long unidentified base64 by size alone', () => {
      expect(classifyPayload(unknownBlob(40000))).toEqual({ kind: 'heuristic' })
    })

    it('should ignore unidentified base64 below the size floor', () => {
      expect(classifyPayload(unknownBlob(20000))).toBeNull()
    })

    it('should honour custom thresholds', () => {
      const thresholds = { minHeuristicLength: 100, minDetectedLength: 16 }
      expect(classifyPayload(unknownBlob(100), thresholds)).toEqual({ kind: 'heuristic' })
      expect(classifyPayload(pngBytes(8).toString('base64'), thresholds)).toEqual({ kind: 'detected', format: 'png' })
    })

    it('should reject text outside the base64 alphabet', () => {
      expect(classifyPayload('hello world '.repeat(5000))).toBeNull()
      expect(classifyPayload(`${unknownBlob(40000)}!`)).toBeNull()
    })

    it('should never treat markers as payloads', () => {
      expect(classifyPayload('[IMAGE_REMOVED]')).toBeNull()
      expect(classifyPayload('[IMAGE_FILE:app_1234abcd/20240105_090307/image_001.png]')).toBeNull()
    })

    it('should accept base64 wrapped over several lines', () => {
      const raw = jpegBytes(3000).toString('base64')
      const wrapped = raw.match(/.{1,76}/g)?.join('\r\n') ?? ''
      expect(classifyPayload(wrapped)).toEqual({ kind: 'detected', format: 'jpeg' })
    })
  })

  describe('locatePayloads', () => {
    const first = dataUri('png', pngBytes())
    const second = dataUri('jpeg', jpegBytes(64))
    const value = {
      title: 'notes',
      list: ['plain', first, 42, null],
      nested: { deeper: { image: second, flag: true } },
    }

    it('should report every payload with its path in document order', () => {
      const found = Array.from(locatePayloads(value))

      expect(found.map((payload) => payload.path)).toEqual([
        ['list', 1],
        ['nested', 'deeper', 'image'],
      ])
      expect(found.map((payload) => payload.value)).toEqual([first, second])
    })

    it('should be restartable', () => {
      const payloads = locatePayloads(value)

      expect(Array.from(payloads)).toHaveLength(2)
      expect(Array.from(payloads)).toHaveLength(2)
    })

    it('should find a payload at the root', () => {
      expect(Array.from(locatePayloads(first)).map((payload) => payload.path)).toEqual([[]])
    })

    it('should find nothing in documents without images', () => {
      expect(Array.from(locatePayloads({ a: ['b', { c: 'd' }], e: 1 }))).toEqual([])
    })
  })
})
