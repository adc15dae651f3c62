import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ConfigLoader } from './ConfigLoader'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('ConfigLoader', () => {
  let tempDir: string
  let testConfigPath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-test-'))
    testConfigPath = path.join(tempDir, 'history-image-cleaner.config.json')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('config loading', () => {
    it('should load default config when no config file exists', () => {
      const loader = new ConfigLoader('/non/existent/path.json')
      const config = loader.getConfig()

      expect(config).toEqual({
        thresholds: { minHeuristicLength: 32768, minDetectedLength: 1024 },
        backups: { autoDetectMinBytes: 5 * 1024 * 1024 },
        output: { indent: 2 },
      })
    })

    it('should load and validate config from file', () => {
      const testConfig = {
        thresholds: {
          minHeuristicLength: 50000,
          minDetectedLength: 2048,
        },
        backups: {
          autoDetectMinBytes: 1024,
        },
        output: {
          indent: 0,
        },
      }

      fs.writeFileSync(testConfigPath, JSON.stringify(testConfig))
      const config = new ConfigLoader(testConfigPath).getConfig()

      expect(config.thresholds).toEqual({ minHeuristicLength: 50000, minDetectedLength: 2048 })
      expect(config.backups.autoDetectMinBytes).toBe(1024)
      expect(config.output.indent).toBe(0)
    })

    it('should apply defaults for missing config fields', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ thresholds: { minHeuristicLength: 50000 } }))
      const config = new ConfigLoader(testConfigPath).getConfig()

      expect(config.thresholds.minHeuristicLength).toBe(50000)
      expect(config.thresholds.minDetectedLength).toBe(1024) // default
      expect(config.output.indent).toBe(2) // default
    })

    it('should resolve paths relative to the config file', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ historyFile: 'data/history.json', imagesDir: '/var/images' }))
      const config = new ConfigLoader(testConfigPath).getConfig()

      expect(config.historyFile).toBe(path.join(tempDir, 'data', 'history.json'))
      expect(config.imagesDir).toBe('/var/images')
    })

    it('should find the config file in a parent directory', () => {
      const nested = path.join(tempDir, 'a', 'b')
      fs.mkdirSync(nested, { recursive: true })
      fs.writeFileSync(path.join(tempDir, '.history-image-cleaner.config.json'), JSON.stringify({ output: { indent: 4 } }))

      expect(new ConfigLoader(undefined, nested).getConfig().output.indent).toBe(4)
    })

    it('should handle invalid JSON gracefully', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, 'invalid json {')
      const loader = new ConfigLoader(testConfigPath)

      expect(loader.getConfig().thresholds.minHeuristicLength).toBe(32768)
      expect(errorSpy).toHaveBeenCalledWith(`Invalid JSON in config file ${testConfigPath}`)
    })

    it('should handle invalid config schema gracefully', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, JSON.stringify({ thresholds: { minHeuristicLength: -1 } }))
      const loader = new ConfigLoader(testConfigPath)

      expect(loader.getConfig().thresholds.minHeuristicLength).toBe(32768)
    })
  })
})
