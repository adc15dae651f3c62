import fs from 'fs'
import path from 'path'
import { CleanerConfig } from '../contracts/types'
import { CleanerConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export class ConfigLoader {
  private static DEFAULT_CONFIG: CleanerConfig = {
    thresholds: {
      minHeuristicLength: 32768,
      minDetectedLength: 1024,
    },
    backups: {
      autoDetectMinBytes: 5 * 1024 * 1024,
    },
    output: {
      indent: 2,
    },
  }

  private readonly config: CleanerConfig

  constructor(private configPath?: string, private startDir: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    const configNames = ['.history-image-cleaner.config.json', 'history-image-cleaner.config.json']

    // Start from the working directory and walk up
    let currentDir = this.startDir

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of configNames) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): CleanerConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig = JSON.parse(rawConfig)

      // Validate and apply defaults
      const validated = CleanerConfigSchema.parse(parsedConfig)

      // Relative paths in the file are relative to the file itself
      const baseDir = path.dirname(configPath)
      return {
        ...validated,
        historyFile: validated.historyFile && path.resolve(baseDir, validated.historyFile),
        imagesDir: validated.imagesDir && path.resolve(baseDir, validated.imagesDir),
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): CleanerConfig {
    return this.config
  }
}
