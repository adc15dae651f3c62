import fs from 'fs'
import os from 'os'
import path from 'path'

export interface PathEnvironment {
  platform: NodeJS.Platform
  env: NodeJS.ProcessEnv
  homeDir: string
}

const currentEnvironment = (): PathEnvironment => ({
  platform: process.platform,
  env: process.env,
  homeDir: os.homedir(),
})

/**
 * Where Claude Code keeps its history file, most likely first
 */
export function historyFileCandidates(environment: PathEnvironment = currentEnvironment()): string[] {
  const { platform, env, homeDir } = environment

  if (platform === 'win32') {
    const userProfile = env.USERPROFILE ?? homeDir
    const appData = env.APPDATA ?? ''
    const localAppData = env.LOCALAPPDATA ?? ''
    return [
      path.win32.join(userProfile, '.claude.json'),
      path.win32.join(appData, 'claude', 'claude.json'),
      path.win32.join(localAppData, 'claude', 'claude.json'),
    ]
  }

  return [
    path.posix.join(homeDir, '.claude.json'),
    path.posix.join(homeDir, '.config', 'claude', 'claude.json'),
  ]
}

/**
 * First candidate that exists, or the first candidate when none does
 */
export function findHistoryFile(
  environment: PathEnvironment = currentEnvironment(),
  exists: (filePath: string) => boolean = fs.existsSync
): string {
  const candidates = historyFileCandidates(environment)
  return candidates.find((candidate) => exists(candidate)) ?? candidates[0]
}

export function imagesDirectory(environment: PathEnvironment = currentEnvironment()): string {
  const { platform, env, homeDir } = environment
  if (platform === 'win32') {
    return path.win32.join(env.USERPROFILE ?? homeDir, '.claude', 'history_images')
  }
  return path.posix.join(homeDir, '.claude', 'history_images')
}
