import { describe, it, expect } from 'vitest'
import { findHistoryFile, historyFileCandidates, imagesDirectory, PathEnvironment } from './paths'

const linux: PathEnvironment = { platform: 'linux', env: {}, homeDir: '/home/dev' }

const windows: PathEnvironment = {
  platform: 'win32',
  env: {
    USERPROFILE: 'C:\\Users\\dev',
    APPDATA: 'C:\\Users\\dev\\AppData\\Roaming',
    LOCALAPPDATA: 'C:\\Users\\dev\\AppData\\Local',
  },
  homeDir: 'C:\\Users\\fallback',
}

describe('paths', () => {
  it('should list the POSIX locations', () => {
    expect(historyFileCandidates(linux)).toEqual(['/home/dev/.claude.json', '/home/dev/.config/claude/claude.json'])
  })

  it('should list the Windows locations', () => {
    expect(historyFileCandidates(windows)).toEqual([
      'C:\\Users\\dev\\.claude.json',
      'C:\\Users\\dev\\AppData\\Roaming\\claude\\claude.json',
      'C:\\Users\\dev\\AppData\\Local\\claude\\claude.json',
    ])
  })

  it('should fall back to the home directory without USERPROFILE', () => {
    expect(historyFileCandidates({ ...windows, env: {} })[0]).toBe('C:\\Users\\fallback\\.claude.json')
  })

  it('should pick the first candidate that exists', () => {
    const exists = (filePath: string): boolean => filePath === '/home/dev/.config/claude/claude.json'
    expect(findHistoryFile(linux, exists)).toBe('/home/dev/.config/claude/claude.json')
  })

  it('should return the first candidate when none exists', () => {
    expect(findHistoryFile(linux, () => false)).toBe('/home/dev/.claude.json')
  })

  it('should place images under the .claude directory', () => {
    expect(imagesDirectory(linux)).toBe('/home/dev/.claude/history_images')
    expect(imagesDirectory(windows)).toBe('C:\\Users\\dev\\.claude\\history_images')
  })
})
