import { promises as fs } from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { BackupInfo, Document, HistoryFile, JsonObject } from '../contracts'
import { DocumentSchema, JsonObjectSchema } from '../contracts/schemas'
import { debugLog } from '../logging/debugLog'

export type BackupKind = 'backup' | 'recovery-backup'

const PROJECTS_KEY = 'projects'

async function writeDurable(filePath: string, data: string | Buffer, flag: string): Promise<void> {
  const handle = await fs.open(filePath, flag)
  try {
    await handle.writeFile(data)
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Reads and writes the history file. The file is only ever replaced by an
 * atomic rename of a fully written temp file next to it.
 */
export class HistoryFileStore {
  constructor(private indent: number = 2) {}

  async load(filePath: string): Promise<HistoryFile> {
    const text = await fs.readFile(filePath, 'utf8')

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new Error(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
    }

    const rootResult = JsonObjectSchema.safeParse(parsed)
    if (!rootResult.success) {
      throw new Error(`Expected a JSON object at the top level of ${filePath}`)
    }
    const root = rootResult.data

    let document: Document = {}
    if (root[PROJECTS_KEY] !== undefined) {
      const documentResult = DocumentSchema.safeParse(root[PROJECTS_KEY])
      if (!documentResult.success) {
        throw new Error(`"${PROJECTS_KEY}" in ${filePath} is not an object of project records`)
      }
      document = documentResult.data
    }

    debugLog({
      event: 'history_loaded',
      file: filePath,
      bytes: Buffer.byteLength(text),
      projects: Object.keys(document).length,
    })

    return { path: filePath, root, document, sizeBytes: Buffer.byteLength(text) }
  }

  /**
   * The root object with its projects swapped for `document`, every other
   * top-level key left where it was.
   */
  withDocument(root: JsonObject, document: Document): JsonObject {
    if (!Object.hasOwn(root, PROJECTS_KEY) && Object.keys(document).length === 0) {
      return { ...root }
    }
    return { ...root, [PROJECTS_KEY]: document }
  }

  serialize(root: JsonObject): string {
    return JSON.stringify(root, null, this.indent)
  }

  /**
   * Byte copy of the file as it is now, fsynced before returning
   */
  async writeBackup(filePath: string, kind: BackupKind, timestamp: string): Promise<string> {
    const backupPath = `${filePath}.${kind}.${timestamp}`
    const data = await fs.readFile(filePath)
    await writeDurable(backupPath, data, 'wx')

    debugLog({ event: 'backup_written', file: filePath, backupPath, kind, bytes: data.length })
    return backupPath
  }

  async saveAtomic(filePath: string, root: JsonObject): Promise<number> {
    const content = this.serialize(root)
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${uuidv4()}.tmp`)

    try {
      await writeDurable(tempPath, content, 'wx')
      await fs.rename(tempPath, filePath)
    } catch (error) {
      await fs.rm(tempPath, { force: true })
      throw error
    }

    const sizeBytes = Buffer.byteLength(content)
    debugLog({ event: 'history_saved', file: filePath, bytes: sizeBytes })
    return sizeBytes
  }

  async listBackups(filePath: string): Promise<BackupInfo[]> {
    const dir = path.dirname(filePath)
    const prefix = `${path.basename(filePath)}.backup.`

    let entries: string[]
    try {
      entries = await fs.readdir(dir)
    } catch (error) {
      debugLog({
        event: 'storage_error',
        method: 'listBackups',
        directory: dir,
        error: error instanceof Error ? error.message : String(error),
      })
      return []
    }

    const backups: BackupInfo[] = []
    for (const name of entries.filter((entry) => entry.startsWith(prefix)).sort()) {
      const backupPath = path.join(dir, name)
      const stats = await fs.stat(backupPath)
      if (stats.isFile()) {
        backups.push({ name, path: backupPath, sizeBytes: stats.size })
      }
    }
    return backups
  }

  /**
   * The largest backup above `minBytes`: images make backups big, so the
   * largest one is the likeliest to still hold them.
   */
  async findRecoveryBackup(filePath: string, minBytes: number): Promise<BackupInfo | null> {
    const candidates = (await this.listBackups(filePath))
      .filter((backup) => backup.sizeBytes > minBytes)
      .sort((a, b) => b.sizeBytes - a.sizeBytes)
    return candidates[0] ?? null
  }
}
