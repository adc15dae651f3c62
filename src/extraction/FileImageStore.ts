import fs from 'fs'
import path from 'path'
import { ImageStore, ImageWrite, StoredImage } from './ImageStore'
import { imageReference } from './naming'
import { debugLog } from '../logging/debugLog'

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EEXIST'

export class FileImageStore implements ImageStore {
  constructor(private rootDir: string) {}

  save(image: ImageWrite): StoredImage {
    let sequence = image.sequence
    let reference = imageReference(image.projectId, image.runTimestamp, sequence, image.format)
    let filePath = this.resolve(reference)

    fs.mkdirSync(path.dirname(filePath), { recursive: true })

    // 'wx' refuses to overwrite an image from an earlier run; taken names move on to the next number
    let fd: number | null = null
    while (fd === null) {
      try {
        fd = fs.openSync(filePath, 'wx')
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error
        }
        sequence += 1
        reference = imageReference(image.projectId, image.runTimestamp, sequence, image.format)
        filePath = this.resolve(reference)
      }
    }

    try {
      fs.writeSync(fd, image.bytes)
      fs.fsyncSync(fd)
    } catch (error) {
      fs.closeSync(fd)
      fs.rmSync(filePath, { force: true })
      throw error
    }
    fs.closeSync(fd)

    debugLog({
      event: 'image_saved',
      projectId: image.projectId,
      reference,
      bytes: image.bytes.length,
    })

    return { reference, path: filePath, sequence }
  }

  read(reference: string): Buffer | null {
    const filePath = this.resolve(reference)
    if (!fs.existsSync(filePath)) {
      return null
    }
    return fs.readFileSync(filePath)
  }

  private resolve(reference: string): string {
    return path.join(this.rootDir, ...reference.split('/'))
  }
}
