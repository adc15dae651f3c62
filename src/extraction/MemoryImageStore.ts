import { ImageStore, ImageWrite, StoredImage } from './ImageStore'
import { imageReference } from './naming'

export class MemoryImageStore implements ImageStore {
  private images: Map<string, Buffer> = new Map()

  save(image: ImageWrite): StoredImage {
    let sequence = image.sequence
    let reference = imageReference(image.projectId, image.runTimestamp, sequence, image.format)
    while (this.images.has(reference)) {
      sequence += 1
      reference = imageReference(image.projectId, image.runTimestamp, sequence, image.format)
    }
    this.images.set(reference, Buffer.from(image.bytes))
    return { reference, path: `memory://${reference}`, sequence }
  }

  read(reference: string): Buffer | null {
    return this.images.get(reference) ?? null
  }

  get size(): number {
    return this.images.size
  }
}
