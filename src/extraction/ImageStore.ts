import { ImageFormat } from '../contracts'

export interface ImageWrite {
  projectId: string
  runTimestamp: string
  sequence: number
  format: ImageFormat
  bytes: Buffer
}

export interface StoredImage {
  reference: string
  path: string
  // Sequence number actually used, above the requested one when that name was taken
  sequence: number
}

export interface ImageStore {
  // Must only return once the bytes are persisted; throws otherwise
  save(image: ImageWrite): StoredImage

  // Bytes previously saved under a reference, or null when absent
  read(reference: string): Buffer | null
}
