export type ImageExtension = 'png' | 'jpg' | 'gif' | 'webp'

export interface ImageUpload {
  data: Buffer
  extension: ImageExtension
}
