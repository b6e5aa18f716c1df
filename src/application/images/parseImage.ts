import type { ImageExtension, ImageUpload } from '@domain/models/Image.ts'
import { MAX_IMAGE_BYTES } from '@domain/constants/limits.ts'

export const INVALID_IMAGE = 'Upload a valid image. Supported formats: png, jpeg, gif, webp.'
export const IMAGE_TOO_LARGE = `The image must not exceed ${MAX_IMAGE_BYTES / (1024 * 1024)} MB.`

export type ImageParseResult = { ok: true; image: ImageUpload } | { ok: false; error: string }

const DATA_URI = /^data:image\/[a-z0-9.+-]+;base64,([a-z0-9+/=\s]+)$/i

/** Identify the image format from its leading bytes rather than the declared type. */
export function detectImageType(data: Buffer): ImageExtension | null {
  if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'png'
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return 'jpg'
  if (data.length >= 6 && ['GIF87a', 'GIF89a'].includes(data.subarray(0, 6).toString('latin1'))) return 'gif'
  if (
    data.length >= 12 &&
    data.subarray(0, 4).toString('latin1') === 'RIFF' &&
    data.subarray(8, 12).toString('latin1') === 'WEBP'
  ) {
    return 'webp'
  }
  return null
}

export function parseImageBytes(data: Buffer): ImageParseResult {
  if (data.length > MAX_IMAGE_BYTES) return { ok: false, error: IMAGE_TOO_LARGE }
  const extension = detectImageType(data)
  if (!extension) return { ok: false, error: INVALID_IMAGE }
  return { ok: true, image: { data, extension } }
}

/** Decode a `data:image/<type>;base64,<payload>` string. */
export function parseDataUri(value: string): ImageParseResult {
  const match = DATA_URI.exec(value.trim())
  if (!match) return { ok: false, error: INVALID_IMAGE }
  return parseImageBytes(Buffer.from(match[1].replace(/\s+/g, ''), 'base64'))
}
