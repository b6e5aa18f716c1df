import type { Request } from 'express'
import multer from 'multer'
import type { ImageUpload } from '@domain/models/Image.ts'
import { MAX_IMAGE_BYTES } from '@domain/constants/limits.ts'
import { INVALID_IMAGE, parseDataUri, parseImageBytes } from '@application/images/parseImage.ts'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { bodyObject } from './params.js'

/** Multipart parser keeping uploads in memory; JSON requests pass straight through. */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_IMAGE_BYTES, files: 1 },
})

/**
 * The image sent in `field`, either as a multipart file or as a base64
 * data URI in the body. Null when the field was left out.
 */
export function readImage(req: Request, field: string): ImageUpload | null {
  if (req.file && req.file.fieldname === field) {
    const result = parseImageBytes(req.file.buffer)
    if (!result.ok) throw ValidationError.of(field, result.error)
    return result.image
  }

  const value = bodyObject(req)[field]
  if (value === undefined || value === null || value === '') return null
  if (typeof value !== 'string') throw ValidationError.of(field, INVALID_IMAGE)

  const result = parseDataUri(value)
  if (!result.ok) throw ValidationError.of(field, result.error)
  return result.image
}
