import { randomUUID } from 'crypto'
import { mkdir, rm, writeFile } from 'fs/promises'
import path from 'path'
import type { ImageUpload } from '@domain/models/Image.ts'
import { config } from '@infrastructure/config.ts'

export type MediaFolder = 'recipes/images' | 'avatars'

export const MEDIA_URL_PATH = '/media'

/** Writes the image under a random name and returns its path relative to MEDIA_ROOT. */
export async function saveImage(folder: MediaFolder, image: ImageUpload): Promise<string> {
  const relative = path.posix.join(folder, `${randomUUID()}.${image.extension}`)
  const target = mediaPath(relative)
  await mkdir(path.dirname(target), { recursive: true })
  await writeFile(target, image.data)
  return relative
}

export async function deleteImage(relative: string): Promise<void> {
  const root = path.resolve(config.mediaRoot)
  const target = path.resolve(root, relative)
  if (!target.startsWith(root + path.sep)) return
  await rm(target, { force: true })
}

export function mediaPath(relative: string): string {
  return path.join(config.mediaRoot, relative)
}

export function mediaUrl(relative: string | null): string | null {
  if (!relative) return null
  return `${config.publicUrl}${MEDIA_URL_PATH}/${relative}`
}
