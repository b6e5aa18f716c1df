import type { Request, Response } from 'express'
import { ValidationError } from '@application/validation/ValidationError.ts'
import { REQUIRED } from '@application/validation/messages.ts'
import { updateAvatar } from '@infrastructure/db/index.ts'
import { deleteImage, mediaUrl, saveImage } from '@infrastructure/storage/mediaStorage.ts'
import { requireUser } from '../_lib/auth.js'
import { methodNotAllowed } from '../_lib/errors.js'
import { readImage } from '../_lib/images.js'

export default async function handler(req: Request, res: Response) {
  if (req.method !== 'PUT' && req.method !== 'DELETE') {
    return methodNotAllowed(res, ['PUT', 'DELETE'])
  }

  const user = await requireUser(req)

  if (req.method === 'DELETE') {
    if (user.avatar) {
      await updateAvatar(user.id, null)
      await deleteImage(user.avatar)
    }
    return res.status(204).end()
  }

  const image = readImage(req, 'avatar')
  if (!image) throw ValidationError.of('avatar', REQUIRED)

  const avatar = await saveImage('avatars', image)
  await updateAvatar(user.id, avatar)
  if (user.avatar) await deleteImage(user.avatar)

  return res.status(200).json({ avatar: mediaUrl(avatar) })
}
