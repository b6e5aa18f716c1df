import type { Request, Response } from 'express'
import { tagPatchSchema, tagSchema } from '@application/catalog/catalogSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { deleteTag, getTagById, updateTag } from '@infrastructure/db/index.ts'
import { methodNotAllowed, notFound, requestMethod } from '../_lib/errors.js'
import { idParam } from '../_lib/params.js'
import { requireAdminOrReadOnly } from '../_lib/permissions.js'
import { serializeTag } from '../_lib/serializers.js'
import { assertTagIsUnique } from './unique.js'

const ALLOWED = ['GET', 'PUT', 'PATCH', 'DELETE']

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (!ALLOWED.includes(method)) return methodNotAllowed(res, ALLOWED)
  await requireAdminOrReadOnly(req)

  const tag = await getTagById(idParam(req))
  if (!tag) throw notFound()

  if (method === 'GET') return res.json(serializeTag(tag))

  if (method === 'DELETE') {
    await deleteTag(tag.id)
    return res.status(204).end()
  }

  const patch =
    method === 'PUT' ? parseInput(tagSchema, req.body) : parseInput(tagPatchSchema, req.body)
  await assertTagIsUnique(patch, tag.id)
  const updated = await updateTag(tag.id, patch)
  if (!updated) throw notFound()
  return res.json(serializeTag(updated))
}
