import type { Request, Response } from 'express'
import { tagSchema } from '@application/catalog/catalogSchemas.ts'
import { parseInput } from '@application/validation/parseInput.ts'
import { createTag, listTags } from '@infrastructure/db/index.ts'
import { methodNotAllowed, requestMethod } from '../_lib/errors.js'
import { requireAdminOrReadOnly } from '../_lib/permissions.js'
import { serializeTag } from '../_lib/serializers.js'
import { assertTagIsUnique } from './unique.js'

export default async function handler(req: Request, res: Response) {
  const method = requestMethod(req)
  if (method !== 'GET' && method !== 'POST') return methodNotAllowed(res, ['GET', 'POST'])
  await requireAdminOrReadOnly(req)

  if (method === 'GET') {
    const tags = await listTags()
    return res.json(tags.map(serializeTag))
  }

  const input = parseInput(tagSchema, req.body)
  await assertTagIsUnique(input)
  return res.status(201).json(serializeTag(await createTag(input)))
}
