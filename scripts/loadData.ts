/**
 * Seeds the catalog from JSON files:
 *   tsx scripts/loadData.ts [ingredients.json] [tags.json]
 * Entries already present are skipped, so the script can be re-run.
 */
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ingredientSchema, tagSchema } from '@application/catalog/catalogSchemas.ts'
import { createIngredientsIfMissing, createTagsIfMissing } from '@infrastructure/db/index.ts'
import { logger } from '@infrastructure/logger.ts'

const DATA_DIR = new URL('../data/', import.meta.url)

async function readJson<Output, Input>(
  path: string,
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
): Promise<Output> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'))
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`${path}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`)
  }
  return parsed.data
}

async function main() {
  const [
    ingredientsPath = fileURLToPath(new URL('ingredients.json', DATA_DIR)),
    tagsPath = fileURLToPath(new URL('tags.json', DATA_DIR)),
  ] = process.argv.slice(2)

  const ingredients = await readJson(ingredientsPath, z.array(ingredientSchema))
  const added = await createIngredientsIfMissing(ingredients)
  logger.info({ file: ingredientsPath, total: ingredients.length, added }, 'Ingredients loaded')

  const tags = await readJson(tagsPath, z.array(tagSchema))
  const addedTags = await createTagsIfMissing(tags)
  logger.info({ file: tagsPath, total: tags.length, added: addedTags }, 'Tags loaded')
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Loading data failed')
  process.exitCode = 1
})
