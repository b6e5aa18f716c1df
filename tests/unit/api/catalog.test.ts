import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { METHOD_NOT_ALLOWED } from '../../../api/_lib/errors.ts'
import { INGREDIENT_TAKEN } from '../../../api/ingredients/unique.ts'
import { TAG_NAME_TAKEN, TAG_SLUG_TAKEN } from '../../../api/tags/unique.ts'
import { INVALID_SLUG } from '@application/catalog/catalogSchemas.ts'
import {
  idOf,
  makeIngredient,
  makeTag,
  makeUser,
  request,
  resetDatabase,
  startServer,
  type TestServer,
} from './testServer.ts'

let server: TestServer

beforeAll(async () => {
  server = await startServer()
})

afterAll(async () => {
  await server.close()
})

beforeEach(() => {
  resetDatabase()
})

describe('tags', () => {
  it('lists tags by name without pagination', async () => {
    await makeTag('Lunch')
    await makeTag('Breakfast')

    const res = await request(server, '/api/tags/')

    expect(res.status).toBe(200)
    expect(res.body).toEqual([
      { id: expect.any(Number), name: 'Breakfast', slug: 'breakfast' },
      { id: expect.any(Number), name: 'Lunch', slug: 'lunch' },
    ])
  })

  it('does not let regular users write', async () => {
    const { token } = await makeUser('ann')

    const res = await request(server, '/api/tags/', {
      method: 'POST',
      token,
      body: { name: 'Dinner', slug: 'dinner' },
    })

    expect(res.status).toBe(405)
    expect(res.body).toEqual({ error: METHOD_NOT_ALLOWED })
  })

  it('lets staff create, rename and delete tags', async () => {
    const { token } = await makeUser('admin', { isStaff: true })

    const created = await request(server, '/api/tags/', {
      method: 'POST',
      token,
      body: { name: 'Dinner', slug: 'dinner' },
    })
    expect(created.status).toBe(201)
    const id = idOf(created)

    const renamed = await request(server, `/api/tags/${id}/`, {
      method: 'PATCH',
      token,
      body: { name: 'Supper' },
    })
    expect(renamed.body).toEqual({ id, name: 'Supper', slug: 'dinner' })

    const removed = await request(server, `/api/tags/${id}/`, { method: 'DELETE', token })
    expect(removed.status).toBe(204)
    expect((await request(server, `/api/tags/${id}/`)).status).toBe(404)
  })

  it('keeps names and slugs unique', async () => {
    const { token } = await makeUser('admin', { isStaff: true })
    await makeTag('Dinner')

    const res = await request(server, '/api/tags/', {
      method: 'POST',
      token,
      body: { name: 'Dinner', slug: 'dinner' },
    })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ name: [TAG_NAME_TAKEN], slug: [TAG_SLUG_TAKEN] })
  })

  it('validates the slug', async () => {
    const { token } = await makeUser('admin', { isStaff: true })

    const res = await request(server, '/api/tags/', {
      method: 'POST',
      token,
      body: { name: 'Late night', slug: 'late night' },
    })

    expect(res.body).toEqual({ slug: [INVALID_SLUG] })
  })
})

describe('ingredients', () => {
  beforeEach(async () => {
    await makeIngredient('sugar', 'g')
    await makeIngredient('salt', 'pinch')
    await makeIngredient('brown sugar', 'g')
  })

  it('filters by case-insensitive name prefix', async () => {
    const res = await request(server, '/api/ingredients/?name=S')

    expect(res.status).toBe(200)
    expect(res.body).toEqual([
      { id: expect.any(Number), name: 'salt', measurement_unit: 'pinch' },
      { id: expect.any(Number), name: 'sugar', measurement_unit: 'g' },
    ])
  })

  it('matches the start of the name only', async () => {
    const res = await request(server, '/api/ingredients/?name=sug')

    expect(res.body).toEqual([{ id: expect.any(Number), name: 'sugar', measurement_unit: 'g' }])
  })

  it('lists everything without a filter', async () => {
    const res = await request(server, '/api/ingredients/')

    expect(res.body).toMatchObject([{ name: 'brown sugar' }, { name: 'salt' }, { name: 'sugar' }])
  })

  it('rejects a duplicate name and unit pair', async () => {
    const { token } = await makeUser('admin', { isStaff: true })

    const res = await request(server, '/api/ingredients/', {
      method: 'POST',
      token,
      body: { name: 'sugar', measurement_unit: 'g' },
    })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ non_field_errors: [INGREDIENT_TAKEN] })
  })

  it('allows the same name with another unit', async () => {
    const { token } = await makeUser('admin', { isStaff: true })

    const res = await request(server, '/api/ingredients/', {
      method: 'POST',
      token,
      body: { name: 'sugar', measurement_unit: 'cup' },
    })

    expect(res.status).toBe(201)
    expect(res.body).toEqual({ id: expect.any(Number), name: 'sugar', measurement_unit: 'cup' })
  })
})
