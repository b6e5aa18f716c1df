import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import {
  ALREADY_SUBSCRIBED,
  NOT_SUBSCRIBED,
  SELF_SUBSCRIPTION,
} from '../../../api/users/subscribe.ts'
import { minValue } from '@application/validation/messages.ts'
import {
  json,
  makeIngredient,
  makeTag,
  makeUser,
  postRecipe,
  recipePayload,
  request,
  resetDatabase,
  startServer,
  type TestServer,
  type TestUser,
} from './testServer.ts'

let server: TestServer
let reader: TestUser
let chef: TestUser

beforeAll(async () => {
  server = await startServer()
})

afterAll(async () => {
  await server.close()
})

beforeEach(async () => {
  resetDatabase()
  reader = await makeUser('reader')
  chef = await makeUser('chef')
})

describe('subscriptions', () => {
  it('refuses self-subscription', async () => {
    const res = await request(server, `/api/users/${reader.user.id}/subscribe/`, {
      method: 'POST',
      token: reader.token,
    })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ subscribe: [SELF_SUBSCRIPTION] })
  })

  it('subscribes once and unsubscribes once', async () => {
    const path = `/api/users/${chef.user.id}/subscribe/`

    const first = await request(server, path, { method: 'POST', token: reader.token })
    expect(first.status).toBe(201)
    expect(first.body).toMatchObject({
      id: chef.user.id,
      username: 'chef',
      is_subscribed: true,
      recipes: [],
      recipes_count: 0,
    })

    const second = await request(server, path, { method: 'POST', token: reader.token })
    expect(second.status).toBe(400)
    expect(second.body).toEqual({ subscribe: [ALREADY_SUBSCRIBED] })

    const profile = await request(server, `/api/users/${chef.user.id}/`, { token: reader.token })
    expect(json(profile).is_subscribed).toBe(true)

    expect((await request(server, path, { method: 'DELETE', token: reader.token })).status).toBe(204)

    const absent = await request(server, path, { method: 'DELETE', token: reader.token })
    expect(absent.status).toBe(400)
    expect(absent.body).toEqual({ subscribe: [NOT_SUBSCRIBED] })
  })

  it('returns 404 for an unknown author', async () => {
    const res = await request(server, '/api/users/999/subscribe/', { method: 'POST', token: reader.token })

    expect(res.status).toBe(404)
  })

  it('lists followed authors with a limited recipe preview', async () => {
    const tag = await makeTag('Dinner')
    const rice = await makeIngredient('rice', 'g')
    await postRecipe(server, chef.token, { ...recipePayload([tag.id], [{ id: rice.id, amount: 1 }]), name: 'Older' })
    const newer = await postRecipe(server, chef.token, {
      ...recipePayload([tag.id], [{ id: rice.id, amount: 1 }]),
      name: 'Newer',
    })
    await request(server, `/api/users/${chef.user.id}/subscribe/`, { method: 'POST', token: reader.token })

    const res = await request(server, '/api/users/subscriptions/?recipes_limit=1', { token: reader.token })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({
      count: 1,
      next: null,
      previous: null,
      results: [
        {
          username: 'chef',
          is_subscribed: true,
          recipes_count: 2,
          recipes: [{ id: newer, name: 'Newer', cooking_time: 15 }],
        },
      ],
    })
  })

  it('caps a recipes_limit too large to store', async () => {
    const tag = await makeTag('Dinner')
    const rice = await makeIngredient('rice', 'g')
    const recipe = await postRecipe(server, chef.token, recipePayload([tag.id], [{ id: rice.id, amount: 1 }]))

    const res = await request(server, `/api/users/${chef.user.id}/subscribe/?recipes_limit=99999999999999999999`, {
      method: 'POST',
      token: reader.token,
    })

    expect(res.status).toBe(201)
    expect(res.body).toMatchObject({ id: chef.user.id, recipes_count: 1, recipes: [{ id: recipe }] })
  })

  it('rejects a negative recipes_limit', async () => {
    const res = await request(server, '/api/users/subscriptions/?recipes_limit=-1', { token: reader.token })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ recipes_limit: [minValue(0)] })
  })
})
