import { existsSync } from 'node:fs'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { INVALID_TOKEN, INVALID_TOKEN_HEADER } from '../../../api/_lib/auth.ts'
import { NOT_AUTHENTICATED } from '../../../api/_lib/errors.ts'
import { INVALID_PAGE } from '../../../api/_lib/pagination.ts'
import { INVALID_CREDENTIALS } from '../../../api/auth/token-login.ts'
import { EMAIL_TAKEN, USERNAME_TAKEN } from '../../../api/users/index.ts'
import { WRONG_CURRENT_PASSWORD } from '../../../api/users/set-password.ts'
import { IMAGE_TOO_LARGE } from '@application/images/parseImage.ts'
import { PASSWORD_TOO_SHORT } from '@application/users/userSchemas.ts'
import { MAX_IMAGE_BYTES } from '@domain/constants/limits.ts'
import { mediaPath } from '@infrastructure/storage/mediaStorage.ts'
import {
  PNG_BYTES,
  PNG_DATA_URI,
  TEST_PASSWORD,
  json,
  makeUser,
  request,
  resetDatabase,
  sendForm,
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

const registration = {
  email: 'Ann@Example.com',
  username: 'ann',
  first_name: 'Ann',
  last_name: 'Cook',
  password: 'kitchen-table-9',
}

describe('registration and tokens', () => {
  it('registers a user and logs in with the lowercased email', async () => {
    const created = await request(server, '/api/users/', { method: 'POST', body: registration })

    expect(created.status).toBe(201)
    expect(created.body).toEqual({
      email: 'ann@example.com',
      id: expect.any(Number),
      username: 'ann',
      first_name: 'Ann',
      last_name: 'Cook',
    })

    const login = await request(server, '/api/auth/token/login/', {
      method: 'POST',
      body: { email: 'ANN@example.com', password: 'kitchen-table-9' },
    })
    expect(login.status).toBe(200)
    expect(json(login).auth_token).toMatch(/^[0-9a-f]{40}$/)

    const again = await request(server, '/api/auth/token/login/', {
      method: 'POST',
      body: { email: 'ann@example.com', password: 'kitchen-table-9' },
    })
    expect(json(again).auth_token).toBe(json(login).auth_token)
  })

  it('rejects a taken email and username', async () => {
    await makeUser('ann')

    const res = await request(server, '/api/users/', {
      method: 'POST',
      body: { ...registration, email: 'ann@example.com' },
    })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ email: [EMAIL_TAKEN], username: [USERNAME_TAKEN] })
  })

  it('rejects the loser of two simultaneous registrations with field errors', async () => {
    const responses = await Promise.all([
      request(server, '/api/users/', { method: 'POST', body: registration }),
      request(server, '/api/users/', { method: 'POST', body: registration }),
    ])

    expect(responses.map((res) => res.status).sort()).toEqual([201, 400])
    const rejected = responses.find((res) => res.status === 400)
    expect(rejected?.body).toEqual({ email: [EMAIL_TAKEN], username: [USERNAME_TAKEN] })
  })

  it('rejects wrong credentials', async () => {
    await makeUser('ann')

    const res = await request(server, '/api/auth/token/login/', {
      method: 'POST',
      body: { email: 'ann@example.com', password: 'wrong-password' },
    })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ non_field_errors: [INVALID_CREDENTIALS] })
  })

  it('invalidates the token on logout', async () => {
    const { token } = await makeUser('ann')

    const logout = await request(server, '/api/auth/token/logout/', { method: 'POST', token })
    expect(logout.status).toBe(204)

    const me = await request(server, '/api/users/me/', { token })
    expect(me.status).toBe(401)
    expect(me.body).toEqual({ error: INVALID_TOKEN })
  })
})

describe('current user', () => {
  it('returns the profile of the token owner', async () => {
    const { user, token } = await makeUser('ann')

    const res = await request(server, '/api/users/me/', { token })

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      email: 'ann@example.com',
      id: user.id,
      username: 'ann',
      first_name: 'ann',
      last_name: 'Tester',
      is_subscribed: false,
      avatar: null,
    })
  })

  it('requires authentication', async () => {
    const res = await request(server, '/api/users/me/')

    expect(res.status).toBe(401)
    expect(res.body).toEqual({ error: NOT_AUTHENTICATED })
  })

  it('rejects a malformed authorization header', async () => {
    const res = await fetch(`${server.url}/api/users/me/`, { headers: { Authorization: 'Bearer abc' } })

    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({ error: INVALID_TOKEN_HEADER })
  })

  it('changes the password after checking the current one', async () => {
    const { token } = await makeUser('ann')

    const wrong = await request(server, '/api/users/set_password/', {
      method: 'POST',
      token,
      body: { current_password: 'nope-nope-1', new_password: 'fresh-basil-42' },
    })
    expect(wrong.status).toBe(400)
    expect(wrong.body).toEqual({ current_password: [WRONG_CURRENT_PASSWORD] })

    const weak = await request(server, '/api/users/set_password/', {
      method: 'POST',
      token,
      body: { current_password: TEST_PASSWORD, new_password: 'short' },
    })
    expect(weak.body).toEqual({ new_password: [PASSWORD_TOO_SHORT] })

    const ok = await request(server, '/api/users/set_password/', {
      method: 'POST',
      token,
      body: { current_password: TEST_PASSWORD, new_password: 'fresh-basil-42' },
    })
    expect(ok.status).toBe(204)

    const login = await request(server, '/api/auth/token/login/', {
      method: 'POST',
      body: { email: 'ann@example.com', password: 'fresh-basil-42' },
    })
    expect(login.status).toBe(200)
  })

  it('stores, serves and removes the avatar', async () => {
    const { token } = await makeUser('ann')

    const put = await request(server, '/api/users/me/avatar/', {
      method: 'PUT',
      token,
      body: { avatar: PNG_DATA_URI },
    })
    expect(put.status).toBe(200)
    const url = String(json(put).avatar)
    expect(url).toMatch(/^https:\/\/recipes\.test\/media\/avatars\/[0-9a-f-]{36}\.png$/)

    const relative = url.replace('https://recipes.test/media/', '')
    const served = await fetch(`${server.url}/media/${relative}`)
    expect(served.status).toBe(200)
    expect(Buffer.from(await served.arrayBuffer()).equals(PNG_BYTES)).toBe(true)
    expect(existsSync(mediaPath(relative))).toBe(true)

    const me = await request(server, '/api/users/me/', { token })
    expect(json(me).avatar).toBe(url)

    const removed = await request(server, '/api/users/me/avatar/', { method: 'DELETE', token })
    expect(removed.status).toBe(204)
    expect(existsSync(mediaPath(relative))).toBe(false)
  })

  it('accepts the avatar as a multipart file', async () => {
    const { token } = await makeUser('ann')
    const form = new FormData()
    form.append('avatar', new Blob([PNG_BYTES], { type: 'image/png' }), 'me.png')

    const res = await sendForm(server, '/api/users/me/avatar/', { method: 'PUT', token, form })

    expect(res.status).toBe(200)
    expect(json(res).avatar).toMatch(/^https:\/\/recipes\.test\/media\/avatars\/[0-9a-f-]{36}\.png$/)
  })

  it('rejects a multipart avatar over the size limit', async () => {
    const { token } = await makeUser('ann')
    const form = new FormData()
    const oversized = Buffer.concat([PNG_BYTES, Buffer.alloc(MAX_IMAGE_BYTES)])
    form.append('avatar', new Blob([oversized], { type: 'image/png' }), 'me.png')

    const res = await sendForm(server, '/api/users/me/avatar/', { method: 'PUT', token, form })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ avatar: [IMAGE_TOO_LARGE] })
  })

  it('requires an avatar in the body', async () => {
    const { token } = await makeUser('ann')

    const res = await request(server, '/api/users/me/avatar/', { method: 'PUT', token, body: {} })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ avatar: ['This field is required.'] })
  })
})

describe('user list', () => {
  it('paginates by username with absolute links', async () => {
    for (const name of ['cara', 'ann', 'bob']) await makeUser(name)

    const first = await request(server, '/api/users/?limit=2')
    expect(first.status).toBe(200)
    expect(json(first)).toMatchObject({
      count: 3,
      next: 'https://recipes.test/api/users/?limit=2&page=2',
      previous: null,
    })
    expect(first.body).toMatchObject({ results: [{ username: 'ann' }, { username: 'bob' }] })

    const second = await request(server, '/api/users/?limit=2&page=2')
    expect(json(second)).toMatchObject({
      count: 3,
      next: null,
      previous: 'https://recipes.test/api/users/?limit=2',
      results: [{ username: 'cara' }],
    })
  })

  it('returns 404 for a page past the end', async () => {
    await makeUser('ann')

    const res = await request(server, '/api/users/?page=2')

    expect(res.status).toBe(404)
    expect(res.body).toEqual({ error: INVALID_PAGE })
  })

  it('returns 404 for a page whose offset cannot be stored', async () => {
    await makeUser('ann')

    const res = await request(server, '/api/users/?page=2000000000000000000')

    expect(res.status).toBe(404)
    expect(res.body).toEqual({ error: INVALID_PAGE })
  })

  it('returns 404 for an unknown user', async () => {
    const res = await request(server, '/api/users/999/')

    expect(res.status).toBe(404)
  })
})
