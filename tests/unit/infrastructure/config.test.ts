import { describe, it, expect } from 'vitest'
import { loadConfig } from '@infrastructure/config.ts'

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      databaseUrl: 'data/db.sqlite3',
      mediaRoot: 'media',
      publicUrl: 'http://localhost:8000',
      corsOrigins: [],
      logLevel: 'info',
    })
  })

  it('parses the port, origins and public URL', () => {
    const config = loadConfig({
      PORT: '9000',
      PUBLIC_URL: 'https://recipes.test/',
      CORS_ORIGINS: 'https://a.test, https://b.test,',
    })

    expect(config.port).toBe(9000)
    expect(config.publicUrl).toBe('https://recipes.test')
    expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test'])
  })

  it('throws a readable error for invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /)
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/)
  })
})
