import 'dotenv/config'
import { z } from 'zod'

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: z.string().min(1).default('data/db.sqlite3'),
  MEDIA_ROOT: z.string().min(1).default('media'),
  PUBLIC_URL: z.string().url().default('http://localhost:8000'),
  CORS_ORIGINS: z.string().default(''),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
})

export interface AppConfig {
  port: number
  databaseUrl: string
  mediaRoot: string
  publicUrl: string
  corsOrigins: string[]
  logLevel: z.infer<typeof configSchema>['LOG_LEVEL']
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }

  const values = parsed.data
  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    mediaRoot: values.MEDIA_ROOT,
    publicUrl: values.PUBLIC_URL.replace(/\/+$/, ''),
    corsOrigins: values.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    logLevel: values.LOG_LEVEL,
  }
}

export const config = loadConfig()
