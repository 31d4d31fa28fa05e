import { z } from 'zod/v4'

const portSchema = z
  .string()
  .default('3000')
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535))

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive())

const booleanFromString = (defaultVal: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultVal)
    .transform((v) => v === 'true')

export const envSchema = z.object({
  // Required
  DATABASE_URL: z.url(),

  // Server
  HOST: z.string().default('0.0.0.0'),
  PORT: portSchema,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Database
  DATABASE_POOL_MAX: positiveIntFromString('20'),
  RUN_MIGRATIONS: booleanFromString('true'),
})

export type Env = z.infer<typeof envSchema>

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const formatted = z.prettifyError(result.error)
    throw new Error(`Invalid environment configuration:\n${formatted}`)
  }
  return result.data
}
