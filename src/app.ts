import Fastify from 'fastify'
import type { FastifyError } from 'fastify'
import type { Env } from './config/env.js'
import { createDb } from './db/index.js'
import type { Database } from './db/index.js'
import { ApiError } from './lib/api-errors.js'
import { createServices } from './services/index.js'
import type { Services } from './services/index.js'
import healthRoutes from './routes/health.js'

// Extend Fastify types with decorated properties
declare module 'fastify' {
  interface FastifyInstance {
    db: Database
    env: Env
    services: Services
  }
}

/** Overrides for tests: an already-open database and how to close it. */
export interface AppDeps {
  db: Database
  close?: () => Promise<void>
}

export async function buildApp(env: Env, deps?: AppDeps) {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace'
        ? { transport: { target: 'pino-pretty' } }
        : {}),
    },
  })

  // Database
  let db: Database
  let closeDb: (() => Promise<void>) | undefined
  if (deps) {
    db = deps.db
    closeDb = deps.close
  } else {
    const created = createDb(env.DATABASE_URL, { max: env.DATABASE_POOL_MAX })
    db = created.db
    closeDb = () => created.client.end()
  }
  app.decorate('db', db)
  app.decorate('env', env)

  // Services
  app.decorate('services', createServices(db, app.log))

  // Routes
  await app.register(healthRoutes)

  app.addHook('onClose', async () => {
    app.log.info('Shutting down...')
    if (closeDb) {
      await closeDb()
    }
    app.log.info('Connections closed')
  })

  // Layer errors carry their own status and message; everything else is a 500.
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ApiError) {
      request.log.warn({ err: error, requestId: request.id }, 'Request rejected')
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
        statusCode: error.statusCode,
      })
    }

    app.log.error({ err: error, requestId: request.id }, 'Unhandled error')
    const statusCode = error.statusCode ?? 500
    return reply.status(statusCode).send({
      error: 'Internal Server Error',
      message:
        env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'trace'
          ? error.message
          : 'An unexpected error occurred',
      statusCode,
    })
  })

  return app
}
