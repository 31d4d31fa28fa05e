import type { FastifyPluginCallback } from 'fastify'
import { missingTables } from '../db/introspect.js'

interface HealthCheck {
  status: 'healthy' | 'unhealthy'
  latency?: number
  missingTables?: string[]
}

const healthRoutes: FastifyPluginCallback = (fastify, _opts, done) => {
  fastify.get('/api/health', async (_request, reply) => {
    return reply.send({
      status: 'healthy',
      version: '0.1.0',
      uptime: process.uptime(),
    })
  })

  fastify.get('/api/health/ready', async (request, reply) => {
    const checks: Record<string, HealthCheck> = {}

    // Ready once the database answers and every table has been migrated.
    const dbStart = performance.now()
    try {
      const missing = await missingTables(fastify.db)
      checks['database'] =
        missing.length === 0
          ? { status: 'healthy', latency: Math.round(performance.now() - dbStart) }
          : { status: 'unhealthy', missingTables: missing }
    } catch (err: unknown) {
      request.log.warn({ err }, 'Database readiness check failed')
      checks['database'] = { status: 'unhealthy' }
    }

    const allHealthy = Object.values(checks).every((c) => c.status === 'healthy')

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? 'ready' : 'degraded',
      checks,
    })
  })

  done()
}

export default healthRoutes
