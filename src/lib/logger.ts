// Fastify creates its own Pino logger instance.
// Services receive it by injection and log against this type.
export type { FastifyBaseLogger as Logger } from 'fastify'
