import type { FastifyInstance } from 'fastify'
import { WsLineSocket } from '../lib/wsLineSocket'

/** WebSocket transport for the same line protocol the TCP listener speaks. */
export default async function playRoutes(fastify: FastifyInstance) {
  fastify.get('/ws/play', { websocket: true }, (socket, req) => {
    const lineSocket = new WsLineSocket(socket, `${req.ip}:ws`)
    fastify.game
      .accept(lineSocket)
      .catch((err: unknown) => req.log.error({ err }, 'websocket handler crashed'))
  })
}
