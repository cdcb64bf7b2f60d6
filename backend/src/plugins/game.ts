import fp from 'fastify-plugin'
import type { FastifyPluginAsync } from 'fastify'
import type { GameManager } from '../game/GameManager'
import type { LeaderboardService } from '../services/leaderboard'

declare module 'fastify' {
  interface FastifyInstance {
    game: GameManager
    leaderboard: LeaderboardService
  }
}

export interface GamePluginOptions {
  manager: GameManager
}

const gamePlugin: FastifyPluginAsync<GamePluginOptions> = async (fastify, opts) => {
  fastify.decorate('game', opts.manager)
  fastify.decorate('leaderboard', opts.manager.leaderboard)

  fastify.addHook('onClose', async () => {
    opts.manager.stop()
  })
}

export default fp(gamePlugin, { name: 'game' })
