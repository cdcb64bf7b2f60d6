import path from 'node:path'
import Fastify from 'fastify'
import websocket from '@fastify/websocket'
import { loadConfig } from './config'
import type { ServerConfig } from './config'
import { GameManager } from './game/GameManager'
import { DEFAULT_CONFIG } from './game/types'
import { closeTcp, listenTcp } from './net/tcpServer'
import gamePlugin from './plugins/game'
import leaderboardRoutes from './routes/leaderboard'
import playRoutes from './routes/play'
import { CredentialStore, argon2Hasher } from './services/credentials'
import { LeaderboardService } from './services/leaderboard'
import { AesGcmCipher, SecureChannel, loadOrCreateKey } from './services/secureChannel'
import { createLogger } from './utils/logger'
import type { Logger } from './utils/logger'

export const buildServer = async (opts: { manager: GameManager; logLevel?: string }) => {
  const server = Fastify({ logger: { level: opts.logLevel ?? 'info' } })

  await server.register(websocket)
  await server.register(gamePlugin, { manager: opts.manager })
  await server.register(leaderboardRoutes)
  await server.register(playRoutes)

  server.get('/api/health', async () => {
    return {
      status: 'ok',
      phase: server.game.phase,
      observers: server.game.registry.observerCount(),
      timestamp: new Date().toISOString()
    }
  })

  return server
}

/** Loads the key and record files under `dataDir` and wires the session owner. */
export const createGameManager = async (config: ServerConfig, logger: Logger) => {
  const key = await loadOrCreateKey(path.join(config.dataDir, 'secret.key'))
  return new GameManager({
    config: {
      ...DEFAULT_CONFIG,
      width: config.court.width,
      height: config.court.height,
      winScore: config.winScore
    },
    tickRate: config.tickRate,
    credentials: new CredentialStore(path.join(config.dataDir, 'users.json'), argon2Hasher),
    leaderboard: new LeaderboardService(path.join(config.dataDir, 'leaderboard.json')),
    channel: new SecureChannel(new AesGcmCipher(key)),
    logger
  })
}

const start = async () => {
  try {
    const config = loadConfig()
    const logger = createLogger(config.logLevel)
    const manager = await createGameManager(config, logger)
    const server = await buildServer({ manager, logLevel: config.logLevel })
    const tcp = await listenTcp(manager, config.tcp, logger)
    await server.listen({ port: config.http.port, host: config.http.host })
    manager.start()

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'shutting down')
      manager.stop()
      Promise.all([closeTcp(tcp), server.close()])
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'shutdown failed')
          process.exit(1)
        })
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  } catch (err) {
    console.error('Failed to start server', err)
    process.exit(1)
  }
}

if (process.env.VITEST !== 'true') {
  void start()
}

/*
解説:

1) buildServer({ manager })
  - Fastify インスタンスを生成し、WebSocket・ゲーム用プラグイン・リーダーボード/プレイ用ルートを登録する。
  - テストからは `inject()` で直接呼び出せるように、リッスンせずにインスタンスを返す。

2) createGameManager(config, logger)
  - `DATA_DIR` 配下の鍵ファイル・ユーザーファイル・リーダーボードファイルを用意し、GameManager を組み立てる。

3) start()
  - 設定読み込み → TCP リスナー → HTTP リスナー → tick ループ開始の順に起動する。
  - SIGINT / SIGTERM で tick ループ・ソケット・両リスナーを閉じて終了する。

4) if (process.env.VITEST !== 'true') { void start() }
  - Vitest 実行時には自動起動を抑止する。
*/
