import net from 'node:net'
import type { GameManager } from '../game/GameManager'
import { TcpLineSocket } from '../lib/lineSocket'
import type { Logger } from '../utils/logger'

/** Accepts gameplay connections and hands each to the session owner. */
export function listenTcp(
  manager: GameManager,
  address: { host: string; port: number },
  logger: Logger
): Promise<net.Server> {
  const log = logger.child({ component: 'tcp' })
  const server = net.createServer((socket) => {
    const lineSocket = new TcpLineSocket(socket)
    manager
      .accept(lineSocket)
      .catch((err: unknown) => log.error({ err, remote: lineSocket.remoteAddress }, 'connection handler crashed'))
  })
  server.on('error', (err) => log.error({ err }, 'tcp listener error'))

  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(address.port, address.host, () => {
      server.off('error', reject)
      log.info({ host: address.host, port: address.port }, 'gameplay listener ready')
      resolve(server)
    })
  })
}

export function closeTcp(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
}
