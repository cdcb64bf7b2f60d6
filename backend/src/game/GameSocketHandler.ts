import { AuthError, ConnectionLost, CryptoError, ProtocolError } from '../errors'
import type { LineSocket } from '../lib/lineSocket'
import {
  MALFORMED_REQUEST,
  formatAuthError,
  formatAuthOk,
  formatHandshake,
  parseAuthRequest,
  parseGameplayPayload
} from '../types/protocol'
import type { AuthRequest } from '../types/protocol'
import type { Logger } from '../utils/logger'
import type { GameManager } from './GameManager'
import type { Peer } from './SessionRegistry'
import type { PeerRole, Side, StateSnapshot } from './types'

export type ConnectionState =
  | 'CONNECTED'
  | 'AUTHENTICATING'
  | 'PLAYING'
  | 'GAME_OVER_WAIT'
  | 'READY'
  | 'DISCONNECTED'

const RECEIVING_STATES: ReadonlySet<ConnectionState> = new Set(['PLAYING', 'GAME_OVER_WAIT', 'READY'])

/**
 * Drives one peer through handshake, authentication and gameplay.
 *
 * The handler only reads and writes its own socket; shared match state is
 * reached through GameManager, which applies intents on the next tick.
 */
export default class GameSocketHandler implements Peer {
  private state: ConnectionState = 'CONNECTED'
  private role?: PeerRole
  private log: Logger

  constructor(
    private readonly socket: LineSocket,
    private readonly manager: GameManager,
    logger: Logger
  ) {
    this.log = logger.child({ remote: socket.remoteAddress })
  }

  get remoteAddress(): string {
    return this.socket.remoteAddress
  }

  get connectionState(): ConnectionState {
    return this.state
  }

  get peerRole(): PeerRole | undefined {
    return this.role
  }

  /** Runs until the peer goes away; never rejects. */
  async run(): Promise<void> {
    try {
      await this.session()
    } catch (err) {
      this.report(err)
    } finally {
      this.disconnect()
    }
  }

  deliver(snapshot: StateSnapshot): boolean {
    if (!RECEIVING_STATES.has(this.state)) return false
    if (this.role === 'observer') return this.socket.writeLine(snapshot.line)

    if (snapshot.gameOver && this.state === 'PLAYING') {
      this.state = 'GAME_OVER_WAIT'
    } else if (!snapshot.gameOver && this.state !== 'PLAYING') {
      this.state = 'PLAYING'
    }
    return this.socket.writeLine(this.manager.channel.encode(snapshot.line))
  }

  close() {
    this.socket.close()
  }

  private async session() {
    const role = this.manager.join(this)
    this.role = role
    this.log = this.log.child({ role })
    // release the seat as soon as the peer goes, even mid credential check
    this.socket.onEnd(() => this.disconnect())
    if (this.state === 'DISCONNECTED') throw new ConnectionLost()
    const { width, height } = this.manager.config
    this.socket.writeLine(formatHandshake(width, height, role))

    if (role === 'observer') {
      this.state = 'PLAYING'
      await this.ignoreInput()
      return
    }

    this.state = 'AUTHENTICATING'
    await this.authenticate(role)
    await this.play(role)
  }

  private async nextLine(): Promise<string> {
    const line = await this.socket.readLine()
    if (line === null) throw new ConnectionLost()
    return line
  }

  private async authenticate(side: Side) {
    for (;;) {
      const line = await this.nextLine()
      let request: AuthRequest
      try {
        request = parseAuthRequest(line)
      } catch (err) {
        this.socket.writeLine(MALFORMED_REQUEST)
        throw err
      }

      try {
        const username = await this.checkCredentials(request)
        if (this.state === 'DISCONNECTED') throw new ConnectionLost()
        this.manager.seat(side, username)
        this.socket.writeLine(formatAuthOk(request.action))
        this.state = 'PLAYING'
        this.log = this.log.child({ username })
        this.log.info({ action: request.action }, 'player authenticated')
        return
      } catch (err) {
        if (!(err instanceof AuthError)) throw err
        this.log.info({ code: err.code }, 'authentication refused')
        this.socket.writeLine(formatAuthError(err.message))
      }
    }
  }

  private async checkCredentials(request: AuthRequest): Promise<string> {
    const { credentials, leaderboard } = this.manager
    if (request.action === 'login') {
      return credentials.verify(request.username, request.password)
    }
    const username = await credentials.register(request.username, request.password)
    await leaderboard.enroll(username)
    return username
  }

  private async play(side: Side) {
    for (;;) {
      const payload = this.manager.channel.decode(await this.nextLine())
      const command = parseGameplayPayload(payload)
      if (command.kind === 'move') {
        this.manager.setIntent(side, command.intent)
        continue
      }
      const outcome = this.manager.signalReady(side)
      if (outcome === 'waiting' && this.state === 'GAME_OVER_WAIT') {
        this.state = 'READY'
      }
    }
  }

  // Observers are read-only: drain whatever they send until they leave.
  private async ignoreInput() {
    while ((await this.socket.readLine()) !== null) {
      // nothing to acknowledge
    }
  }

  private report(err: unknown) {
    if (err instanceof ConnectionLost) {
      this.log.info('peer disconnected')
    } else if (err instanceof ProtocolError || err instanceof CryptoError) {
      this.log.warn({ err }, 'dropping peer')
    } else {
      this.log.error({ err }, 'connection handler failed')
    }
  }

  private disconnect() {
    if (this.state === 'DISCONNECTED') return
    this.state = 'DISCONNECTED'
    this.socket.close()
    if (this.role !== undefined) this.manager.leave(this)
  }
}
