import { AuthError, SimulationFault } from '../errors'
import type { LineSocket } from '../lib/lineSocket'
import type { CredentialStore } from '../services/credentials'
import type { LeaderboardService } from '../services/leaderboard'
import type { SecureChannel } from '../services/secureChannel'
import type { Logger } from '../utils/logger'
import { GameEngine } from './engine'
import GameSocketHandler from './GameSocketHandler'
import { RematchCoordinator } from './rematch'
import type { ReadyOutcome } from './rematch'
import { SessionRegistry } from './SessionRegistry'
import type { Peer } from './SessionRegistry'
import type { GameConfig, GamePhase, Intent, Intents, PeerRole, Side, StateSnapshot } from './types'

export interface GameManagerOptions {
  config: GameConfig
  tickRate: number
  credentials: CredentialStore
  leaderboard: LeaderboardService
  channel: SecureChannel
  logger: Logger
}

const idleIntents = (): Intents => ({ left: 'none', right: 'none' })

/**
 * Owns the one running session: match state (through the engine), the
 * latest-value intent slots, the committed snapshot and the tick timer.
 */
export class GameManager {
  readonly config: GameConfig
  readonly credentials: CredentialStore
  readonly leaderboard: LeaderboardService
  readonly channel: SecureChannel
  readonly registry: SessionRegistry

  private readonly engine: GameEngine
  private readonly rematch = new RematchCoordinator()
  private readonly logger: Logger
  private readonly tickRate: number
  private intents: Intents = idleIntents()
  private current: StateSnapshot
  private loopId?: NodeJS.Timeout

  constructor(options: GameManagerOptions) {
    this.config = options.config
    this.tickRate = options.tickRate
    this.credentials = options.credentials
    this.leaderboard = options.leaderboard
    this.channel = options.channel
    this.logger = options.logger.child({ component: 'game' })
    this.registry = new SessionRegistry(this.logger)
    this.engine = new GameEngine(options.config)
    this.current = this.engine.snapshot()
  }

  get phase(): GamePhase {
    return this.engine.phase
  }

  /** Latest committed snapshot. */
  get snapshot(): StateSnapshot {
    return this.current
  }

  isRunning(): boolean {
    return this.loopId !== undefined
  }

  start() {
    if (this.loopId) return
    this.loopId = setInterval(() => {
      try {
        this.tick()
      } catch (err) {
        this.logger.error({ err }, 'tick failed')
      }
    }, 1000 / this.tickRate)
    this.logger.info({ tickRate: this.tickRate }, 'tick loop started')
  }

  stop() {
    if (this.loopId) {
      clearInterval(this.loopId)
      this.loopId = undefined
    }
    // shutdown is nobody's forfeit: drop the match before closing players
    this.rematch.cancel()
    this.engine.reset()
    this.intents = idleIntents()
    this.current = this.engine.snapshot()
    for (const peer of this.registry.peers()) {
      peer.close()
    }
  }

  /** Wraps a transport in a connection handler and runs it to completion. */
  accept(socket: LineSocket): Promise<void> {
    return new GameSocketHandler(socket, this, this.logger).run()
  }

  tick() {
    const intents = this.intents
    this.intents = idleIntents()

    let finished = false
    try {
      const before = this.engine.phase
      finished = before === 'IN_PROGRESS' && this.engine.step(intents) === 'GAME_OVER'
    } catch (err) {
      if (!(err instanceof SimulationFault)) throw err
      this.logger.error({ err }, 'simulation fault, ending session')
      this.terminateSession('fault')
    }

    if (finished) this.recordResult()
    this.publish()
    if (finished) {
      this.engine.awaitRematch()
      this.rematch.arm()
    }
  }

  join(peer: Peer): PeerRole {
    const role = this.registry.assignRole(peer)
    this.logger.info({ role, remote: peer.remoteAddress, observers: this.registry.observerCount() }, 'peer joined')
    return role
  }

  /** Binds an authenticated username to a slot; starts play once both are seated. */
  seat(side: Side, username: string) {
    if (this.registry.isSeatedElsewhere(username, side)) {
      throw new AuthError('ALREADY_PLAYING')
    }
    this.registry.setUsername(side, username)
    this.beginIfSeated()
  }

  /** Overwrites the slot's latest intent; read once by the next tick. */
  setIntent(side: Side, intent: Intent) {
    if (this.engine.phase !== 'IN_PROGRESS') return
    this.intents[side] = intent
  }

  signalReady(side: Side): ReadyOutcome {
    if (this.engine.phase !== 'AWAITING_REMATCH') return 'ignored'
    const outcome = this.rematch.ready(side)
    if (outcome === 'restart') {
      this.engine.restart()
      this.intents = idleIntents()
      this.current = this.engine.snapshot()
      this.logger.info('rematch started')
    } else {
      this.logger.info({ side }, 'player ready for rematch')
    }
    return outcome
  }

  leave(peer: Peer) {
    const role = this.registry.release(peer)
    if (!role) return
    this.logger.info({ role, remote: peer.remoteAddress }, 'peer left')
    if (role === 'observer') return

    this.intents[role] = 'none'
    const phase = this.engine.phase
    if (phase === 'IN_PROGRESS') {
      this.engine.forfeit(role)
      this.recordResult()
      this.publish()
      this.terminateSession('forfeit')
    } else if (phase === 'GAME_OVER' || phase === 'AWAITING_REMATCH') {
      this.terminateSession('player left after game over')
    }
  }

  private publish() {
    this.current = this.engine.snapshot()
    this.registry.broadcastSnapshot(this.current)
  }

  private recordResult() {
    const result = this.engine.snapshot().gameOver
    if (!result) return
    const username = this.registry.slot(result.winner)?.username
    this.logger.info({ winner: result.winner, username, reason: result.reason }, 'game over')
    if (!username) return
    this.leaderboard
      .recordWin(username)
      .then((wins) => this.logger.info({ username, wins }, 'win recorded'))
      .catch((err: unknown) => this.logger.error({ err, username }, 'failed to record win'))
  }

  // Ends the match without waiting on the rematch gate; seated players keep
  // their slots and a new game starts once both slots are authenticated.
  private terminateSession(reason: string) {
    this.rematch.cancel()
    this.engine.reset()
    this.intents = idleIntents()
    this.current = this.engine.snapshot()
    this.logger.info({ reason }, 'session terminated')
    this.beginIfSeated()
  }

  private beginIfSeated() {
    if (this.engine.phase !== 'AWAITING_PLAYERS' || !this.registry.bothAuthenticated()) return
    this.engine.begin()
    this.current = this.engine.snapshot()
    this.logger.info(
      { left: this.registry.slot('left')?.username, right: this.registry.slot('right')?.username },
      'game started'
    )
  }
}
