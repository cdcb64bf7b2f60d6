import type { Logger } from '../utils/logger'
import type { PeerRole, Side, StateSnapshot } from './types'

/** What the registry needs from a connection. */
export interface Peer {
  readonly remoteAddress: string
  /** Best-effort: returns false when the snapshot was dropped. */
  deliver(snapshot: StateSnapshot): boolean
  close(): void
}

export interface PlayerSlot {
  readonly role: Side
  readonly peer: Peer
  username?: string
}

/**
 * Tracks the two player slots and the observer set.
 *
 * Everything here runs synchronously on the event loop, so assignment and
 * release never interleave and a role is never handed out twice.
 */
export class SessionRegistry {
  private slots: Partial<Record<Side, PlayerSlot>> = {}
  private observers = new Set<Peer>()

  constructor(private readonly logger: Logger) {}

  assignRole(peer: Peer): PeerRole {
    const existing = this.roleOf(peer)
    if (existing) return existing

    const side: Side | undefined = !this.slots.left ? 'left' : !this.slots.right ? 'right' : undefined
    if (side) {
      this.slots[side] = { role: side, peer }
      return side
    }
    this.observers.add(peer)
    return 'observer'
  }

  release(peer: Peer): PeerRole | undefined {
    for (const side of ['left', 'right'] as const) {
      if (this.slots[side]?.peer === peer) {
        delete this.slots[side]
        return side
      }
    }
    if (this.observers.delete(peer)) return 'observer'
    return undefined
  }

  roleOf(peer: Peer): PeerRole | undefined {
    if (this.slots.left?.peer === peer) return 'left'
    if (this.slots.right?.peer === peer) return 'right'
    return this.observers.has(peer) ? 'observer' : undefined
  }

  slot(side: Side): PlayerSlot | undefined {
    return this.slots[side]
  }

  setUsername(side: Side, username: string) {
    const slot = this.slots[side]
    if (slot) slot.username = username
  }

  /** True when `username` is signed in on the slot other than `except`. */
  isSeatedElsewhere(username: string, except: Side): boolean {
    const other = this.slots[except === 'left' ? 'right' : 'left']
    return other?.username === username
  }

  bothAuthenticated(): boolean {
    return Boolean(this.slots.left?.username && this.slots.right?.username)
  }

  observerCount(): number {
    return this.observers.size
  }

  peers(): Peer[] {
    const players = [this.slots.left?.peer, this.slots.right?.peer].filter((p): p is Peer => p !== undefined)
    return [...players, ...this.observers]
  }

  /**
   * Hands the snapshot to every peer. A busy or failing peer only loses its
   * own copy; returns how many peers accepted it.
   */
  broadcastSnapshot(snapshot: StateSnapshot): number {
    let delivered = 0
    for (const peer of this.peers()) {
      try {
        if (peer.deliver(snapshot)) delivered++
      } catch (err) {
        this.logger.warn({ err, remote: peer.remoteAddress }, 'snapshot delivery failed')
      }
    }
    return delivered
  }
}
