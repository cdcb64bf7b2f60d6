import type { Side } from './types'

export type ReadyOutcome = 'waiting' | 'restart' | 'ignored'

/**
 * Gates a restart on both players signalling readiness after a game ends.
 * The coordinator only tracks flags; GameManager performs the restart.
 */
export class RematchCoordinator {
  private armed = false
  private flags: Record<Side, boolean> = { left: false, right: false }

  get isArmed(): boolean {
    return this.armed
  }

  isReady(side: Side): boolean {
    return this.flags[side]
  }

  arm() {
    this.armed = true
    this.flags = { left: false, right: false }
  }

  ready(side: Side): ReadyOutcome {
    if (!this.armed) return 'ignored'
    this.flags[side] = true
    if (this.flags.left && this.flags.right) {
      this.cancel()
      return 'restart'
    }
    return 'waiting'
  }

  cancel() {
    this.armed = false
    this.flags = { left: false, right: false }
  }
}
