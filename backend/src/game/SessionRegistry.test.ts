import { describe, expect, it } from 'vitest'
import { FakePeer } from '../testing/fakes'
import { createLogger } from '../utils/logger'
import { GameEngine } from './engine'
import { SessionRegistry } from './SessionRegistry'
import type { StateSnapshot } from './types'

const logger = createLogger('silent')
const snapshot = new GameEngine().snapshot()

describe('SessionRegistry', () => {
  it('hands out left, then right, then observer', () => {
    const registry = new SessionRegistry(logger)
    const [a, b, c, d] = ['a', 'b', 'c', 'd'].map((name) => new FakePeer(name))
    expect(registry.assignRole(a)).toBe('left')
    expect(registry.assignRole(b)).toBe('right')
    expect(registry.assignRole(c)).toBe('observer')
    expect(registry.assignRole(d)).toBe('observer')
    expect(registry.observerCount()).toBe(2)
  })

  it('returns the existing role for a peer it already knows', () => {
    const registry = new SessionRegistry(logger)
    const a = new FakePeer('a')
    registry.assignRole(a)
    expect(registry.assignRole(a)).toBe('left')
    expect(registry.assignRole(new FakePeer('b'))).toBe('right')
  })

  it('reuses a released slot', () => {
    const registry = new SessionRegistry(logger)
    const a = new FakePeer('a')
    const b = new FakePeer('b')
    registry.assignRole(a)
    registry.assignRole(b)
    expect(registry.release(a)).toBe('left')
    expect(registry.release(a)).toBeUndefined()
    expect(registry.assignRole(new FakePeer('c'))).toBe('left')
    expect(registry.roleOf(b)).toBe('right')
  })

  it('tracks usernames per slot', () => {
    const registry = new SessionRegistry(logger)
    registry.assignRole(new FakePeer('a'))
    registry.assignRole(new FakePeer('b'))
    registry.setUsername('left', 'alice')
    expect(registry.bothAuthenticated()).toBe(false)
    expect(registry.isSeatedElsewhere('alice', 'right')).toBe(true)
    expect(registry.isSeatedElsewhere('alice', 'left')).toBe(false)
    registry.setUsername('right', 'bob')
    expect(registry.bothAuthenticated()).toBe(true)
    expect(registry.slot('right')?.username).toBe('bob')
  })

  it('keeps broadcasting past busy and failing peers', () => {
    const registry = new SessionRegistry(logger)
    const busy = new FakePeer('busy')
    busy.accept = false
    const broken = new FakePeer('broken')
    broken.deliver = (_snapshot: StateSnapshot) => {
      throw new Error('socket exploded')
    }
    const watcher = new FakePeer('watcher')
    registry.assignRole(busy)
    registry.assignRole(broken)
    registry.assignRole(watcher)

    expect(registry.broadcastSnapshot(snapshot)).toBe(1)
    expect(busy.snapshots).toEqual([])
    expect(watcher.lastLine()).toBe('215 215 320 240 0 0')
  })
})
