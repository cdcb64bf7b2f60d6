import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { AuthError } from '../errors'
import { plainHasher } from '../testing/fakes'
import { CredentialStore, argon2Hasher, normalizeUsername } from './credentials'

describe('CredentialStore', () => {
  let dir: string
  let file: string
  let store: CredentialStore

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pong-credentials-'))
    file = path.join(dir, 'users.json')
    store = new CredentialStore(file, plainHasher)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('registers then verifies a user', async () => {
    await expect(store.register('alice', 'pw1')).resolves.toBe('alice')
    await expect(store.verify('alice', 'pw1')).resolves.toBe('alice')
  })

  it('stores a digest, never the password', async () => {
    await store.register('alice', 'pw1')
    const saved = JSON.parse(await readFile(file, 'utf8'))
    expect(saved.users).toHaveLength(1)
    expect(saved.users[0].username).toBe('alice')
    expect(saved.users[0].passwordDigest).toBe('plain:pw1')
  })

  it('refuses a taken username', async () => {
    await store.register('alice', 'pw1')
    await expect(store.register('alice', 'other')).rejects.toMatchObject({ code: 'USERNAME_TAKEN' })
  })

  it('lets exactly one of two concurrent registrations win', async () => {
    const results = await Promise.allSettled([store.register('alice', 'a'), store.register('alice', 'b')])
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1)
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected')
    expect(rejected).toHaveLength(1)
    expect(rejected[0].reason).toBeInstanceOf(AuthError)
    expect(rejected[0].reason.code).toBe('USERNAME_TAKEN')

    const saved = JSON.parse(await readFile(file, 'utf8'))
    expect(saved.users).toHaveLength(1)
  })

  it('reports unknown users and bad passwords', async () => {
    await expect(store.verify('ghost', 'pw')).rejects.toMatchObject({ code: 'UNKNOWN_USER', message: 'unknown user' })
    await store.register('alice', 'pw1')
    await expect(store.verify('alice', 'wrong')).rejects.toMatchObject({ code: 'BAD_PASSWORD', message: 'bad password' })
  })

  it('rejects an empty password', async () => {
    await expect(store.register('alice', '')).rejects.toMatchObject({ code: 'INVALID_PASSWORD' })
  })

  it('survives a restart', async () => {
    await store.register('alice', 'pw1')
    const reopened = new CredentialStore(file, plainHasher)
    await expect(reopened.verify('alice', 'pw1')).resolves.toBe('alice')
  })
})

describe('normalizeUsername', () => {
  it('trims surrounding whitespace', () => {
    expect(normalizeUsername('  bob ')).toBe('bob')
  })

  it.each(['', '   ', 'a b', 'x'.repeat(33)])('rejects %j', (raw) => {
    expect(() => normalizeUsername(raw)).toThrow(AuthError)
  })
})

describe('argon2Hasher', () => {
  it('salts each digest and verifies the right password only', async () => {
    const first = await argon2Hasher.hash('test-secret')
    const second = await argon2Hasher.hash('test-secret')
    expect(first).not.toBe(second)
    expect(first.startsWith('$argon2id$')).toBe(true)
    await expect(argon2Hasher.verify(first, 'test-secret')).resolves.toBe(true)
    await expect(argon2Hasher.verify(first, 'not-it')).resolves.toBe(false)
  })
})
