import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { CryptoError } from '../errors'
import { TEST_KEY } from '../testing/fakes'
import { AesGcmCipher, SecureChannel, loadOrCreateKey } from './secureChannel'

describe('SecureChannel', () => {
  const channel = new SecureChannel(new AesGcmCipher(TEST_KEY))

  it('decodes what it encodes', () => {
    const envelope = channel.encode('215 215 315 240 0 0')
    expect(channel.decode(envelope)).toBe('215 215 315 240 0 0')
  })

  it('produces single-line envelopes that never repeat', () => {
    const a = channel.encode('up')
    const b = channel.encode('up')
    expect(a).not.toBe(b)
    expect(a).toMatch(/^[A-Za-z0-9_-]+$/)
  })

  it('round-trips the empty payload', () => {
    expect(channel.decode(channel.encode(''))).toBe('')
  })

  it('rejects a tampered envelope', () => {
    const raw = Buffer.from(channel.encode('ready'), 'base64url')
    raw[raw.length - 1] ^= 0x01
    expect(() => channel.decode(raw.toString('base64url'))).toThrow(CryptoError)
  })

  it('rejects envelopes sealed under another key', () => {
    const other = new SecureChannel(new AesGcmCipher(Buffer.alloc(32, 9)))
    expect(() => channel.decode(other.encode('down'))).toThrow(CryptoError)
  })

  it('rejects plaintext and truncated input', () => {
    expect(() => channel.decode('up')).toThrow('envelope rejected')
    expect(() => channel.decode('')).toThrow(CryptoError)
  })

  it('requires a 32-byte key', () => {
    expect(() => new AesGcmCipher(Buffer.alloc(16))).toThrow(/32-byte key/)
  })
})

describe('loadOrCreateKey', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pong-key-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates a private key file on first run and reuses it afterwards', async () => {
    const file = path.join(dir, 'nested', 'secret.key')
    const first = await loadOrCreateKey(file)
    expect(first).toHaveLength(32)
    expect((await stat(file)).mode & 0o777).toBe(0o600)
    expect((await readFile(file, 'utf8')).trim()).toBe(first.toString('base64'))

    const second = await loadOrCreateKey(file)
    expect(second.equals(first)).toBe(true)
  })

  it('refuses a key file of the wrong size', async () => {
    const file = path.join(dir, 'secret.key')
    await writeFile(file, Buffer.alloc(8).toString('base64'))
    await expect(loadOrCreateKey(file)).rejects.toThrow(/32-byte key/)
  })
})
