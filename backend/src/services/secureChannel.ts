import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CryptoError } from '../errors'
import { isMissingFile } from '../utils/jsonFile'

const KEY_BYTES = 32
const IV_BYTES = 12
const TAG_BYTES = 16

/** Symmetric authenticated cipher producing single-line envelopes. */
export interface Cipher {
  encrypt(plaintext: string): string
  /** Throws when the envelope is corrupt or sealed under another key. */
  decrypt(envelope: string): string
}

/** base64url(iv || tag || ciphertext) under AES-256-GCM. */
export class AesGcmCipher implements Cipher {
  private readonly key: Buffer

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new Error(`AES-256-GCM needs a ${KEY_BYTES}-byte key, got ${key.length}`)
    }
    this.key = Buffer.from(key)
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES)
    const cipher = createCipheriv('aes-256-gcm', this.key, iv)
    const body = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    return Buffer.concat([iv, cipher.getAuthTag(), body]).toString('base64url')
  }

  decrypt(envelope: string): string {
    const raw = Buffer.from(envelope.trim(), 'base64url')
    if (raw.length < IV_BYTES + TAG_BYTES) {
      throw new Error('envelope too short')
    }
    const iv = raw.subarray(0, IV_BYTES)
    const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES)
    const decipher = createDecipheriv('aes-256-gcm', this.key, iv)
    decipher.setAuthTag(tag)
    return Buffer.concat([decipher.update(raw.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]).toString('utf8')
  }
}

/**
 * Reads the base64 key from `filePath`, creating it with a fresh random key
 * on first run. Called once at start-up; the result lives for the process.
 */
export async function loadOrCreateKey(filePath: string): Promise<Buffer> {
  try {
    return decodeKey(await readFile(filePath, 'utf8'), filePath)
  } catch (err) {
    if (!isMissingFile(err)) throw err
  }

  const key = randomBytes(KEY_BYTES)
  await mkdir(path.dirname(filePath), { recursive: true })
  try {
    await writeFile(filePath, `${key.toString('base64')}\n`, { mode: 0o600, flag: 'wx' })
    return key
  } catch (err) {
    // another process created it first
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      return decodeKey(await readFile(filePath, 'utf8'), filePath)
    }
    throw err
  }
}

function decodeKey(text: string, filePath: string): Buffer {
  const key = Buffer.from(text.trim(), 'base64')
  if (key.length !== KEY_BYTES) {
    throw new Error(`Key file ${filePath} does not hold a ${KEY_BYTES}-byte key`)
  }
  return key
}

export class SecureChannel {
  constructor(private readonly cipher: Cipher) {}

  encode(plaintext: string): string {
    return this.cipher.encrypt(plaintext)
  }

  decode(envelope: string): string {
    try {
      return this.cipher.decrypt(envelope)
    } catch (err) {
      throw new CryptoError('envelope rejected', { cause: err })
    }
  }
}
