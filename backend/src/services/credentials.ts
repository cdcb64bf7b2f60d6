import argon2 from 'argon2'
import { z } from 'zod'
import { AuthError } from '../errors'
import { JsonFileStore } from '../utils/jsonFile'

/** One-way salted password digest. */
export interface Hasher {
  hash(password: string): Promise<string>
  verify(digest: string, password: string): Promise<boolean>
}

export const argon2Hasher: Hasher = {
  hash: (password) => argon2.hash(password, { type: argon2.argon2id }),
  verify: (digest, password) => argon2.verify(digest, password)
}

const usersFileSchema = z.object({
  users: z.array(
    z.object({
      username: z.string().min(1),
      passwordDigest: z.string().min(1),
      createdAt: z.string()
    })
  )
})

export type UsersFile = z.infer<typeof usersFileSchema>

const MAX_USERNAME_LENGTH = 32

export function normalizeUsername(raw: string): string {
  const username = raw.trim()
  if (!username || username.length > MAX_USERNAME_LENGTH || /\s/.test(username)) {
    throw new AuthError('INVALID_USERNAME')
  }
  return username
}

export class CredentialStore {
  private readonly store: JsonFileStore<typeof usersFileSchema>

  constructor(
    filePath: string,
    private readonly hasher: Hasher = argon2Hasher
  ) {
    this.store = new JsonFileStore(filePath, usersFileSchema, () => ({ users: [] }))
  }

  /** Resolves with the stored username; rejects with AuthError. */
  async register(rawUsername: string, password: string): Promise<string> {
    const username = normalizeUsername(rawUsername)
    if (!password) throw new AuthError('INVALID_PASSWORD')

    // Hash outside the queue: the existence check below is what decides the race.
    const passwordDigest = await this.hasher.hash(password)
    await this.store.update((data) => {
      if (data.users.some((u) => u.username === username)) {
        throw new AuthError('USERNAME_TAKEN')
      }
      data.users.push({ username, passwordDigest, createdAt: new Date().toISOString() })
    })
    return username
  }

  async verify(rawUsername: string, password: string): Promise<string> {
    const username = normalizeUsername(rawUsername)
    const { users } = await this.store.read()
    const record = users.find((u) => u.username === username)
    if (!record) throw new AuthError('UNKNOWN_USER')
    const ok = await this.hasher.verify(record.passwordDigest, password)
    if (!ok) throw new AuthError('BAD_PASSWORD')
    return username
  }
}
