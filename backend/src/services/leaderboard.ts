import { z } from 'zod'
import { JsonFileStore } from '../utils/jsonFile'

const leaderboardFileSchema = z.object({
  entries: z.array(
    z.object({
      username: z.string().min(1),
      wins: z.number().int().min(0)
    })
  )
})

export interface LeaderboardEntry {
  rank: number
  username: string
  wins: number
}

export class LeaderboardService {
  private readonly store: JsonFileStore<typeof leaderboardFileSchema>

  constructor(filePath: string) {
    this.store = new JsonFileStore(filePath, leaderboardFileSchema, () => ({ entries: [] }))
  }

  /** Adds a zero-win row so ties later resolve by registration order. */
  async enroll(username: string): Promise<void> {
    await this.store.update((data) => {
      if (!data.entries.some((e) => e.username === username)) {
        data.entries.push({ username, wins: 0 })
      }
    })
  }

  /**
   * Counts one win and resolves once the file has been rewritten.
   * Not idempotent: call exactly once per completed game.
   */
  recordWin(username: string): Promise<number> {
    return this.store.update((data) => {
      let entry = data.entries.find((e) => e.username === username)
      if (!entry) {
        entry = { username, wins: 0 }
        data.entries.push(entry)
      }
      entry.wins += 1
      return entry.wins
    })
  }

  async topN(n: number): Promise<LeaderboardEntry[]> {
    if (n <= 0) return []
    const { entries } = await this.store.read()
    return entries
      .map((entry, order) => ({ ...entry, order }))
      .sort((a, b) => b.wins - a.wins || a.order - b.order)
      .slice(0, n)
      .map(({ username, wins }, index) => ({ rank: index + 1, username, wins }))
  }
}
