import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { LeaderboardEntry } from '../services/leaderboard'

const querySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
})

const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')

export function renderLeaderboardPage(entries: LeaderboardEntry[]): string {
  const rows = entries
    .map((e) => `<tr><td>${e.rank}</td><td>${escapeHtml(e.username)}</td><td>${e.wins}</td></tr>`)
    .join('\n')
  const body = entries.length > 0 ? rows : '<tr><td colspan="3">No games played yet</td></tr>'
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>Pong Leaderboard</title></head>
<body>
<h1>Leaderboard</h1>
<table>
<thead><tr><th>#</th><th>Player</th><th>Wins</th></tr></thead>
<tbody>
${body}
</tbody>
</table>
</body>
</html>
`
}

export default async function leaderboardRoutes(fastify: FastifyInstance) {
  fastify.get('/', async (request, reply) => {
    const parsed = querySchema.safeParse(request.query)
    const limit = parsed.success ? parsed.data.limit : 10
    const entries = await fastify.leaderboard.topN(limit)
    return reply.type('text/html; charset=utf-8').send(renderLeaderboardPage(entries))
  })

  fastify.get('/api/leaderboard', async (request, reply) => {
    const parsed = querySchema.safeParse(request.query)
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid query', details: parsed.error.issues.map((i) => i.message) })
    }
    const entries = await fastify.leaderboard.topN(parsed.data.limit)
    return { entries }
  })
}
