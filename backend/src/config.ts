import path from 'node:path'
import { z } from 'zod'

const port = z.coerce.number().int().min(0).max(65535)

const envSchema = z.object({
  PONG_HOST: z.string().min(1).default('0.0.0.0'),
  PONG_PORT: port.default(6000),
  HTTP_HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_PORT: port.default(8080),
  DATA_DIR: z.string().min(1).default('data'),
  WIN_SCORE: z.coerce.number().int().min(1).max(99).default(5),
  TICK_RATE: z.coerce.number().int().min(1).max(240).default(60),
  COURT_WIDTH: z.coerce.number().int().min(100).max(4000).default(640),
  COURT_HEIGHT: z.coerce.number().int().min(100).max(4000).default(480),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
})

export interface ServerConfig {
  tcp: { host: string; port: number }
  http: { host: string; port: number }
  dataDir: string
  winScore: number
  tickRate: number
  court: { width: number; height: number }
  logLevel: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }
  const e = parsed.data
  return {
    tcp: { host: e.PONG_HOST, port: e.PONG_PORT },
    http: { host: e.HTTP_HOST, port: e.HTTP_PORT },
    dataDir: path.resolve(process.cwd(), e.DATA_DIR),
    winScore: e.WIN_SCORE,
    tickRate: e.TICK_RATE,
    court: { width: e.COURT_WIDTH, height: e.COURT_HEIGHT },
    logLevel: e.LOG_LEVEL
  }
}
