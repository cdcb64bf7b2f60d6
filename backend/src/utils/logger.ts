import pino, { type Logger } from 'pino'

export type { Logger }

export const createLogger = (level: string = process.env.LOG_LEVEL ?? 'info'): Logger =>
  pino({ level, base: { service: 'pong-arena' } })

const logger = createLogger()

export default logger
