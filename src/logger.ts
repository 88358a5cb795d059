import pino, { Logger } from 'pino'

export type { Logger }

export function createLogger(name = 'dcb-client'): Logger {
  return pino({ name, level: process.env.DCB_LOG_LEVEL ?? 'info' })
}
