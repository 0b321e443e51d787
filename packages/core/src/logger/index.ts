import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/tool-config.js'

export type { Logger } from 'pino'

/** stdout carries command output, so logs always go to stderr (fd 2). */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty = config.pretty && config.level !== 'silent'

  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    })
  }
  return pino({ level: config.level }, pino.destination(2))
}
