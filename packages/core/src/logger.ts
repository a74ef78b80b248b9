import { pino, type BaseLogger } from 'pino'

export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>

export const defaultLogger: Logger = pino({
  name: 'dephealth-core',
  level: process.env.LOG_LEVEL ?? 'info'
})
