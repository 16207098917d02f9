export type LogMeta = Record<string, unknown>

export interface Logger {
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, error?: unknown, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
}

function isDebugEnabled(): boolean {
  const flag = process.env.FLEETWISE_DEBUG
  return flag === '1' || flag === 'true'
}

export function createLogger(component: string): Logger {
  const prefix = (message: string) => `[${new Date().toISOString()}] [${component}] ${message}`

  return {
    info(message, meta) {
      if (meta) {
        console.log(prefix(message), meta)
        return
      }
      console.log(prefix(message))
    },
    warn(message, meta) {
      if (meta) {
        console.warn(prefix(message), meta)
        return
      }
      console.warn(prefix(message))
    },
    error(message, error, meta) {
      if (meta) {
        console.error(prefix(message), meta, error)
        return
      }
      if (error !== undefined) {
        console.error(prefix(message), error)
        return
      }
      console.error(prefix(message))
    },
    debug(message, meta) {
      if (!isDebugEnabled()) return
      if (meta) {
        console.debug(prefix(message), meta)
        return
      }
      console.debug(prefix(message))
    },
  }
}
