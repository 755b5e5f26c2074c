import { env } from './env'

export interface Logger {
  debug(...args: unknown[]): void
}

// Debug output goes to the console, and only when BITPACK_DEBUG is set.
export function createLogger(scope: string, enabled: () => boolean = () => env.debug): Logger {
  const prefix = `[${scope}]`
  return {
    debug(...args: unknown[]) {
      if (enabled()) console.debug(prefix, ...args)
    },
  }
}
