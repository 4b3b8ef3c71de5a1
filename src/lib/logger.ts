export type Logger = {
  info: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}

export const createLogger = (scope: string): Logger => ({
  info: (message, ...details) => console.log(`[${scope}] ${message}`, ...details),
  warn: (message, ...details) => console.warn(`[${scope}] ${message}`, ...details),
  error: (message, ...details) => console.error(`[${scope}] ${message}`, ...details),
})
