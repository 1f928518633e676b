type Level = 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLevel(v: string | undefined): v is Level {
  return v !== undefined && v in LEVELS
}

const configured = import.meta.env.VITE_LOG_LEVEL
const threshold = LEVELS[isLevel(configured) ? configured : 'info']

function enabled(level: Level): boolean {
  return LEVELS[level] >= threshold
}

// Console sink with a level floor set by VITE_LOG_LEVEL (default info)
export const log = {
  debug: (...a: unknown[]): void => {
    if (enabled('debug')) console.debug('[debug]', ...a)
  },
  info: (...a: unknown[]): void => {
    if (enabled('info')) console.log('[info]', ...a)
  },
  warn: (...a: unknown[]): void => {
    if (enabled('warn')) console.warn('[warn]', ...a)
  },
  error: (...a: unknown[]): void => {
    if (enabled('error')) console.error('[err]', ...a)
  },
}
