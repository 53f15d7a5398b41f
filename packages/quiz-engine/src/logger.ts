import { Logger, type ILogObj } from 'tslog'

// tslog numeric levels
const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
}

export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const level = env.LOG_LEVEL?.trim().toLowerCase()
  if (level && level in LOG_LEVELS) {
    return LOG_LEVELS[level]
  }
  return env.NODE_ENV === 'production' ? LOG_LEVELS.info : LOG_LEVELS.debug
}

export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): 'json' | 'pretty' {
  if (env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'pretty') {
    return env.LOG_FORMAT
  }
  return env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export const logger: Logger<ILogObj> = new Logger({
  name: 'quiz-engine',
  minLevel: resolveMinLevel(),
  type: resolveLogFormat(),
  hideLogPositionForProduction: true,
})

/**
 * Child logger tagged with the module it logs for, e.g. `quiz-engine:generator`.
 */
export function moduleLogger(module: string): Logger<ILogObj> {
  return logger.getSubLogger({ name: module })
}
