// ---------------------------------------------------------------------------
// Logger — pino root logger with per-component children
// ---------------------------------------------------------------------------

import pino, { stdTimeFunctions } from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

export type { Logger }

function defaultLevel(): LevelWithSilent {
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLevel(fromEnv)) return fromEnv
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info'
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((l) => l === value)
}

const root: Logger = pino({
  name: 'model-conductor',
  level: defaultLevel(),
  timestamp: stdTimeFunctions.isoTime,
  base: { pid: process.pid },
  redact: {
    paths: ['apiKey', '*.apiKey', 'authorization', '*.authorization', 'credential.value'],
    censor: '[REDACTED]'
  }
})

// pino children copy the level at creation, so setLogLevel walks them too.
// One child per component keeps this bounded however many instances ask.
const children = new Map<string, Logger>()

/** Child logger tagged with the component name (e.g. "orchestrator"). */
export function createLogger(component: string): Logger {
  const existing = children.get(component)
  if (existing) return existing
  const child = root.child({ component })
  children.set(component, child)
  return child
}

/** Change the level of the root and of every component logger. Unknown levels are ignored. */
export function setLogLevel(level: string): void {
  if (!isLevel(level)) return
  root.level = level
  for (const child of children.values()) child.level = level
}
