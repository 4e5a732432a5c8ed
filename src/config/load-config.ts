// ---------------------------------------------------------------------------
// Config loader — YAML file + environment overrides, validated and frozen
// ---------------------------------------------------------------------------

import { existsSync, readFileSync } from 'fs'
import { resolve } from 'path'
import { parse as parseYaml } from 'yaml'
import type { ZodError } from 'zod'
import { conductorConfigSchema, type ConductorConfig } from './config-schema'

export const DEFAULT_CONFIG_PATH = 'config/conductor.yaml'

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message)
    this.name = 'ConfigError'
  }
}

export interface LoadConfigOptions {
  /** Explicit file; otherwise CONDUCTOR_CONFIG, then config/conductor.yaml under cwd. */
  path?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
}

export function loadConfig(options: LoadConfigOptions = {}): ConductorConfig {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const path = resolve(cwd, options.path ?? env.CONDUCTOR_CONFIG ?? DEFAULT_CONFIG_PATH)

  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`)
  }

  let raw: unknown
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}`, [err instanceof Error ? err.message : String(err)])
  }

  return parseConfig(applyEnvOverrides(raw, env))
}

/** Validate an already-parsed document, apply defaults, and deep-freeze the result. */
export function parseConfig(raw: unknown): ConductorConfig {
  const result = conductorConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error))
  }
  return deepFreeze(result.data)
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

interface Override {
  variable: string
  path: [string, ...string[]]
  parse: (value: string) => unknown
}

const OVERRIDES: Override[] = [
  { variable: 'CONDUCTOR_GLOBAL_TIMEOUT_MS', path: ['orchestration', 'globalTimeoutMs'], parse: Number },
  { variable: 'CONDUCTOR_ATTEMPT_TIMEOUT_MS', path: ['orchestration', 'attemptTimeoutMs'], parse: Number },
  { variable: 'CONDUCTOR_RETRY_ATTEMPTS', path: ['orchestration', 'retry', 'maxAttempts'], parse: Number },
  { variable: 'CONDUCTOR_DB_PATH', path: ['storage', 'databasePath'], parse: String },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'], parse: String }
]

/** Copy of the document with any set override variables written in at their paths. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw
  const root: Record<string, unknown> = { ...raw }

  for (const { variable, path, parse } of OVERRIDES) {
    const value = env[variable]
    if (value === undefined || value === '') continue

    let node = root
    for (const key of path.slice(0, -1)) {
      const child = node[key]
      const copy: Record<string, unknown> = isRecord(child) ? { ...child } : {}
      node[key] = copy
      node = copy
    }
    node[path[path.length - 1]] = parse(value)
  }
  return root
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}
