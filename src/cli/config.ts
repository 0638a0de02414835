/**
 * User configuration: a YAML file validated against a schema and reloaded
 * whenever it changes on disk. A file that fails to load never replaces the
 * configuration already in effect.
 */

import { promises as fsp, watch as fsWatch } from 'fs'
import * as path from 'path'
import { parse, stringify } from 'yaml'
import { z } from 'zod'
import { DelayTimer } from '@/core/delayTimer'
import { ConfigError, errorMessage } from '@/helpers/errors'
import { createLogger } from '@/helpers/logger'
import { emojify } from './shared'

const logger = createLogger('config')

// ==================== Schema ====================

export const DEFAULT_REACTIONS = ['❤️', '👍', '👎', '😂', '‼️', '❓️']

// Longest delay setTimeout can hold, in whole seconds
const MAX_BLUR_DELAY = 2_147_483

export const configSchema = z
  .object({
    reactions: z.array(z.string().min(1)).default(DEFAULT_REACTIONS),
    muted: z.array(z.string()).default([]),
    clear_vim: z.boolean().default(false),
    blur_delay: z.number().int().max(MAX_BLUR_DELAY).default(0), // seconds
    max_events: z.number().int().default(8192),
    search_depth: z.number().int().default(-1),
    search_order: z.enum(['newest', 'oldest']).default('newest'),
  })
  .strict()

export type AppConfig = z.infer<typeof configSchema>

export const DEFAULT_CONFIG: AppConfig = configSchema.parse({})

// ==================== Loading ====================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Parse and validate config text
 */
export function parseConfig(raw: string, filePath: string): AppConfig {
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`, filePath, { cause: error })
  }

  const result = configSchema.safeParse(parsed ?? {})
  if (!result.success) {
    throw new ConfigError(`Invalid config at ${filePath}: ${formatIssues(result.error)}`, filePath, {
      cause: result.error,
    })
  }

  return { ...result.data, reactions: result.data.reactions.map((r) => emojify(r)) }
}

/**
 * Read the config file, writing the defaults first when it does not exist
 */
export async function loadConfig(filePath: string): Promise<AppConfig> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      await writeDefaultConfig(filePath)
      return DEFAULT_CONFIG
    }
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error })
  }
  return parseConfig(raw, filePath)
}

async function writeDefaultConfig(filePath: string): Promise<void> {
  try {
    await fsp.mkdir(path.dirname(filePath), { recursive: true })
    await fsp.writeFile(filePath, stringify(DEFAULT_CONFIG), 'utf8')
  } catch (error) {
    logger.warn(`Could not write default config to ${filePath}: ${errorMessage(error)}`)
  }
}

// ==================== Watcher ====================

export type WatchFn = (
  directory: string,
  listener: (filename: string | null) => void
) => { close(): void }

const nodeWatch: WatchFn = (directory, listener) => {
  const watcher = fsWatch(directory, (_event, filename) => listener(filename))
  watcher.on('error', (error) => logger.error(`Watching ${directory} failed`, error))
  return watcher
}

export interface ConfigWatcherOptions {
  onChange: (config: AppConfig) => void
  onError: (error: ConfigError) => void
  debounceMs?: number
  watch?: WatchFn
}

export class ConfigWatcher {
  private _current: AppConfig = DEFAULT_CONFIG
  private watcher: { close(): void } | null = null
  private readonly debounce: DelayTimer

  constructor(
    readonly filePath: string,
    private readonly options: ConfigWatcherOptions
  ) {
    this.debounce = new DelayTimer(options.debounceMs ?? 200, () => {
      this.reload().catch((error) => logger.error('Config reload failed', error))
    })
  }

  get current(): AppConfig {
    return this._current
  }

  /**
   * Load once, then watch the file's directory for changes
   */
  async start(): Promise<AppConfig> {
    await this.reload()
    const watch = this.options.watch ?? nodeWatch
    const base = path.basename(this.filePath)
    try {
      this.watcher = watch(path.dirname(this.filePath), (filename) => {
        if (filename === null || filename === base) this.debounce.record()
      })
    } catch (error) {
      logger.warn(`Config hot-reload disabled: ${errorMessage(error)}`)
    }
    return this._current
  }

  /**
   * Re-read the file. On failure the current config stays and onError is told.
   */
  async reload(): Promise<boolean> {
    try {
      this._current = await loadConfig(this.filePath)
    } catch (error) {
      const configError =
        error instanceof ConfigError
          ? error
          : new ConfigError(errorMessage(error), this.filePath, { cause: error })
      logger.warn(configError.message)
      this.options.onError(configError)
      return false
    }
    logger.info(`Loaded ${this.filePath}`)
    this.options.onChange(this._current)
    return true
  }

  stop(): void {
    this.debounce.cancel()
    this.watcher?.close()
    this.watcher = null
  }
}
