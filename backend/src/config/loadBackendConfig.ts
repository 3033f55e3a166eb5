/**
 * Backend configuration
 */

import { LOG_LEVEL_ENV, resolveLogLevel, type LogLevel } from 'deferred-mint-core'

export interface BackendConfig {
  mongoUrl: string
  dbName: string
  lookupLimit: number
  logLevel: LogLevel
}

const DEFAULT_CONFIG: BackendConfig = {
  mongoUrl: 'mongodb://localhost:27017',
  dbName: 'deferred_mint',
  lookupLimit: 50,
  logLevel: 'info'
}

/**
 * Read backend settings from the environment, falling back to defaults.
 *
 * @throws Error when DEFERRED_MINT_LOOKUP_LIMIT is not a positive integer
 */
export function loadBackendConfig (env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const config: BackendConfig = { ...DEFAULT_CONFIG }

  if (env.DEFERRED_MINT_MONGO_URL) config.mongoUrl = env.DEFERRED_MINT_MONGO_URL
  if (env.DEFERRED_MINT_DB) config.dbName = env.DEFERRED_MINT_DB
  if (env.DEFERRED_MINT_LOOKUP_LIMIT) {
    const limit = Number(env.DEFERRED_MINT_LOOKUP_LIMIT)
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`DEFERRED_MINT_LOOKUP_LIMIT must be a positive integer: ${env.DEFERRED_MINT_LOOKUP_LIMIT}`)
    }
    config.lookupLimit = limit
  }
  config.logLevel = resolveLogLevel(env[LOG_LEVEL_ENV], DEFAULT_CONFIG.logLevel)

  return config
}
