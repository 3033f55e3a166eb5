import { MongoClient } from 'mongodb'
import { createLogger } from 'deferred-mint-core'
import type { BackendConfig } from './config/loadBackendConfig.js'
import createLookupService, { DeferredMintLookupService } from './lookup-services/DeferredMintLookupServiceFactory.js'

export interface ConnectedLookupService {
  service: DeferredMintLookupService
  close: () => Promise<void>
}

/**
 * Open a MongoDB connection and build a lookup service on it.
 */
export async function connectLookupService (config: BackendConfig): Promise<ConnectedLookupService> {
  const logger = createLogger('DeferredMintBackend', { level: config.logLevel })
  const client = new MongoClient(config.mongoUrl)

  try {
    await client.connect()
  } catch (error) {
    logger.error(`Failed to connect to ${config.dbName}`, error)
    throw error
  }
  logger.info(`Connected to database ${config.dbName}`)

  const service = createLookupService(client.db(config.dbName), {
    lookupLimit: config.lookupLimit,
    logger: createLogger('DeferredMintLookupService', { level: config.logLevel })
  })

  return {
    service,
    close: async () => {
      await client.close()
    }
  }
}
