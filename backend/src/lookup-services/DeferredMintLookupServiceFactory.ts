import { Db } from 'mongodb'
import {
  DEFERRED_MINT_LOOKUP_SERVICE,
  createLogger,
  isIdentity,
  isTokenId,
  type LedgerNotification,
  type Logger,
  type NotificationSource
} from 'deferred-mint-core'
import { DeferredMintStorageManager } from './DeferredMintStorageManager.js'
import type {
  DeferredMintLookupQuestion,
  DeferredMintLookupResult,
  DeferredMintQuery,
  DeferredMintRecord,
  DeferredMintStorage
} from './types.js'
import docs from '../docs/DeferredMintLookupDocs.js'

export interface DeferredMintLookupServiceOptions {
  /** Page size when a query gives no limit, and the largest limit accepted (default: 50) */
  lookupLimit?: number
  logger?: Logger
}

function readField (source: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key) ? Reflect.get(source, key) : undefined
}

/**
 * Indexes committed ledger notifications and answers token lookups
 * @public
 */
class DeferredMintLookupService {
  private readonly lookupLimit: number
  private readonly logger: Logger

  constructor (public storageManager: DeferredMintStorage, options: DeferredMintLookupServiceOptions = {}) {
    this.lookupLimit = options.lookupLimit ?? 50
    this.logger = options.logger ?? createLogger('DeferredMintLookupService')
  }

  /**
   * Apply one committed notification to storage.
   *
   * Notifications must arrive in sequence and extend the stored chain;
   * ones already applied are skipped.
   */
  async notificationCommitted (notification: LedgerNotification): Promise<void> {
    const cursor = await this.storageManager.getCursor()
    if (notification.sequence <= cursor.sequence) {
      this.logger.debug(`Skipping notification #${notification.sequence}, already applied`)
      return
    }
    if (notification.sequence !== cursor.sequence + 1) {
      throw new Error(`Expected notification #${cursor.sequence + 1}, got #${notification.sequence}`)
    }
    if (notification.prevHash !== cursor.hash) {
      throw new Error(`Notification #${notification.sequence} does not extend the synced chain`)
    }

    try {
      switch (notification.kind) {
        case 'Prepared':
          await this.storageManager.storePrepared(
            notification.tokenId,
            notification.creator,
            notification.descriptor,
            notification.timestamp
          )
          break
        case 'Minted':
          await this.storageManager.markMinted(notification.tokenId, notification.owner, notification.timestamp)
          break
        case 'Transferred':
          await this.storageManager.setOwner(notification.tokenId, notification.to, notification.timestamp)
          break
        case 'RoyaltySet':
          await this.storageManager.setRoyalty(
            notification.tokenId,
            notification.recipient,
            notification.bps,
            notification.timestamp
          )
          break
        default:
          break
      }

      await this.storageManager.setCursor({ sequence: notification.sequence, hash: notification.hash })
    } catch (error) {
      this.logger.error(`Error processing notification #${notification.sequence}:`, error)
      throw error
    }
  }

  /**
   * Apply every notification after the stored cursor, oldest first.
   *
   * @returns The number of notifications applied
   */
  async syncFrom (source: NotificationSource): Promise<number> {
    const cursor = await this.storageManager.getCursor()
    const pending = source.notifications(cursor.sequence)

    for (const notification of pending) {
      await this.notificationCommitted(notification)
    }

    if (pending.length > 0) {
      this.logger.info(`Synced ${pending.length} notifications up to #${pending[pending.length - 1].sequence}`)
    }
    return pending.length
  }

  async lookup (question: DeferredMintLookupQuestion): Promise<DeferredMintLookupResult[]> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== DEFERRED_MINT_LOOKUP_SERVICE) {
      throw new Error('Lookup service not supported')
    }

    const query = this.parseQuery(question.query)
    const limit = Math.min(query.limit ?? this.lookupLimit, this.lookupLimit)

    // Check if we have any filters to apply
    const hasFilters = query.tokenId !== undefined ||
      query.creator !== undefined ||
      query.owner !== undefined ||
      query.minted !== undefined

    let results: DeferredMintRecord[]

    if (hasFilters) {
      results = await this.storageManager.findWithFilters(
        {
          tokenId: query.tokenId,
          creator: query.creator,
          owner: query.owner,
          minted: query.minted
        },
        limit,
        query.skip,
        query.sortOrder
      )
    } else {
      results = await this.storageManager.findAllRecords(limit, query.skip, query.sortOrder)
    }

    return results.map((record) => this.toResult(record))
  }

  async getDocumentation (): Promise<string> {
    return docs
  }

  async getMetaData (): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'Deferred Mint Lookup Service',
      shortDescription: 'Find prepared and minted tokens by id, creator, owner or mint state.'
    }
  }

  private parseQuery (value: unknown): DeferredMintQuery {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new Error('A valid query must be provided')
    }

    const query: DeferredMintQuery = {}

    const tokenId = readField(value, 'tokenId')
    if (tokenId !== undefined) {
      if (!isTokenId(tokenId)) throw new Error('Invalid query: tokenId must be a positive integer')
      query.tokenId = tokenId
    }

    for (const key of ['creator', 'owner'] as const) {
      const identity = readField(value, key)
      if (identity !== undefined) {
        if (!isIdentity(identity)) throw new Error(`Invalid query: ${key} must be an identity key`)
        query[key] = identity
      }
    }

    const minted = readField(value, 'minted')
    if (minted !== undefined) {
      if (typeof minted !== 'boolean') throw new Error('Invalid query: minted must be a boolean')
      query.minted = minted
    }

    const limit = readField(value, 'limit')
    if (limit !== undefined) {
      if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1) {
        throw new Error('Invalid query: limit must be a positive integer')
      }
      query.limit = limit
    }

    const skip = readField(value, 'skip')
    if (skip !== undefined) {
      if (typeof skip !== 'number' || !Number.isInteger(skip) || skip < 0) {
        throw new Error('Invalid query: skip must be a non-negative integer')
      }
      query.skip = skip
    }

    const sortOrder = readField(value, 'sortOrder')
    if (sortOrder !== undefined) {
      if (sortOrder !== 'asc' && sortOrder !== 'desc') {
        throw new Error('Invalid query: sortOrder must be asc or desc')
      }
      query.sortOrder = sortOrder
    }

    return query
  }

  private toResult (record: DeferredMintRecord): DeferredMintLookupResult {
    const result: DeferredMintLookupResult = {
      tokenId: record.tokenId,
      creator: record.creator,
      descriptor: record.descriptor,
      minted: record.minted
    }
    if (record.owner !== undefined) {
      result.owner = record.owner
    }
    if (record.royaltyRecipient !== undefined && record.royaltyBps !== undefined) {
      result.royalty = { recipient: record.royaltyRecipient, bps: record.royaltyBps }
    }
    return result
  }
}

// Factory function
export default (db: Db, options?: DeferredMintLookupServiceOptions): DeferredMintLookupService => {
  return new DeferredMintLookupService(new DeferredMintStorageManager(db, options?.logger), options)
}

export { DeferredMintLookupService }
