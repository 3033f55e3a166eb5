import { Collection, Db, Filter } from 'mongodb'
import type { PubKeyHex } from '@bsv/sdk'
import { GENESIS_HASH, createLogger, type Logger, type TokenId } from 'deferred-mint-core'
import type {
  DeferredMintFilters,
  DeferredMintRecord,
  DeferredMintStorage,
  DeferredMintSyncCursor
} from './types.js'

interface CursorDocument extends DeferredMintSyncCursor {
  _id: string
}

const CURSOR_ID = 'cursor'

/**
 * Storage manager for the deferred mint lookup service using MongoDB.
 */
export class DeferredMintStorageManager implements DeferredMintStorage {
  private readonly records: Collection<DeferredMintRecord>
  private readonly cursors: Collection<CursorDocument>
  private readonly logger: Logger

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db, logger?: Logger) {
    this.records = db.collection<DeferredMintRecord>('deferredMintTokens')
    this.cursors = db.collection<CursorDocument>('deferredMintSync')
    this.logger = logger ?? createLogger('DeferredMintStorageManager')

    const reportIndexFailure = (error: unknown): void => {
      this.logger.error('Failed to create index', error)
    }

    // One record per token
    this.records
      .createIndex({ tokenId: 1 }, { unique: true })
      .catch(reportIndexFailure)

    this.records
      .createIndex({ creator: 1 })
      .catch(reportIndexFailure)

    this.records
      .createIndex({ owner: 1 })
      .catch(reportIndexFailure)
  }

  /**
   * Insert a newly prepared token. A replay of the same token leaves the
   * stored record as it is.
   */
  async storePrepared (tokenId: TokenId, creator: PubKeyHex, descriptor: string, preparedAt: string): Promise<void> {
    const record: DeferredMintRecord = {
      tokenId,
      creator,
      descriptor,
      minted: false,
      preparedAt,
      updatedAt: preparedAt
    }
    await this.records.updateOne({ tokenId }, { $setOnInsert: record }, { upsert: true })
  }

  /**
   * Record the mint of a token to its first owner.
   */
  async markMinted (tokenId: TokenId, owner: PubKeyHex, at: string): Promise<void> {
    await this.records.updateOne(
      { tokenId },
      { $set: { minted: true, mintedTo: owner, owner, updatedAt: at } }
    )
  }

  async setOwner (tokenId: TokenId, owner: PubKeyHex, at: string): Promise<void> {
    await this.records.updateOne({ tokenId }, { $set: { owner, updatedAt: at } })
  }

  async setRoyalty (tokenId: TokenId, recipient: PubKeyHex, bps: number, at: string): Promise<void> {
    await this.records.updateOne(
      { tokenId },
      { $set: { royaltyRecipient: recipient, royaltyBps: bps, updatedAt: at } }
    )
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: DeferredMintFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<DeferredMintRecord[]> {
    const query: Filter<DeferredMintRecord> = {}

    if (filters.tokenId !== undefined) {
      query.tokenId = filters.tokenId
    }

    if (filters.creator !== undefined) {
      query.creator = filters.creator
    }

    if (filters.owner !== undefined) {
      query.owner = filters.owner
    }

    if (filters.minted !== undefined) {
      query.minted = filters.minted
    }

    return await this.findRecordWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<DeferredMintRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  /**
   * The last notification applied, or the start of the chain.
   */
  async getCursor (): Promise<DeferredMintSyncCursor> {
    const cursor = await this.cursors.findOne({ _id: CURSOR_ID })
    if (cursor === null) {
      return { sequence: 0, hash: GENESIS_HASH }
    }
    return { sequence: cursor.sequence, hash: cursor.hash }
  }

  async setCursor (cursor: DeferredMintSyncCursor): Promise<void> {
    await this.cursors.updateOne(
      { _id: CURSOR_ID },
      { $set: { sequence: cursor.sequence, hash: cursor.hash } },
      { upsert: true }
    )
  }

  /**
   * Helper function for querying from the database
   */
  private async findRecordWithQuery (
    query: Filter<DeferredMintRecord>,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<DeferredMintRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.records
      .find(query, { projection: { _id: 0 } })
      .sort({ tokenId: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
