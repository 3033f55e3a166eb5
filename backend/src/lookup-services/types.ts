import type { PubKeyHex } from '@bsv/sdk'
import type { TokenId } from 'deferred-mint-core'

/**
 * Query parameters for deferred mint token lookups
 */
export interface DeferredMintQuery {
  tokenId?: TokenId
  creator?: PubKeyHex
  owner?: PubKeyHex
  minted?: boolean
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * Filters accepted by the storage layer
 */
export interface DeferredMintFilters {
  tokenId?: TokenId
  creator?: PubKeyHex
  owner?: PubKeyHex
  minted?: boolean
}

/**
 * A token as stored in the lookup database
 */
export interface DeferredMintRecord {
  tokenId: TokenId
  creator: PubKeyHex
  descriptor: string
  minted: boolean
  mintedTo?: PubKeyHex
  owner?: PubKeyHex
  royaltyRecipient?: PubKeyHex
  royaltyBps?: number
  preparedAt: string
  updatedAt: string
}

/**
 * Position of the last notification applied to storage
 */
export interface DeferredMintSyncCursor {
  sequence: number
  hash: string
}

/**
 * A lookup question addressed to the service
 */
export interface DeferredMintLookupQuestion {
  service: string
  query: unknown
}

/**
 * A token returned by a lookup
 */
export interface DeferredMintLookupResult {
  tokenId: TokenId
  creator: PubKeyHex
  descriptor: string
  minted: boolean
  owner?: PubKeyHex
  royalty?: {
    recipient: PubKeyHex
    bps: number
  }
}

/**
 * Persistence used by the lookup service
 */
export interface DeferredMintStorage {
  storePrepared: (tokenId: TokenId, creator: PubKeyHex, descriptor: string, preparedAt: string) => Promise<void>
  markMinted: (tokenId: TokenId, owner: PubKeyHex, at: string) => Promise<void>
  setOwner: (tokenId: TokenId, owner: PubKeyHex, at: string) => Promise<void>
  setRoyalty: (tokenId: TokenId, recipient: PubKeyHex, bps: number, at: string) => Promise<void>
  findWithFilters: (
    filters: DeferredMintFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ) => Promise<DeferredMintRecord[]>
  findAllRecords: (limit?: number, skip?: number, sortOrder?: 'asc' | 'desc') => Promise<DeferredMintRecord[]>
  getCursor: () => Promise<DeferredMintSyncCursor>
  setCursor: (cursor: DeferredMintSyncCursor) => Promise<void>
}
