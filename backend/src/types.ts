/**
 * Type definitions for deferred mint backend services
 * @module types
 */

// Re-export lookup service types
export type {
  DeferredMintQuery,
  DeferredMintFilters,
  DeferredMintRecord,
  DeferredMintSyncCursor,
  DeferredMintLookupQuestion,
  DeferredMintLookupResult,
  DeferredMintStorage
} from './lookup-services/types.js'
export type { BackendConfig } from './config/loadBackendConfig.js'
