/**
 * deferred-mint-backend - lookup service for the deferred mint ledger
 *
 * @packageDocumentation
 */

export { default as createDeferredMintLookupService, DeferredMintLookupService } from './lookup-services/DeferredMintLookupServiceFactory.js'
export type { DeferredMintLookupServiceOptions } from './lookup-services/DeferredMintLookupServiceFactory.js'
export { DeferredMintStorageManager } from './lookup-services/DeferredMintStorageManager.js'
export { default as deferredMintLookupDocs } from './docs/DeferredMintLookupDocs.js'
export { loadBackendConfig } from './config/loadBackendConfig.js'
export { connectLookupService } from './connectLookupService.js'
export type { ConnectedLookupService } from './connectLookupService.js'
export type * from './types.js'
