/**
 * deferred-mint-core - Deferred Mint Token Ledger
 *
 * A registry of non-fungible tokens whose descriptors are prepared ahead of
 * time and minted implicitly on their first transfer.
 *
 * This library provides:
 * - Descriptor preparation with sequential ids and uniqueness checks
 * - Creator-controlled royalty terms
 * - Mint-on-first-transfer over a pluggable ownership ledger
 * - A hash-chained notification log and JSON checkpoints
 *
 * @example
 * ```typescript
 * import { DeferredMintLedger } from 'deferred-mint-core'
 *
 * const ledger = new DeferredMintLedger({ admin: adminKey })
 * const id = ledger.prepare(creatorKey, 'ipfs://descriptor-1')
 * ledger.transfer(creatorKey, creatorKey, buyerKey, id)
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { DeferredMintLedger } from './DeferredMintLedger.js'

// Components
export { SequentialIdAllocator } from './SequentialIdAllocator.js'
export { MetadataUniquenessIndex } from './MetadataUniquenessIndex.js'
export { TokenRegistry } from './TokenRegistry.js'
export type { TokenRegistryOptions } from './TokenRegistry.js'
export { RoyaltyLedger } from './RoyaltyLedger.js'
export { MintGate } from './MintGate.js'
export { InMemoryOwnershipLedger } from './OwnershipLedger.js'
export { BaseDescriptorStore } from './DescriptorStore.js'
export { SingleAdminGate } from './AdminGate.js'
export { NotificationLog } from './NotificationLog.js'
export { UndoJournal } from './UndoJournal.js'

// Types
export type {
  Identity,
  TokenId,
  Clock,
  Transactional,

  // Records
  TokenRecord,
  RoyaltyTerm,
  RoyaltyInfo,

  // Notifications
  PreparedNotification,
  MintedNotification,
  RoyaltySetNotification,
  TransferredNotification,
  ApprovedNotification,
  OperatorApprovedNotification,
  BaseDescriptorPathSetNotification,
  AdminTransferredNotification,
  NotificationBody,
  NotificationKind,
  NotificationStamp,
  LedgerNotification,
  NotificationListener,
  NotificationSink,
  NotificationSource,
  IntegrityReport,

  // Collaborators
  TransferRequest,
  PreTransferHook,
  TokenReceipt,
  TokenReceiver,
  OwnershipState,
  OwnershipLedger,
  OwnershipLedgerFactory,
  DescriptorStoreState,
  DescriptorStore,
  AdminGateState,
  AdminGate,

  // State and checkpoints
  RegistryState,
  RoyaltyState,
  LedgerState,
  DeferredMintCheckpoint,
  InvariantViolation,

  // Configuration
  DeferredMintConfig,
  ResolvedDeferredMintConfig
} from './types.js'

// Errors
export {
  DeferredMintError,
  isDeferredMintError,
  formatDeferredMintError
} from './errors.js'
export type { DeferredMintErrorCode } from './errors.js'

// Logging
export { createLogger, isLogLevel, resolveLogLevel } from './logging.js'
export type { Logger, LoggerOptions, LogLevel } from './logging.js'

// Constants
export {
  ZERO_IDENTITY,
  BPS_DENOMINATOR,
  MAX_ROYALTY_BPS,
  FIRST_TOKEN_ID,
  GENESIS_HASH,
  CHECKPOINT_VERSION,
  DEFERRED_MINT_LOOKUP_SERVICE,
  LOG_LEVEL_ENV
} from './constants.js'

// Utilities
export {
  isIdentity,
  assertIdentity,
  assertRecipient,
  isTokenId,
  assertTokenId,
  toSalePrice,
  stableStringify,
  sha256Hex
} from './utils.js'
