/**
 * Deferred Mint Type Definitions
 *
 * Records, notifications, collaborator interfaces and configuration for the
 * deferred mint ledger.
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { Logger, LogLevel } from './logging.js'
import type { UndoJournal } from './UndoJournal.js'

// ---------------------------------------------------------------------------
// Primitive Types
// ---------------------------------------------------------------------------

/** An identity key (compressed public key, hex) */
export type Identity = PubKeyHex

/** A token id issued by the allocator (positive integer) */
export type TokenId = number

/** Returns the current time as an ISO-8601 string */
export type Clock = () => string

/**
 * A component whose state can be captured before an operation and put back
 * if the operation fails.
 */
export interface Transactional<S> {
  snapshot: () => S
  restore: (state: S) => void
}

// ---------------------------------------------------------------------------
// Token Records
// ---------------------------------------------------------------------------

/**
 * A prepared token as recorded by the registry.
 *
 * `mintedTo` is the owner of record at the instant of mint. After mint the
 * ownership ledger is authoritative for the current owner.
 */
export interface TokenRecord {
  id: TokenId
  creator: Identity
  descriptor: string
  descriptorHash: string
  minted: boolean
  mintedTo?: Identity
  preparedAt: string
  mintedAt?: string
}

/** Royalty terms for a token */
export interface RoyaltyTerm {
  recipient: Identity
  /** Basis points of the sale price, 0–10000 */
  bps: number
}

/** Result of a royalty query */
export interface RoyaltyInfo {
  recipient: Identity
  amount: bigint
}

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export interface PreparedNotification {
  kind: 'Prepared'
  tokenId: TokenId
  creator: Identity
  descriptor: string
}

export interface MintedNotification {
  kind: 'Minted'
  tokenId: TokenId
  owner: Identity
}

export interface RoyaltySetNotification {
  kind: 'RoyaltySet'
  tokenId: TokenId
  recipient: Identity
  bps: number
}

export interface TransferredNotification {
  kind: 'Transferred'
  tokenId: TokenId
  from: Identity
  to: Identity
  operator: Identity
}

export interface ApprovedNotification {
  kind: 'Approved'
  tokenId: TokenId
  owner: Identity
  approved: Identity
}

export interface OperatorApprovedNotification {
  kind: 'OperatorApproved'
  owner: Identity
  operator: Identity
  approved: boolean
}

export interface BaseDescriptorPathSetNotification {
  kind: 'BaseDescriptorPathSet'
  path: string
}

export interface AdminTransferredNotification {
  kind: 'AdminTransferred'
  previous: Identity
  next: Identity
}

/** The body of a notification, before the log stamps it */
export type NotificationBody =
  | PreparedNotification
  | MintedNotification
  | RoyaltySetNotification
  | TransferredNotification
  | ApprovedNotification
  | OperatorApprovedNotification
  | BaseDescriptorPathSetNotification
  | AdminTransferredNotification

export type NotificationKind = NotificationBody['kind']

/** Fields the notification log adds to every entry */
export interface NotificationStamp {
  sequence: number
  timestamp: string
  prevHash: string
  hash: string
}

/** A committed, hash-chained notification */
export type LedgerNotification = NotificationBody & NotificationStamp

/** Receives notifications after the operation that produced them commits */
export type NotificationListener = (notification: LedgerNotification) => void

/** Anything that can append a notification */
export interface NotificationSink {
  append: (body: NotificationBody) => LedgerNotification
}

/** Anything that can list committed notifications in sequence order */
export interface NotificationSource {
  notifications: (sinceSequence?: number) => LedgerNotification[]
}

export interface IntegrityReport {
  ok: boolean
  errors: string[]
}

// ---------------------------------------------------------------------------
// Ownership Ledger
// ---------------------------------------------------------------------------

/** A transfer about to be applied by the ownership ledger */
export interface TransferRequest {
  tokenId: TokenId
  from: Identity
  to: Identity
  operator: Identity
}

/** Runs before the ownership ledger checks and applies a transfer */
export type PreTransferHook = (request: TransferRequest) => void

/** Arguments passed to a programmable recipient */
export interface TokenReceipt {
  operator: Identity
  from: Identity
  tokenId: TokenId
  data?: string
}

/**
 * A programmable recipient. Called after the ownership change has been
 * applied; must return `true` to accept the token.
 */
export interface TokenReceiver {
  onTokenReceived: (receipt: TokenReceipt) => boolean
}

/** Plain, JSON-serialisable ownership state */
export interface OwnershipState {
  owners: Record<string, Identity>
  balances: Record<string, number>
  tokenApprovals: Record<string, Identity>
  operatorApprovals: Record<string, Identity[]>
}

/**
 * Standard "who owns token X" bookkeeping and its transfer-authorization
 * rules.
 *
 * Implementations must record the inverse of every write in the journal
 * they are built with; the ledger relies on it to roll back a failed
 * operation.
 */
export interface OwnershipLedger extends Transactional<OwnershipState> {
  exists: (tokenId: TokenId) => boolean
  ownerOf: (tokenId: TokenId) => Identity
  balanceOf: (owner: Identity) => number
  mint: (owner: Identity, tokenId: TokenId) => void
  transfer: (caller: Identity, from: Identity, to: Identity, tokenId: TokenId, data?: string) => void
  approve: (caller: Identity, approved: Identity, tokenId: TokenId) => void
  setApprovalForAll: (caller: Identity, operator: Identity, approved: boolean) => void
  getApproved: (tokenId: TokenId) => Identity
  isApprovedForAll: (owner: Identity, operator: Identity) => boolean
  onBeforeTransfer: (hook: PreTransferHook) => () => void
  registerReceiver: (identity: Identity, receiver: TokenReceiver) => void
  unregisterReceiver: (identity: Identity) => void
}

/** Creates an ownership ledger that appends to the given sink and records undo entries in the journal */
export type OwnershipLedgerFactory = (notifications: NotificationSink, journal: UndoJournal) => OwnershipLedger

// ---------------------------------------------------------------------------
// Descriptor Store and Admin Gate
// ---------------------------------------------------------------------------

export interface DescriptorStoreState {
  basePath: string
}

/** Resolves a stored descriptor against the configured base path */
export interface DescriptorStore extends Transactional<DescriptorStoreState> {
  basePath: () => string
  setBasePath: (path: string) => void
  resolve: (descriptor: string) => string
}

export interface AdminGateState {
  admin: Identity
}

/** Decides who may perform administrative operations */
export interface AdminGate extends Transactional<AdminGateState> {
  admin: () => Identity
  assertAdmin: (caller: Identity) => void
  transferAdmin: (caller: Identity, next: Identity) => void
}

// ---------------------------------------------------------------------------
// Registry and Royalty State
// ---------------------------------------------------------------------------

export interface RegistryState {
  lastIssuedId: TokenId
  descriptorIndex: Record<string, TokenId>
  tokens: TokenRecord[]
}

export interface RoyaltyState {
  terms: Record<string, RoyaltyTerm>
}

// ---------------------------------------------------------------------------
// Ledger State and Checkpoints
// ---------------------------------------------------------------------------

/** Everything the facade captures before an operation */
export interface LedgerState {
  registry: RegistryState
  royalties: RoyaltyState
  ownership: OwnershipState
  descriptors: DescriptorStoreState
  admin: AdminGateState
}

/** A persisted ledger: state plus the full notification log */
export interface DeferredMintCheckpoint {
  version: string
  savedAt: string
  state: LedgerState
  notifications: LedgerNotification[]
}

/** A broken invariant reported by `auditInvariants` */
export interface InvariantViolation {
  invariant: 'id-sequence' | 'descriptor-uniqueness' | 'mint-ownership'
  message: string
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Deferred mint ledger configuration
 */
export interface DeferredMintConfig {
  /** Identity allowed to change the base descriptor path */
  admin: Identity
  /** Base path prepended to descriptors by tokenURI (default: '') */
  baseDescriptorPath?: string
  /** Clock used to timestamp records and notifications (default: system time) */
  clock?: Clock
  /** Logger (default: createLogger('DeferredMintLedger', { level: logLevel })) */
  logger?: Logger
  /** Level for the default logger (default: DEFERRED_MINT_LOG_LEVEL or 'info') */
  logLevel?: LogLevel
  /**
   * Builds the ownership ledger collaborator around the ledger's notification
   * log and undo journal (default: InMemoryOwnershipLedger)
   */
  ownership?: OwnershipLedgerFactory
  /** Descriptor store collaborator (default: BaseDescriptorStore) */
  descriptors?: DescriptorStore
  /** Admin gate collaborator (default: SingleAdminGate for `admin`) */
  adminGate?: AdminGate
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedDeferredMintConfig {
  admin: Identity
  baseDescriptorPath: string
  clock: Clock
  logger: Logger
  ownership: OwnershipLedgerFactory
  descriptors: DescriptorStore
  adminGate: AdminGate
}
