/**
 * Deferred Mint Ledger
 *
 * Public surface of the deferred mint ledger. Creators prepare token
 * descriptors ahead of time; each token is minted implicitly on its first
 * transfer, with the transfer's source as the owner of record.
 */

import { SingleAdminGate } from './AdminGate.js'
import { CHECKPOINT_VERSION } from './constants.js'
import { BaseDescriptorStore } from './DescriptorStore.js'
import { DeferredMintError, formatDeferredMintError, isDeferredMintError } from './errors.js'
import { createLogger, type Logger } from './logging.js'
import { MetadataUniquenessIndex } from './MetadataUniquenessIndex.js'
import { MintGate } from './MintGate.js'
import { NotificationLog } from './NotificationLog.js'
import { InMemoryOwnershipLedger } from './OwnershipLedger.js'
import { RoyaltyLedger } from './RoyaltyLedger.js'
import { TokenRegistry } from './TokenRegistry.js'
import { UndoJournal } from './UndoJournal.js'
import type {
  AdminGate,
  DeferredMintCheckpoint,
  DeferredMintConfig,
  DescriptorStore,
  Identity,
  IntegrityReport,
  InvariantViolation,
  LedgerNotification,
  LedgerState,
  NotificationListener,
  OwnershipLedger,
  ResolvedDeferredMintConfig,
  RoyaltyInfo,
  TokenId,
  TokenReceiver,
  TokenRecord
} from './types.js'

/**
 * Deferred mint ledger
 *
 * @example
 * ```typescript
 * const ledger = new DeferredMintLedger({ admin: adminKey })
 *
 * // Prepare a token; nothing is owned yet
 * const id = ledger.prepare(creatorKey, 'ipfs://descriptor-1')
 * ledger.setRoyalty(creatorKey, id, creatorKey, 500)
 *
 * // The first transfer mints to the creator and hands the token to a buyer
 * ledger.transfer(creatorKey, creatorKey, buyerKey, id)
 * ledger.isMinted(id) // true
 * ledger.royaltyInfo(id, 10000n) // { recipient: creatorKey, amount: 500n }
 * ```
 */
export class DeferredMintLedger {
  private config: ResolvedDeferredMintConfig
  private readonly logger: Logger
  private readonly journal = new UndoJournal()
  private readonly log: NotificationLog
  private readonly registry: TokenRegistry
  private readonly royalties: RoyaltyLedger
  private readonly ownership: OwnershipLedger
  private readonly descriptors: DescriptorStore
  private readonly adminGate: AdminGate
  private readonly gate: MintGate
  private readonly listeners = new Set<NotificationListener>()
  private depth = 0
  private dispatchedSequence: number

  /**
   * @param config - Ledger configuration
   * @param notifications - Notification log to continue from (used when restoring a checkpoint)
   */
  constructor(config: DeferredMintConfig, notifications: LedgerNotification[] = []) {
    this.config = this.resolveConfig(config)
    this.logger = this.config.logger
    this.log = new NotificationLog(this.config.clock, notifications, this.journal)
    this.dispatchedSequence = this.log.latestSequence()

    this.registry = new TokenRegistry({ notifications: this.log, clock: this.config.clock, journal: this.journal })
    this.royalties = new RoyaltyLedger(this.registry, this.log, this.journal)
    this.ownership = this.config.ownership(this.log, this.journal)
    this.descriptors = this.config.descriptors
    this.adminGate = this.config.adminGate
    this.gate = new MintGate(this.registry, this.ownership, this.journal)
  }

  /**
   * Rebuild a ledger from an exported checkpoint.
   *
   * @throws DeferredMintError InvalidCheckpoint if the version is unknown, the
   * notification chain has been altered, or the restored state breaks an
   * invariant
   */
  static fromCheckpoint(checkpoint: DeferredMintCheckpoint, config: DeferredMintConfig): DeferredMintLedger {
    if (checkpoint.version !== CHECKPOINT_VERSION) {
      throw new DeferredMintError('InvalidCheckpoint', `unsupported checkpoint version: ${String(checkpoint.version)}`)
    }
    if (!Array.isArray(checkpoint.notifications)) {
      throw new DeferredMintError('InvalidCheckpoint', 'checkpoint has no notification log')
    }

    const ledger = new DeferredMintLedger(config, checkpoint.notifications)
    const integrity = ledger.verifyNotificationIntegrity()
    if (!integrity.ok) {
      throw new DeferredMintError('InvalidCheckpoint', 'checkpoint notification log failed verification', {
        errors: integrity.errors
      })
    }

    try {
      ledger.restoreState(checkpoint.state)
    } catch (error) {
      throw new DeferredMintError('InvalidCheckpoint', `checkpoint state could not be restored: ${formatDeferredMintError(error)}`)
    }

    const violations = ledger.auditInvariants()
    if (violations.length > 0) {
      throw new DeferredMintError('InvalidCheckpoint', 'checkpoint state breaks ledger invariants', { violations })
    }
    ledger.logger.info(`Restored ${ledger.registry.count()} tokens and ${ledger.log.latestSequence()} notifications`)
    return ledger
  }

  // ---------------------------------------------------------------------------
  // Preparation and Royalties
  // ---------------------------------------------------------------------------

  /**
   * Register a token descriptor. The caller becomes the token's creator.
   *
   * @param caller - Authenticated invoker
   * @param descriptor - Non-empty metadata pointer, unique across the ledger
   * @returns The new token id
   * @throws DeferredMintError EmptyDescriptor, DuplicateMetadata, InvalidIdentity
   */
  prepare(caller: Identity, descriptor: string): TokenId {
    return this.execute('prepare', () => this.registry.prepare(caller, descriptor))
  }

  /**
   * Set or replace the royalty terms of a token. Only its creator may do so.
   *
   * @param bps - Basis points, 0–10000
   * @throws DeferredMintError UnknownToken, Unauthorized, RoyaltyTooHigh, InvalidRecipient, InvalidArgument
   */
  setRoyalty(caller: Identity, tokenId: TokenId, recipient: Identity, bps: number): void {
    this.execute('setRoyalty', () => this.royalties.setRoyalty(caller, tokenId, recipient, bps))
  }

  /**
   * Royalty owed on a sale at `salePrice`. Tokens without terms report the
   * zero identity and a zero amount.
   */
  royaltyInfo(tokenId: TokenId, salePrice: bigint | number): RoyaltyInfo {
    return this.royalties.royaltyInfo(tokenId, salePrice)
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  /**
   * Move a token. The first transfer of a prepared token mints it to `from`.
   *
   * @param caller - Authenticated invoker; must be `from` or approved by `from`
   * @param data - Passed through to a programmable recipient
   * @throws DeferredMintError UnknownToken, IncorrectOwner, NotOwnerNorApproved,
   * InvalidRecipient, ReceiverRejected
   */
  transfer(caller: Identity, from: Identity, to: Identity, tokenId: TokenId, data?: string): void {
    this.execute('transfer', () => this.gate.transfer(caller, from, to, tokenId, data))
  }

  /**
   * Approve one identity to transfer a minted token. Pass the zero identity
   * to clear the approval.
   */
  approve(caller: Identity, approved: Identity, tokenId: TokenId): void {
    this.execute('approve', () => this.ownership.approve(caller, approved, tokenId))
  }

  setApprovalForAll(caller: Identity, operator: Identity, approved: boolean): void {
    this.execute('setApprovalForAll', () => this.ownership.setApprovalForAll(caller, operator, approved))
  }

  /**
   * Register a programmable recipient. It is called after every transfer to
   * `identity` and must return `true` to accept the token.
   */
  registerReceiver(identity: Identity, receiver: TokenReceiver): void {
    this.ownership.registerReceiver(identity, receiver)
  }

  unregisterReceiver(identity: Identity): void {
    this.ownership.unregisterReceiver(identity)
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  /**
   * @throws DeferredMintError Unauthorized
   */
  setBaseDescriptorPath(caller: Identity, path: string): void {
    this.execute('setBaseDescriptorPath', () => {
      this.adminGate.assertAdmin(caller)
      const previous = this.descriptors.snapshot()
      this.journal.record(() => this.descriptors.restore(previous))
      this.descriptors.setBasePath(path)
      this.log.append({ kind: 'BaseDescriptorPathSet', path })
    })
  }

  /**
   * @throws DeferredMintError Unauthorized, InvalidRecipient, InvalidIdentity
   */
  transferAdmin(caller: Identity, next: Identity): void {
    this.execute('transferAdmin', () => {
      const previous = this.adminGate.admin()
      const state = this.adminGate.snapshot()
      this.journal.record(() => this.adminGate.restore(state))
      this.adminGate.transferAdmin(caller, next)
      this.log.append({ kind: 'AdminTransferred', previous, next })
    })
  }

  admin(): Identity {
    return this.adminGate.admin()
  }

  baseDescriptorPath(): string {
    return this.descriptors.basePath()
  }

  // ---------------------------------------------------------------------------
  // Token Queries
  // ---------------------------------------------------------------------------

  isMinted(tokenId: TokenId): boolean {
    return this.registry.isMinted(tokenId)
  }

  exists(tokenId: TokenId): boolean {
    return this.registry.exists(tokenId)
  }

  /**
   * @throws DeferredMintError UnknownToken
   */
  creatorOf(tokenId: TokenId): Identity {
    return this.registry.creatorOf(tokenId)
  }

  /**
   * @throws DeferredMintError UnknownToken
   */
  descriptorOf(tokenId: TokenId): string {
    return this.registry.descriptorOf(tokenId)
  }

  /**
   * The descriptor resolved against the base descriptor path. Available as
   * soon as the token is prepared.
   *
   * @throws DeferredMintError UnknownToken
   */
  tokenURI(tokenId: TokenId): string {
    return this.descriptors.resolve(this.registry.descriptorOf(tokenId))
  }

  tokenIdForDescriptor(descriptor: string): TokenId | undefined {
    return this.registry.tokenIdForDescriptor(descriptor)
  }

  /** Highest token id issued so far (0 before the first prepare) */
  currentTokenId(): TokenId {
    return this.registry.currentTokenId()
  }

  token(tokenId: TokenId): TokenRecord | undefined {
    return this.registry.get(tokenId)
  }

  tokens(): TokenRecord[] {
    return this.registry.list()
  }

  /**
   * @throws DeferredMintError UnknownToken for unminted tokens
   */
  ownerOf(tokenId: TokenId): Identity {
    return this.ownership.ownerOf(tokenId)
  }

  balanceOf(owner: Identity): number {
    return this.ownership.balanceOf(owner)
  }

  getApproved(tokenId: TokenId): Identity {
    return this.ownership.getApproved(tokenId)
  }

  isApprovedForAll(owner: Identity, operator: Identity): boolean {
    return this.ownership.isApprovedForAll(owner, operator)
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  /**
   * Committed notifications with a sequence greater than `sinceSequence`.
   */
  notifications(sinceSequence = 0): LedgerNotification[] {
    return this.log.notifications(sinceSequence)
  }

  /**
   * Receive each notification once the outermost operation that produced it
   * has committed.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  verifyNotificationIntegrity(): IntegrityReport {
    return this.log.verifyIntegrity()
  }

  // ---------------------------------------------------------------------------
  // Audit and Checkpoints
  // ---------------------------------------------------------------------------

  /**
   * Check id contiguity, descriptor uniqueness and mint/ownership agreement.
   *
   * @returns Every violation found; empty when the ledger is consistent
   */
  auditInvariants(): InvariantViolation[] {
    const violations: InvariantViolation[] = []
    const records = this.registry.list().sort((a, b) => a.id - b.id)

    records.forEach((record, index) => {
      if (record.id !== index + 1) {
        violations.push({ invariant: 'id-sequence', message: `expected token id ${index + 1}, found ${record.id}` })
      }
    })
    if (this.registry.currentTokenId() !== records.length) {
      violations.push({
        invariant: 'id-sequence',
        message: `current token id ${this.registry.currentTokenId()} does not match ${records.length} prepared tokens`
      })
    }

    if (this.registry.claimedDescriptors() !== records.length) {
      violations.push({
        invariant: 'descriptor-uniqueness',
        message: `descriptor index holds ${this.registry.claimedDescriptors()} entries for ${records.length} tokens`
      })
    }
    for (const record of records) {
      if (MetadataUniquenessIndex.hashDescriptor(record.descriptor) !== record.descriptorHash) {
        violations.push({ invariant: 'descriptor-uniqueness', message: `token ${record.id} has a stale descriptor hash` })
      }
      const indexed = this.registry.tokenIdForDescriptor(record.descriptor)
      if (indexed !== record.id) {
        violations.push({
          invariant: 'descriptor-uniqueness',
          message: `descriptor of token ${record.id} is indexed to ${String(indexed)}`
        })
      }
    }

    for (const record of records) {
      const owned = this.ownership.exists(record.id)
      if (record.minted && !owned) {
        violations.push({ invariant: 'mint-ownership', message: `token ${record.id} is minted but has no owner` })
      }
      if (!record.minted && owned) {
        violations.push({ invariant: 'mint-ownership', message: `token ${record.id} has an owner but is not minted` })
      }
    }
    for (const tokenId of Object.keys(this.ownership.snapshot().owners).map(Number)) {
      if (!this.registry.exists(tokenId)) {
        violations.push({ invariant: 'mint-ownership', message: `token ${tokenId} has an owner but was never prepared` })
      }
    }

    return violations
  }

  /**
   * Capture the full ledger state and notification log as plain JSON.
   */
  exportCheckpoint(): DeferredMintCheckpoint {
    return {
      version: CHECKPOINT_VERSION,
      savedAt: this.config.clock(),
      state: this.captureState(),
      notifications: this.log.notifications()
    }
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * Run one operation atomically.
   *
   * Components record the inverse of each write in the shared journal; if
   * `fn` throws, those entries are replayed newest first. Errors that are not
   * DeferredMintErrors are wrapped as ExecutionFailed. Listeners are notified
   * once the outermost operation commits.
   */
  private execute<T>(label: string, fn: () => T): T {
    this.depth += 1
    let result: T
    try {
      result = this.journal.run(fn)
    } catch (error) {
      this.logger.warn(`${label} rolled back: ${formatDeferredMintError(error)}`)
      if (isDeferredMintError(error)) {
        throw error
      }
      throw new DeferredMintError('ExecutionFailed', `${label} failed: ${error instanceof Error ? error.message : String(error)}`, {
        label
      })
    } finally {
      this.depth -= 1
    }

    this.logger.debug(`${label} committed at sequence ${this.log.latestSequence()}`)
    if (this.depth === 0) {
      this.dispatch()
    }
    return result
  }

  private dispatch(): void {
    while (this.dispatchedSequence < this.log.latestSequence()) {
      this.dispatchedSequence += 1
      const notification = this.log.at(this.dispatchedSequence)
      if (notification === undefined) return
      for (const listener of [...this.listeners]) {
        try {
          listener({ ...notification })
        } catch (error) {
          this.logger.error(`Listener failed on ${notification.kind} #${notification.sequence}`, error)
        }
      }
    }
  }

  private captureState(): LedgerState {
    return {
      registry: this.registry.snapshot(),
      royalties: this.royalties.snapshot(),
      ownership: this.ownership.snapshot(),
      descriptors: this.descriptors.snapshot(),
      admin: this.adminGate.snapshot()
    }
  }

  private restoreState(state: LedgerState): void {
    this.registry.restore(state.registry)
    this.royalties.restore(state.royalties)
    this.ownership.restore(state.ownership)
    this.descriptors.restore(state.descriptors)
    this.adminGate.restore(state.admin)
  }

  private resolveConfig(config: DeferredMintConfig): ResolvedDeferredMintConfig {
    const baseDescriptorPath = config.baseDescriptorPath ?? ''
    return {
      admin: config.admin,
      baseDescriptorPath,
      clock: config.clock ?? (() => new Date().toISOString()),
      logger: config.logger ?? createLogger('DeferredMintLedger', { level: config.logLevel }),
      ownership: config.ownership ?? ((notifications, journal) => new InMemoryOwnershipLedger(notifications, journal)),
      descriptors: config.descriptors ?? new BaseDescriptorStore(baseDescriptorPath),
      adminGate: config.adminGate ?? new SingleAdminGate(config.admin)
    }
  }
}
