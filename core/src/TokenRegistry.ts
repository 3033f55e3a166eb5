import { DeferredMintError } from './errors.js'
import { MetadataUniquenessIndex } from './MetadataUniquenessIndex.js'
import { SequentialIdAllocator } from './SequentialIdAllocator.js'
import type {
  Clock,
  Identity,
  NotificationSink,
  RegistryState,
  TokenId,
  TokenRecord,
  Transactional
} from './types.js'
import { UndoJournal } from './UndoJournal.js'
import { assertIdentity, isTokenId } from './utils.js'

export interface TokenRegistryOptions {
  notifications: NotificationSink
  clock?: Clock
  allocator?: SequentialIdAllocator
  index?: MetadataUniquenessIndex
  /** Journal that records the inverse of each write (default: a private one) */
  journal?: UndoJournal
}

/**
 * The authoritative record of prepared tokens.
 *
 * The registry owns its id allocator and descriptor index. `prepare` couples
 * id allocation and uniqueness registration: either both happen or neither
 * does. `markMinted` is the only writer of the `minted` flag.
 *
 * Every write records its inverse in the journal, so rolling back touches
 * only what the failed operation changed.
 */
export class TokenRegistry implements Transactional<RegistryState> {
  private tokens = new Map<TokenId, TokenRecord>()
  private readonly allocator: SequentialIdAllocator
  private readonly index: MetadataUniquenessIndex
  private readonly notifications: NotificationSink
  private readonly clock: Clock
  private readonly journal: UndoJournal

  constructor(options: TokenRegistryOptions) {
    this.journal = options.journal ?? new UndoJournal()
    this.notifications = options.notifications
    this.clock = options.clock ?? (() => new Date().toISOString())
    this.allocator = options.allocator ?? new SequentialIdAllocator()
    this.index = options.index ?? new MetadataUniquenessIndex()
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * Register a new token descriptor.
   *
   * @param creator - Identity of the caller; becomes the token's creator
   * @param descriptor - Opaque metadata pointer, must be non-empty
   * @returns The new token id
   * @throws DeferredMintError EmptyDescriptor, DuplicateMetadata, InvalidIdentity
   */
  prepare(creator: Identity, descriptor: string): TokenId {
    assertIdentity(creator, 'creator')
    if (typeof descriptor !== 'string' || descriptor.length === 0) {
      throw new DeferredMintError('EmptyDescriptor', 'descriptor must be a non-empty string')
    }

    const descriptorHash = MetadataUniquenessIndex.hashDescriptor(descriptor)
    return this.journal.run(() => {
      const lastIssued = this.allocator.current()
      const id = this.allocator.next()
      this.journal.record(() => this.allocator.restore(lastIssued))

      this.index.register(descriptorHash, id)
      this.journal.record(() => this.index.release(descriptorHash))

      this.write({
        id,
        creator,
        descriptor,
        descriptorHash,
        minted: false,
        preparedAt: this.clock()
      })
      this.notifications.append({ kind: 'Prepared', tokenId: id, creator, descriptor })
      return id
    })
  }

  /**
   * Flip a token's minted flag and record its owner of record.
   *
   * Only MintGate calls this.
   *
   * @throws DeferredMintError UnknownToken, AlreadyMinted
   */
  markMinted(tokenId: TokenId, owner: Identity): void {
    const record = this.require(tokenId)
    if (record.minted) {
      throw new DeferredMintError('AlreadyMinted', `token ${tokenId} is already minted`, {
        tokenId,
        mintedTo: record.mintedTo
      })
    }
    assertIdentity(owner, 'owner')

    this.write({
      ...record,
      minted: true,
      mintedTo: owner,
      mintedAt: this.clock()
    })
    this.notifications.append({ kind: 'Minted', tokenId, owner })
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** True iff 1 ≤ id ≤ highest issued id */
  exists(tokenId: TokenId): boolean {
    return isTokenId(tokenId) && tokenId <= this.allocator.current()
  }

  isMinted(tokenId: TokenId): boolean {
    return this.tokens.get(tokenId)?.minted ?? false
  }

  /**
   * @throws DeferredMintError UnknownToken
   */
  creatorOf(tokenId: TokenId): Identity {
    return this.require(tokenId).creator
  }

  /**
   * @throws DeferredMintError UnknownToken
   */
  descriptorOf(tokenId: TokenId): string {
    return this.require(tokenId).descriptor
  }

  get(tokenId: TokenId): TokenRecord | undefined {
    const record = this.tokens.get(tokenId)
    return record === undefined ? undefined : { ...record }
  }

  list(): TokenRecord[] {
    return [...this.tokens.values()].map((record) => ({ ...record }))
  }

  tokenIdForDescriptor(descriptor: string): TokenId | undefined {
    return this.index.lookup(MetadataUniquenessIndex.hashDescriptor(descriptor))
  }

  /** Highest id issued so far */
  currentTokenId(): TokenId {
    return this.allocator.current()
  }

  /** Number of prepared tokens */
  count(): number {
    return this.tokens.size
  }

  /** Number of claimed descriptor hashes */
  claimedDescriptors(): number {
    return this.index.size()
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  snapshot(): RegistryState {
    return {
      lastIssuedId: this.allocator.snapshot(),
      descriptorIndex: this.index.snapshot(),
      tokens: this.list()
    }
  }

  restore(state: RegistryState): void {
    this.allocator.restore(state.lastIssuedId)
    this.index.restore(state.descriptorIndex)
    this.tokens = new Map(state.tokens.map((record) => [record.id, { ...record }]))
  }

  private write(record: TokenRecord): void {
    const previous = this.tokens.get(record.id)
    this.tokens.set(record.id, record)
    this.journal.record(() => {
      if (previous === undefined) {
        this.tokens.delete(record.id)
      } else {
        this.tokens.set(record.id, previous)
      }
    })
  }

  private require(tokenId: TokenId): TokenRecord {
    const record = this.exists(tokenId) ? this.tokens.get(tokenId) : undefined
    if (record === undefined) {
      throw new DeferredMintError('UnknownToken', `unknown token: ${String(tokenId)}`, { tokenId })
    }
    return record
  }
}
