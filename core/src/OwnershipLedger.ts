import { ZERO_IDENTITY } from './constants.js'
import { DeferredMintError, isDeferredMintError } from './errors.js'
import type {
  Identity,
  NotificationSink,
  OwnershipLedger,
  OwnershipState,
  PreTransferHook,
  TokenId,
  TokenReceiver
} from './types.js'
import { UndoJournal } from './UndoJournal.js'
import { assertIdentity, assertRecipient } from './utils.js'

/**
 * In-memory ownership ledger.
 *
 * Tracks owners, balances and approvals, and moves tokens between
 * identities. Pre-transfer hooks run before any ownership check, so a hook
 * may bring a token into existence (see MintGate). Programmable recipients
 * are called only after the ownership change has been applied.
 *
 * Writes to owners, balances and approvals record their inverse in the
 * journal handed to the constructor.
 */
export class InMemoryOwnershipLedger implements OwnershipLedger {
  private readonly owners = new Map<TokenId, Identity>()
  private readonly balances = new Map<Identity, number>()
  private readonly tokenApprovals = new Map<TokenId, Identity>()
  private readonly operatorApprovals = new Map<Identity, ReadonlySet<Identity>>()
  private hooks: PreTransferHook[] = []
  private receivers = new Map<Identity, TokenReceiver>()

  constructor(
    private readonly notifications: NotificationSink,
    private readonly journal: UndoJournal = new UndoJournal()
  ) {}

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  exists(tokenId: TokenId): boolean {
    return this.owners.has(tokenId)
  }

  /**
   * @throws DeferredMintError UnknownToken
   */
  ownerOf(tokenId: TokenId): Identity {
    const owner = this.owners.get(tokenId)
    if (owner === undefined) {
      throw new DeferredMintError('UnknownToken', `token ${String(tokenId)} has no owner`, { tokenId })
    }
    return owner
  }

  balanceOf(owner: Identity): number {
    assertRecipient(owner, 'owner')
    return this.balances.get(owner) ?? 0
  }

  /**
   * The identity approved for a single token, or the zero identity.
   *
   * @throws DeferredMintError UnknownToken
   */
  getApproved(tokenId: TokenId): Identity {
    this.ownerOf(tokenId)
    return this.tokenApprovals.get(tokenId) ?? ZERO_IDENTITY
  }

  isApprovedForAll(owner: Identity, operator: Identity): boolean {
    return this.operatorApprovals.get(owner)?.has(operator) ?? false
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * Give a token its first owner.
   *
   * @throws DeferredMintError AlreadyMinted, InvalidRecipient, InvalidIdentity
   */
  mint(owner: Identity, tokenId: TokenId): void {
    assertRecipient(owner, 'owner')
    if (this.owners.has(tokenId)) {
      throw new DeferredMintError('AlreadyMinted', `token ${tokenId} already has an owner`, { tokenId })
    }
    this.put(this.owners, tokenId, owner)
    this.put(this.balances, owner, (this.balances.get(owner) ?? 0) + 1)
  }

  /**
   * Move a token from `from` to `to` on behalf of `caller`.
   *
   * @throws DeferredMintError InvalidRecipient, InvalidIdentity, UnknownToken,
   * IncorrectOwner, NotOwnerNorApproved, ReceiverRejected, or anything a
   * pre-transfer hook throws
   */
  transfer(caller: Identity, from: Identity, to: Identity, tokenId: TokenId, data?: string): void {
    assertIdentity(caller, 'caller')
    assertRecipient(from, 'from')
    assertRecipient(to, 'to')

    for (const hook of [...this.hooks]) {
      hook({ tokenId, from, to, operator: caller })
    }

    const owner = this.ownerOf(tokenId)
    if (owner !== from) {
      throw new DeferredMintError('IncorrectOwner', `token ${tokenId} is not owned by ${from}`, { tokenId, owner, from })
    }
    if (!this.isAuthorized(caller, owner, tokenId)) {
      throw new DeferredMintError('NotOwnerNorApproved', `caller is not the owner or an approved operator of token ${tokenId}`, {
        tokenId,
        caller
      })
    }

    this.put(this.tokenApprovals, tokenId, undefined)
    this.put(this.balances, from, (this.balances.get(from) ?? 0) - 1)
    this.put(this.balances, to, (this.balances.get(to) ?? 0) + 1)
    this.put(this.owners, tokenId, to)
    this.notifications.append({ kind: 'Transferred', tokenId, from, to, operator: caller })

    this.deliver(caller, from, to, tokenId, data)
  }

  /**
   * @throws DeferredMintError UnknownToken, NotOwnerNorApproved, InvalidIdentity
   */
  approve(caller: Identity, approved: Identity, tokenId: TokenId): void {
    const owner = this.ownerOf(tokenId)
    if (caller !== owner && !this.isApprovedForAll(owner, caller)) {
      throw new DeferredMintError('NotOwnerNorApproved', `caller may not approve token ${tokenId}`, { tokenId, caller })
    }
    if (approved !== ZERO_IDENTITY) {
      assertIdentity(approved, 'approved')
    }

    this.put(this.tokenApprovals, tokenId, approved === ZERO_IDENTITY ? undefined : approved)
    this.notifications.append({ kind: 'Approved', tokenId, owner, approved })
  }

  /**
   * @throws DeferredMintError InvalidIdentity, InvalidArgument when approving oneself
   */
  setApprovalForAll(caller: Identity, operator: Identity, approved: boolean): void {
    assertIdentity(caller, 'caller')
    assertIdentity(operator, 'operator')
    if (caller === operator) {
      throw new DeferredMintError('InvalidArgument', 'an identity cannot be its own operator')
    }

    const operators = new Set(this.operatorApprovals.get(caller))
    if (approved) {
      operators.add(operator)
    } else {
      operators.delete(operator)
    }
    this.put(this.operatorApprovals, caller, operators.size === 0 ? undefined : operators)
    this.notifications.append({ kind: 'OperatorApproved', owner: caller, operator, approved })
  }

  // ---------------------------------------------------------------------------
  // Hooks and Receivers
  // ---------------------------------------------------------------------------

  /**
   * Register a hook that runs before every transfer.
   *
   * @returns A function that removes the hook
   */
  onBeforeTransfer(hook: PreTransferHook): () => void {
    this.hooks.push(hook)
    return () => {
      this.hooks = this.hooks.filter((registered) => registered !== hook)
    }
  }

  registerReceiver(identity: Identity, receiver: TokenReceiver): void {
    assertIdentity(identity, 'receiver identity')
    this.receivers.set(identity, receiver)
  }

  unregisterReceiver(identity: Identity): void {
    this.receivers.delete(identity)
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  snapshot(): OwnershipState {
    const owners: Record<string, Identity> = {}
    for (const [tokenId, owner] of this.owners.entries()) {
      owners[String(tokenId)] = owner
    }
    const tokenApprovals: Record<string, Identity> = {}
    for (const [tokenId, approved] of this.tokenApprovals.entries()) {
      tokenApprovals[String(tokenId)] = approved
    }
    const operatorApprovals: Record<string, Identity[]> = {}
    for (const [owner, operators] of this.operatorApprovals.entries()) {
      operatorApprovals[owner] = [...operators]
    }
    return {
      owners,
      balances: Object.fromEntries(this.balances),
      tokenApprovals,
      operatorApprovals
    }
  }

  restore(state: OwnershipState): void {
    this.owners.clear()
    for (const [tokenId, owner] of Object.entries(state.owners)) {
      this.owners.set(Number(tokenId), owner)
    }
    this.balances.clear()
    for (const [owner, balance] of Object.entries(state.balances)) {
      this.balances.set(owner, balance)
    }
    this.tokenApprovals.clear()
    for (const [tokenId, approved] of Object.entries(state.tokenApprovals)) {
      this.tokenApprovals.set(Number(tokenId), approved)
    }
    this.operatorApprovals.clear()
    for (const [owner, operators] of Object.entries(state.operatorApprovals)) {
      this.operatorApprovals.set(owner, new Set(operators))
    }
  }

  /**
   * Set `key` to `value`, or delete it when `value` is undefined, and
   * record how to put the previous entry back.
   */
  private put<K, V>(map: Map<K, V>, key: K, value: V | undefined): void {
    const previous = map.get(key)
    if (value === undefined) {
      map.delete(key)
    } else {
      map.set(key, value)
    }
    this.journal.record(() => {
      if (previous === undefined) {
        map.delete(key)
      } else {
        map.set(key, previous)
      }
    })
  }

  private isAuthorized(caller: Identity, owner: Identity, tokenId: TokenId): boolean {
    return caller === owner ||
      this.tokenApprovals.get(tokenId) === caller ||
      this.isApprovedForAll(owner, caller)
  }

  private deliver(operator: Identity, from: Identity, to: Identity, tokenId: TokenId, data?: string): void {
    const receiver = this.receivers.get(to)
    if (receiver === undefined) return

    let accepted: boolean
    try {
      accepted = receiver.onTokenReceived({ operator, from, tokenId, data })
    } catch (error) {
      if (isDeferredMintError(error)) {
        throw error
      }
      throw new DeferredMintError('ReceiverRejected', `recipient ${to} failed while receiving token ${tokenId}`, {
        tokenId,
        to,
        error: error instanceof Error ? error.message : String(error)
      })
    }
    if (accepted !== true) {
      throw new DeferredMintError('ReceiverRejected', `recipient ${to} did not accept token ${tokenId}`, { tokenId, to })
    }
  }
}
