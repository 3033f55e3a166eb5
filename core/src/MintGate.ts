import type { TokenRegistry } from './TokenRegistry.js'
import type { Identity, OwnershipLedger, TokenId, TransferRequest } from './types.js'
import type { UndoJournal } from './UndoJournal.js'

/**
 * Fuses a token's mint with its first transfer.
 *
 * The gate registers `beforeTransfer` as a pre-transfer hook on the
 * ownership ledger. When a transfer names a prepared but unminted token, the
 * hook marks it minted with the transfer's source as owner of record and
 * credits that source in the ownership ledger. The ledger then runs its usual
 * checks and moves the token to its destination.
 *
 * `markMinted` completes before the ownership ledger calls any recipient, so
 * a recipient that re-enters the transfer path sees the token as minted.
 *
 * A prepared token has no owner to consult, so any identity may name itself
 * as `from` and take the token on its first transfer. Creator rights such as
 * royalties stay with the creator. Integrations that need to restrict who
 * mints must check the caller before calling `transfer`.
 *
 * The registry, ownership ledger and notification log must record into the
 * same journal as the gate. `transfer` runs in its own journal frame, so a
 * first transfer that fails after the hook leaves the token unminted.
 */
export class MintGate {
  private readonly detach: () => void

  constructor(
    private readonly registry: TokenRegistry,
    private readonly ownership: OwnershipLedger,
    private readonly journal: UndoJournal
  ) {
    this.detach = this.ownership.onBeforeTransfer((request) => this.beforeTransfer(request))
  }

  /**
   * Pre-transfer hook.
   *
   * @throws DeferredMintError UnknownToken for an id that was never prepared,
   * AlreadyMinted if the registry and ownership ledger disagree
   */
  beforeTransfer(request: TransferRequest): void {
    if (this.registry.isMinted(request.tokenId)) return

    this.registry.markMinted(request.tokenId, request.from)
    this.ownership.mint(request.from, request.tokenId)
  }

  /**
   * Transfer a token, minting it first if this is its first transfer.
   */
  transfer(caller: Identity, from: Identity, to: Identity, tokenId: TokenId, data?: string): void {
    this.journal.run(() => this.ownership.transfer(caller, from, to, tokenId, data))
  }

  /** Stop intercepting transfers */
  close(): void {
    this.detach()
  }
}
