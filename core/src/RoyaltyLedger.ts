import { BPS_DENOMINATOR, MAX_ROYALTY_BPS, ZERO_IDENTITY } from './constants.js'
import { DeferredMintError } from './errors.js'
import type { TokenRegistry } from './TokenRegistry.js'
import type {
  Identity,
  NotificationSink,
  RoyaltyInfo,
  RoyaltyState,
  RoyaltyTerm,
  TokenId,
  Transactional
} from './types.js'
import { UndoJournal } from './UndoJournal.js'
import { assertRecipient, toSalePrice } from './utils.js'

/**
 * Per-token royalty terms.
 *
 * Only the identity recorded as a token's creator may set its terms, whoever
 * currently owns it. Terms can be replaced at any time; the last write wins.
 * The ledger reports terms; it does not collect payments.
 */
export class RoyaltyLedger implements Transactional<RoyaltyState> {
  private terms = new Map<TokenId, RoyaltyTerm>()

  constructor(
    private readonly registry: TokenRegistry,
    private readonly notifications: NotificationSink,
    private readonly journal: UndoJournal = new UndoJournal()
  ) {}

  /**
   * @param caller - Authenticated invoker; must be the token's creator
   * @param bps - Basis points of the sale price, 0–10000
   * @throws DeferredMintError UnknownToken, Unauthorized, InvalidArgument, RoyaltyTooHigh, InvalidRecipient, InvalidIdentity
   */
  setRoyalty(caller: Identity, tokenId: TokenId, recipient: Identity, bps: number): void {
    const creator = this.registry.creatorOf(tokenId)
    if (caller !== creator) {
      throw new DeferredMintError('Unauthorized', `only the creator of token ${tokenId} may set its royalty`, {
        tokenId,
        caller
      })
    }
    if (!Number.isInteger(bps) || bps < 0) {
      throw new DeferredMintError('InvalidArgument', `royalty bps must be a non-negative integer: ${bps}`)
    }
    if (bps > MAX_ROYALTY_BPS) {
      throw new DeferredMintError('RoyaltyTooHigh', `royalty bps ${bps} exceeds ${MAX_ROYALTY_BPS}`, { tokenId, bps })
    }
    assertRecipient(recipient, 'royalty recipient')

    const previous = this.terms.get(tokenId)
    this.terms.set(tokenId, { recipient, bps })
    this.journal.record(() => {
      if (previous === undefined) {
        this.terms.delete(tokenId)
      } else {
        this.terms.set(tokenId, previous)
      }
    })
    this.notifications.append({ kind: 'RoyaltySet', tokenId, recipient, bps })
  }

  /**
   * Royalty owed on a sale: floor(salePrice * bps / 10000).
   *
   * Tokens without terms (including ids never prepared) report the zero
   * identity and a zero amount.
   *
   * @throws DeferredMintError InvalidArgument for a negative or fractional price
   */
  royaltyInfo(tokenId: TokenId, salePrice: bigint | number): RoyaltyInfo {
    const price = toSalePrice(salePrice)
    const term = this.terms.get(tokenId)
    if (term === undefined) {
      return { recipient: ZERO_IDENTITY, amount: 0n }
    }
    return {
      recipient: term.recipient,
      amount: (price * BigInt(term.bps)) / BigInt(BPS_DENOMINATOR)
    }
  }

  termOf(tokenId: TokenId): RoyaltyTerm | undefined {
    const term = this.terms.get(tokenId)
    return term === undefined ? undefined : { ...term }
  }

  snapshot(): RoyaltyState {
    const terms: Record<string, RoyaltyTerm> = {}
    for (const [tokenId, term] of this.terms.entries()) {
      terms[String(tokenId)] = { ...term }
    }
    return { terms }
  }

  restore(state: RoyaltyState): void {
    this.terms = new Map(
      Object.entries(state.terms).map(([tokenId, term]) => [Number(tokenId), { ...term }])
    )
  }
}
