import { FIRST_TOKEN_ID } from './constants.js'
import { DeferredMintError } from './errors.js'
import type { TokenId, Transactional } from './types.js'

/**
 * Issues strictly increasing token ids starting at 1.
 *
 * The allocator never reuses an id on its own. Callers that abandon an
 * operation after calling `next()` put the counter back with `restore()`.
 */
export class SequentialIdAllocator implements Transactional<TokenId> {
  private lastIssued: TokenId

  constructor(lastIssued: TokenId = FIRST_TOKEN_ID - 1) {
    this.lastIssued = SequentialIdAllocator.validate(lastIssued)
  }

  next(): TokenId {
    this.lastIssued += 1
    return this.lastIssued
  }

  /** The last id issued, or 0 before the first call to `next()` */
  current(): TokenId {
    return this.lastIssued
  }

  snapshot(): TokenId {
    return this.lastIssued
  }

  restore(state: TokenId): void {
    this.lastIssued = SequentialIdAllocator.validate(state)
  }

  private static validate(value: TokenId): TokenId {
    if (!Number.isSafeInteger(value) || value < FIRST_TOKEN_ID - 1) {
      throw new DeferredMintError('InvalidArgument', `allocator position must be a non-negative integer: ${value}`)
    }
    return value
  }
}
