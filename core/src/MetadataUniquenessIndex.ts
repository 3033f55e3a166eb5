import { DeferredMintError } from './errors.js'
import type { TokenId, Transactional } from './types.js'
import { sha256Hex } from './utils.js'

/**
 * Maps the content hash of a descriptor to the token id that claimed it.
 *
 * `hash → id` stays injective: a second claim on the same hash fails and
 * leaves the index untouched.
 */
export class MetadataUniquenessIndex implements Transactional<Record<string, TokenId>> {
  private claims = new Map<string, TokenId>()

  /**
   * SHA-256 over the UTF-8 bytes of a descriptor, hex encoded.
   */
  static hashDescriptor(descriptor: string): string {
    return sha256Hex(descriptor)
  }

  /**
   * @throws DeferredMintError DuplicateMetadata when the hash is already claimed
   */
  register(hash: string, tokenId: TokenId): void {
    const existing = this.claims.get(hash)
    if (existing !== undefined) {
      throw new DeferredMintError('DuplicateMetadata', `descriptor already prepared as token ${existing}`, {
        hash,
        tokenId: existing
      })
    }
    this.claims.set(hash, tokenId)
  }

  /** Drop a claim; used to undo a `register` */
  release(hash: string): void {
    this.claims.delete(hash)
  }

  lookup(hash: string): TokenId | undefined {
    return this.claims.get(hash)
  }

  has(hash: string): boolean {
    return this.claims.has(hash)
  }

  size(): number {
    return this.claims.size
  }

  snapshot(): Record<string, TokenId> {
    return Object.fromEntries(this.claims)
  }

  restore(state: Record<string, TokenId>): void {
    this.claims = new Map(Object.entries(state))
  }
}
