/**
 * Utility functions for the deferred mint ledger
 */

import { Hash, Utils } from '@bsv/sdk'
import { ZERO_IDENTITY } from './constants.js'
import { DeferredMintError } from './errors.js'
import type { Identity, TokenId } from './types.js'

const IDENTITY_PATTERN = /^0[23][0-9a-fA-F]{64}$/

/**
 * Check whether a value is a compressed identity key in hex.
 */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === 'string' && IDENTITY_PATTERN.test(value)
}

/**
 * @param label - Name used in the error message
 * @throws DeferredMintError InvalidIdentity
 */
export function assertIdentity(value: unknown, label: string): asserts value is Identity {
  if (!isIdentity(value)) {
    throw new DeferredMintError('InvalidIdentity', `${label} is not a valid identity key: ${String(value)}`)
  }
}

/**
 * Like assertIdentity, but reports the zero identity as an invalid recipient.
 */
export function assertRecipient(value: unknown, label: string): asserts value is Identity {
  if (value === ZERO_IDENTITY) {
    throw new DeferredMintError('InvalidRecipient', `${label} cannot be the zero identity`)
  }
  assertIdentity(value, label)
}

export function isTokenId(value: unknown): value is TokenId {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 1
}

/**
 * Token ids that are not positive integers can never have been prepared.
 *
 * @throws DeferredMintError UnknownToken
 */
export function assertTokenId(value: unknown): asserts value is TokenId {
  if (!isTokenId(value)) {
    throw new DeferredMintError('UnknownToken', `unknown token: ${String(value)}`)
  }
}

/**
 * Normalise a sale price to a non-negative bigint.
 *
 * @throws DeferredMintError InvalidArgument
 */
export function toSalePrice(value: bigint | number): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n) {
      throw new DeferredMintError('InvalidArgument', 'sale price must be >= 0')
    }
    return value
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new DeferredMintError('InvalidArgument', `sale price must be a non-negative integer: ${value}`)
  }
  return BigInt(value)
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item))
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = normalize(entry)
    }
    return sorted
  }

  return value
}

/**
 * JSON with object keys sorted, so equal values always hash the same.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value))
}

/**
 * SHA-256 of a UTF-8 string, hex encoded.
 */
export function sha256Hex(text: string): string {
  return Utils.toHex(Hash.sha256(text, 'utf8'))
}
