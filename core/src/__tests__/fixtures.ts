import { isDeferredMintError } from '../errors.js'
import type { DeferredMintErrorCode } from '../errors.js'
import type { Logger } from '../logging.js'

export const CREATOR = '02' + 'a'.repeat(64)
export const BUYER = '03' + 'b'.repeat(64)
export const OTHER = '02' + 'c'.repeat(64)
export const ADMIN = '02' + 'd'.repeat(64)
export const ROYALTY_RECIPIENT = '03' + 'e'.repeat(64)

export const FIXED_TIME = '2024-01-01T00:00:00.000Z'
export const clock = (): string => FIXED_TIME

/**
 * Run `fn` and report the DeferredMintError code it throws.
 */
export function errorCodeOf(fn: () => unknown): DeferredMintErrorCode | 'no error' | 'other error' {
  try {
    fn()
  } catch (error) {
    return isDeferredMintError(error) ? error.code : 'other error'
  }
  return 'no error'
}

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  }
}
