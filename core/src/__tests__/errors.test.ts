import { DeferredMintError, formatDeferredMintError, isDeferredMintError } from '../errors.js'

describe('DeferredMintError', () => {
  it('should carry a code and details', () => {
    const error = new DeferredMintError('AlreadyMinted', 'token 1 is already minted', { tokenId: 1 })
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('DeferredMintError')
    expect(error.code).toBe('AlreadyMinted')
    expect(error.details).toEqual({ tokenId: 1 })
  })

  it('should narrow by code', () => {
    const error = new DeferredMintError('UnknownToken', 'unknown token: 9')
    expect(isDeferredMintError(error)).toBe(true)
    expect(isDeferredMintError(error, 'UnknownToken')).toBe(true)
    expect(isDeferredMintError(error, 'AlreadyMinted')).toBe(false)
    expect(isDeferredMintError(new Error('unknown token: 9'))).toBe(false)
  })
})

describe('formatDeferredMintError', () => {
  it('should use friendly messages for known codes', () => {
    expect(formatDeferredMintError(new DeferredMintError('UnknownToken', 'unknown token: 9'))).toBe('Token not found')
    expect(formatDeferredMintError(new DeferredMintError('RoyaltyTooHigh', 'royalty bps 10001 exceeds 10000')))
      .toBe('Royalty cannot exceed 100%')
  })

  it('should fall back to the error message for other codes', () => {
    expect(formatDeferredMintError(new DeferredMintError('IncorrectOwner', 'token 1 is not owned by you')))
      .toBe('token 1 is not owned by you')
  })

  it('should pass through short plain messages', () => {
    expect(formatDeferredMintError(new Error('network down'))).toBe('network down')
    expect(formatDeferredMintError('timeout')).toBe('timeout')
  })

  it('should hide long or structured messages', () => {
    expect(formatDeferredMintError(new Error('{"status":500}'))).toBe('Something went wrong!')
    expect(formatDeferredMintError(new Error('x'.repeat(200)), 'Try again')).toBe('Try again')
    expect(formatDeferredMintError(undefined)).toBe('Something went wrong!')
  })
})
