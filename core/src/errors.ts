/**
 * Deferred Mint Errors
 *
 * Every failure raised by the ledger is a DeferredMintError tagged with a
 * reason code. The operation that raised it has been rolled back by the time
 * the caller sees it.
 */

export type DeferredMintErrorCode =
  | 'EmptyDescriptor'
  | 'DuplicateMetadata'
  | 'UnknownToken'
  | 'AlreadyMinted'
  | 'Unauthorized'
  | 'RoyaltyTooHigh'
  | 'InvalidIdentity'
  | 'InvalidRecipient'
  | 'InvalidArgument'
  | 'IncorrectOwner'
  | 'NotOwnerNorApproved'
  | 'ReceiverRejected'
  | 'InvalidCheckpoint'
  | 'ExecutionFailed'

export class DeferredMintError extends Error {
  code: DeferredMintErrorCode
  details?: unknown

  constructor(code: DeferredMintErrorCode, message: string, details?: unknown) {
    super(message)
    this.code = code
    this.details = details
    this.name = 'DeferredMintError'
  }
}

export function isDeferredMintError(error: unknown, code?: DeferredMintErrorCode): error is DeferredMintError {
  if (!(error instanceof DeferredMintError)) return false
  return code === undefined || error.code === code
}

const FRIENDLY_MESSAGES: Partial<Record<DeferredMintErrorCode, string>> = {
  EmptyDescriptor: 'A token descriptor is required',
  DuplicateMetadata: 'This descriptor has already been prepared',
  UnknownToken: 'Token not found',
  Unauthorized: 'You are not allowed to perform this action',
  RoyaltyTooHigh: 'Royalty cannot exceed 100%',
  InvalidRecipient: 'Invalid recipient',
  NotOwnerNorApproved: 'You are not the owner or an approved operator of this token',
  ReceiverRejected: 'The recipient did not accept the token'
}

/**
 * Render an error as a short message suitable for an end user.
 */
export const formatDeferredMintError = (error: unknown, fallback: string = 'Something went wrong!'): string => {
  if (error instanceof DeferredMintError) {
    return FRIENDLY_MESSAGES[error.code] ?? error.message
  }

  const rawMessage = error instanceof Error ? error.message : String(error ?? '')
  if (!rawMessage) return fallback

  return rawMessage.length < 120 && !rawMessage.includes('{') ? rawMessage : fallback
}
