/**
 * Deferred Mint Constants
 *
 * Constants shared by the registry, royalty ledger, ownership ledger and
 * notification log.
 */

import type { PubKeyHex } from '@bsv/sdk'

// ---------------------------------------------------------------------------
// Identity Constants
// ---------------------------------------------------------------------------

/**
 * The zero identity.
 *
 * Returned as the royalty recipient when a token has no royalty term, and
 * rejected wherever a real owner, recipient or caller is required.
 */
export const ZERO_IDENTITY: PubKeyHex = '00'.repeat(33)

// ---------------------------------------------------------------------------
// Royalty Constants
// ---------------------------------------------------------------------------

/** Basis points denominator: 10000 bps = 100% of the sale price */
export const BPS_DENOMINATOR = 10000

/** Highest royalty a creator may set */
export const MAX_ROYALTY_BPS = BPS_DENOMINATOR

// ---------------------------------------------------------------------------
// Token Id Constants
// ---------------------------------------------------------------------------

/** First id issued by a fresh allocator */
export const FIRST_TOKEN_ID = 1

// ---------------------------------------------------------------------------
// Notification Log Constants
// ---------------------------------------------------------------------------

/** prevHash of the first notification in a log */
export const GENESIS_HASH = 'GENESIS'

// ---------------------------------------------------------------------------
// Checkpoint Constants
// ---------------------------------------------------------------------------

/** Version written into exported checkpoints */
export const CHECKPOINT_VERSION = '1.0.0'

// ---------------------------------------------------------------------------
// Lookup Constants
// ---------------------------------------------------------------------------

/** Deferred mint lookup service identifier */
export const DEFERRED_MINT_LOOKUP_SERVICE = 'ls_deferred_mint'

/** Environment variable holding the default log level */
export const LOG_LEVEL_ENV = 'DEFERRED_MINT_LOG_LEVEL'
