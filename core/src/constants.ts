/**
 * SolidValue Constants
 *
 * Constants used throughout the SolidValue core library.
 */

import type { Address } from './types.js'

// ---------------------------------------------------------------------------
// Identity Constants
// ---------------------------------------------------------------------------

/** Length of an address in hex characters (a hash160) */
export const ADDRESS_HEX_LENGTH = 40

/**
 * The null identity.
 *
 * Transfers to it burn units; most operations reject it as a participant.
 */
export const ZERO_ADDRESS: Address = '0'.repeat(ADDRESS_HEX_LENGTH)

// ---------------------------------------------------------------------------
// Numeric Domain
// ---------------------------------------------------------------------------

/** Largest representable amount. Also marks an infinite approval. */
export const MAX_UINT256 = (1n << 256n) - 1n

// ---------------------------------------------------------------------------
// Token Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_TOKEN_NAME = 'Solid Value Token'

export const DEFAULT_TOKEN_SYMBOL = 'SVT'

export const DEFAULT_TOKEN_DECIMALS = 18

/** Units minted to the ledger's own address at deployment unless configured */
export const DEFAULT_POOL_SUPPLY = 0n

// ---------------------------------------------------------------------------
// Host Limits
// ---------------------------------------------------------------------------

/** First block of a chain that is not given a block source or start block */
export const DEFAULT_START_BLOCK = 1n

/** Deepest nesting of call frames before a call fails */
export const MAX_CALL_DEPTH = 64
