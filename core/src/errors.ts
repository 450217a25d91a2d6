/**
 * Every failure raised by the chain host and the contracts is a
 * `LedgerError`. A thrown error aborts the enclosing call frame, which
 * restores all state captured when the frame opened.
 */

export type LedgerErrorCode =
  // caller-side preconditions
  | 'InsufficientBalance'
  | 'InsufficientAllowance'
  | 'ZeroAddress'
  | 'ZeroValueNotAllowed'
  | 'InvalidAmount'
  | 'InvalidAddress'
  | 'NotPayable'
  // replay and reentry
  | 'SameBlockReplay'
  | 'ReentrantCall'
  // value and swaps
  | 'UndefinedValue'
  | 'SellTooLow'
  | 'BuyTooLow'
  | 'InsufficientReserve'
  | 'Unauthorized'
  // liquidity lock
  | 'AlreadyAdded'
  | 'NoValueSent'
  | 'BlockTooLow'
  | 'CannotShorten'
  | 'Locked'
  | 'NotAdded'
  | 'NothingLocked'
  // host
  | 'TransferFailed'
  | 'InsufficientFunds'
  | 'Overflow'
  | 'CallDepthExceeded'

export class LedgerError extends Error {
  readonly code: LedgerErrorCode

  constructor(code: LedgerErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options)
    this.name = 'LedgerError'
    this.code = code
  }
}

/**
 * Narrow an unknown thrown value to a `LedgerError`, optionally of one code.
 */
export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code)
}

const FRIENDLY_MESSAGES: Partial<Record<LedgerErrorCode, string>> = {
  InsufficientBalance: 'Insufficient balance for this transaction',
  InsufficientAllowance: 'Spending allowance is too low',
  InsufficientFunds: 'Not enough currency to cover this transaction',
  InsufficientReserve: 'The reserve cannot cover this payout',
  SameBlockReplay: 'Only one transaction per block is allowed. Please try again in the next block.',
  SellTooLow: 'Amount is too small to receive any currency',
  BuyTooLow: 'Amount is too small to receive any units',
  Locked: 'Liquidity is still locked',
  NotPayable: 'This action does not accept a payment',
  Unauthorized: 'You are not allowed to perform this action'
}

/**
 * Turn any thrown value into a short message for display.
 */
export const formatLedgerError = (error: unknown, fallback: string = 'Something went wrong!'): string => {
  if (isLedgerError(error)) {
    return FRIENDLY_MESSAGES[error.code] ?? error.message
  }
  const rawMessage = error instanceof Error ? error.message : String(error ?? '')
  if (!rawMessage) return fallback

  return rawMessage.length < 120 && !rawMessage.includes('{') ? rawMessage : fallback
}
