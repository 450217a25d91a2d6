/**
 * Utility functions for SolidValue
 */

import { Hash, PublicKey, Utils } from '@bsv/sdk'
import type { Address, Amount } from './types.js'
import { ADDRESS_HEX_LENGTH, MAX_UINT256, ZERO_ADDRESS } from './constants.js'
import { LedgerError } from './errors.js'

const ADDRESS_PATTERN = new RegExp(`^[0-9a-f]{${ADDRESS_HEX_LENGTH}}$`)

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

/**
 * Derive the address of a contract from its deployer and the deployer's
 * deployment nonce.
 */
export function deriveContractAddress(deployer: Address, nonce: number): Address {
  return Utils.toHex(Hash.hash160(`${deployer}:${nonce}`, 'utf8'))
}

/**
 * Address of the holder of a public key (hash160 of the compressed key).
 */
export function addressFromPublicKey(publicKey: PublicKey): Address {
  return Utils.toHex(Hash.hash160(publicKey.toString(), 'hex'))
}

/**
 * Deterministic address for a human-readable label, used by tools and tests
 * that do not need keys.
 *
 * @example
 * ```typescript
 * const alice = addressFromLabel('alice')
 * ```
 */
export function addressFromLabel(label: string): Address {
  return Utils.toHex(Hash.hash160(label, 'utf8'))
}

export function isAddress(value: string): boolean {
  return ADDRESS_PATTERN.test(value)
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS
}

/**
 * @throws LedgerError `InvalidAddress` if the value is not 40 lowercase hex characters
 */
export function validateAddress(address: Address): void {
  if (!isAddress(address)) {
    throw new LedgerError('InvalidAddress', `Invalid address: ${address}`)
  }
}

/**
 * @throws LedgerError `InvalidAmount` if the amount is outside the uint256 domain
 */
export function validateAmount(amount: Amount): void {
  if (amount < 0n || amount > MAX_UINT256) {
    throw new LedgerError('InvalidAmount', `Amount out of range: ${amount}`)
  }
}

// ---------------------------------------------------------------------------
// Checked arithmetic
// ---------------------------------------------------------------------------

/**
 * uint256 arithmetic. Results outside the domain raise `Overflow`;
 * division by zero raises `UndefinedValue`.
 */
export const SafeMath = {
  add(a: Amount, b: Amount): Amount {
    const result = a + b
    if (result > MAX_UINT256) {
      throw new LedgerError('Overflow', 'Addition overflow')
    }
    return result
  },

  sub(a: Amount, b: Amount): Amount {
    if (b > a) {
      throw new LedgerError('Overflow', 'Subtraction underflow')
    }
    return a - b
  },

  mul(a: Amount, b: Amount): Amount {
    const result = a * b
    if (result > MAX_UINT256) {
      throw new LedgerError('Overflow', 'Multiplication overflow')
    }
    return result
  },

  div(a: Amount, b: Amount): Amount {
    if (b === 0n) {
      throw new LedgerError('UndefinedValue', 'Division by zero')
    }
    return a / b
  }
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

/**
 * Render a raw amount with `decimals` fractional digits, trimming trailing
 * zeros: `formatUnits(1500000000000000000n, 18) === '1.5'`.
 */
export function formatUnits(amount: Amount, decimals: number): string {
  const negative = amount < 0n
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, '0')
  const whole = digits.slice(0, digits.length - decimals)
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, '')
  const sign = negative ? '-' : ''
  return fraction.length > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`
}

/**
 * Inverse of `formatUnits`.
 *
 * @throws LedgerError `InvalidAmount` for malformed input or too many fractional digits
 */
export function parseUnits(value: string, decimals: number): Amount {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim())
  if (!match) {
    throw new LedgerError('InvalidAmount', `Cannot parse amount: ${value}`)
  }
  const [, whole, fraction = ''] = match
  if (fraction.length > decimals) {
    throw new LedgerError('InvalidAmount', `Too many decimal places in ${value}`)
  }
  return BigInt(whole + fraction.padEnd(decimals, '0'))
}
