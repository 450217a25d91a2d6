/**
 * Shared fixtures for core tests
 */

import { Chain } from '../Chain.js'
import { ManualBlockSource } from '../blocks.js'
import { SolidValueToken } from '../SolidValueToken.js'
import { isLedgerError } from '../errors.js'
import type { LedgerErrorCode } from '../errors.js'
import { addressFromLabel } from '../utils.js'
import type { SolidValueTokenConfig } from '../types.js'

export const deployer = addressFromLabel('deployer')
export const alice = addressFromLabel('alice')
export const bob = addressFromLabel('bob')
export const carol = addressFromLabel('carol')

export const DEPLOYER_FUNDS = 10_000_000n
export const ACCOUNT_FUNDS = 10_000n
export const START_BLOCK = 100n

export interface TokenFixture {
  blocks: ManualBlockSource
  chain: Chain
  token: SolidValueToken
}

/**
 * Fresh chain at block 100 with deployer, alice, bob and carol funded, and a
 * token deployed with `poolCurrency` as the pool's currency reserve.
 */
export function createTokenFixture(config: SolidValueTokenConfig = {}, poolCurrency: bigint = 0n): TokenFixture {
  const blocks = new ManualBlockSource(START_BLOCK)
  const chain = new Chain({
    blockSource: blocks,
    genesis: [
      { address: deployer, amount: DEPLOYER_FUNDS },
      { address: alice, amount: ACCOUNT_FUNDS },
      { address: bob, amount: ACCOUNT_FUNDS },
      { address: carol, amount: ACCOUNT_FUNDS }
    ]
  })
  const token = SolidValueToken.deploy(chain, deployer, config, poolCurrency)
  return { blocks, chain, token }
}

/**
 * Run `fn` and return the code of the LedgerError it throws.
 * Fails the test if it returns normally or throws something else.
 */
export function errorCodeOf(fn: () => unknown): LedgerErrorCode {
  try {
    fn()
  } catch (error) {
    if (isLedgerError(error)) {
      return error.code
    }
    throw error
  }
  throw new Error('Expected a LedgerError but the call succeeded')
}

/** Sum of every holder's balance */
export function sumOfBalances(token: SolidValueToken): bigint {
  return token.holders().reduce((sum, account) => sum + token.balanceOf(account), 0n)
}
