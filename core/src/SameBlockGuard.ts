import type { Address, BlockNumber } from './types.js'
import type { Chain } from './Chain.js'
import type { StoredMap } from './storage.js'
import { LedgerError } from './errors.js'

/**
 * Allows each account one mutating call per block.
 *
 * The ledger checks the *caller* of a mutation rather than the account whose
 * units move, so an account cannot place two mutating transactions in one
 * block whoever's funds they touch.
 */
export class SameBlockGuard {
  private readonly lastMutationBlock: StoredMap<Address, BlockNumber>

  constructor(private readonly chain: Chain) {
    this.lastMutationBlock = chain.storedMap()
  }

  /**
   * Record a mutation by `account` in the current block.
   *
   * @throws LedgerError `SameBlockReplay` if `account` already mutated in this block
   */
  enforce(account: Address): void {
    const block = this.chain.blockNumber
    if (this.lastMutationBlock.get(account) === block) {
      throw new LedgerError('SameBlockReplay', `${account} already transacted in block ${block}`)
    }
    this.lastMutationBlock.set(account, block)
  }
}
