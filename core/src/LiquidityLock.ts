/**
 * LiquidityLock - time-locked currency deposit
 *
 * Independent of the token and its Keeper: nothing in the ledger's
 * transfer or swap paths reads or moves these funds.
 *
 * Lifecycle:
 *   unset --addLiquidity--> locked --(block > unlockBlock)--> unlockable
 *   extendLiquidityLock moves the unlock block later (possibly back to locked)
 *   removeLiquidity pays out from unlockable; the unlock block is kept
 */

import type { Address, Amount, BlockNumber, LiquidityLockState } from './types.js'
import type { Chain } from './Chain.js'
import type { StoredValue } from './storage.js'
import { Contract } from './Contract.js'
import { ReentrancyGuard } from './ReentrancyGuard.js'
import { LedgerError } from './errors.js'
import { validateAmount } from './utils.js'
import { logWithTimestamp } from './logging.js'

const UNSET: BlockNumber = 0n

export class LiquidityLock extends Contract {
  private readonly lockOwner: StoredValue<Address>
  private readonly unlockAt: StoredValue<BlockNumber>
  private readonly lockedAmount: StoredValue<Amount>
  private readonly reentrancyGuard: ReentrancyGuard

  /** Must be constructed inside a deployment frame; the deployer owns the lock. */
  constructor(chain: Chain, address: Address) {
    super(chain, address)
    this.lockOwner = chain.storedValue(this.msg.sender)
    this.unlockAt = chain.storedValue(UNSET)
    this.lockedAmount = chain.storedValue(0n)
    this.reentrancyGuard = new ReentrancyGuard(chain, `liquidity lock ${address}`)
  }

  static deploy(chain: Chain, owner: Address): LiquidityLock {
    return chain.deploy(owner, address => new LiquidityLock(chain, address))
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  owner(): Address {
    return this.lockOwner.value
  }

  /** 0 while unset */
  unlockBlock(): BlockNumber {
    return this.unlockAt.value
  }

  lockedBalance(): Amount {
    return this.lockedAmount.value
  }

  state(): LiquidityLockState {
    if (this.unlockAt.value === UNSET) return 'unset'
    return this.blockNumber > this.unlockAt.value ? 'unlockable' : 'locked'
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * Lock the attached currency until after `unlockBlock`. Allowed once.
   *
   * @throws LedgerError `Unauthorized` | `AlreadyAdded` | `NoValueSent` | `BlockTooLow`
   */
  addLiquidity(unlockBlock: BlockNumber): void {
    this.reentrancyGuard.run(() => {
      const { sender, value } = this.msg
      this.onlyOwner(sender)
      if (this.unlockAt.value !== UNSET) {
        throw new LedgerError('AlreadyAdded', 'Liquidity has already been added')
      }
      if (value === 0n) {
        throw new LedgerError('NoValueSent', 'addLiquidity requires a deposit')
      }
      validateAmount(unlockBlock)
      if (unlockBlock <= this.blockNumber) {
        throw new LedgerError('BlockTooLow', `Unlock block ${unlockBlock} is not after current block ${this.blockNumber}`)
      }

      this.unlockAt.value = unlockBlock
      this.lockedAmount.value = value
      this.emitEvent({ name: 'LiquidityAdded', provider: sender, amount: value, unlockBlock })
      logWithTimestamp('LiquidityLock', `Locked ${value} until block ${unlockBlock}`)
    })
  }

  /**
   * Push the unlock block later. Shortening is never allowed.
   *
   * @throws LedgerError `Unauthorized` | `NotAdded` | `CannotShorten`
   */
  extendLiquidityLock(newUnlockBlock: BlockNumber): void {
    this.reentrancyGuard.run(() => {
      this.onlyOwner(this.msg.sender)
      this.requireAdded()
      validateAmount(newUnlockBlock)
      if (newUnlockBlock <= this.unlockAt.value) {
        throw new LedgerError('CannotShorten', `New unlock block ${newUnlockBlock} must be after ${this.unlockAt.value}`)
      }

      this.unlockAt.value = newUnlockBlock
      this.emitEvent({ name: 'LiquidityLockExtended', unlockBlock: newUnlockBlock })
    })
  }

  /**
   * Pay the whole locked balance to the owner once unlockable.
   *
   * @returns The amount paid out
   * @throws LedgerError `Unauthorized` | `NotAdded` | `Locked` | `NothingLocked` | `TransferFailed`
   */
  removeLiquidity(): Amount {
    return this.reentrancyGuard.run(() => {
      const recipient = this.msg.sender
      this.onlyOwner(recipient)
      this.requireAdded()
      if (this.blockNumber <= this.unlockAt.value) {
        throw new LedgerError('Locked', `Locked until after block ${this.unlockAt.value}`)
      }
      const amount = this.lockedAmount.value
      if (amount === 0n) {
        throw new LedgerError('NothingLocked', 'Liquidity has already been removed')
      }

      // Effects first
      this.lockedAmount.value = 0n

      const outcome = this.chain.trySendValue(this.address, recipient, amount)
      if (!outcome.ok) {
        throw new LedgerError('TransferFailed', `Liquidity payout of ${amount} failed`, { cause: outcome.error })
      }
      this.emitEvent({ name: 'LiquidityRemoved', recipient, amount })
      logWithTimestamp('LiquidityLock', `Released ${amount} to ${recipient}`)
      return amount
    })
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  protected override isPayable(method: string): boolean {
    return method === 'addLiquidity'
  }

  private onlyOwner(caller: Address): void {
    if (caller !== this.lockOwner.value) {
      throw new LedgerError('Unauthorized', 'Only the lock owner')
    }
  }

  private requireAdded(): void {
    if (this.unlockAt.value === UNSET) {
      throw new LedgerError('NotAdded', 'No liquidity has been added')
    }
  }
}
