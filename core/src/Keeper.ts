import type { Address, Amount, IncomingPayment } from './types.js'
import type { Chain } from './Chain.js'
import type { StoredValue } from './storage.js'
import { Contract } from './Contract.js'
import { LedgerError } from './errors.js'
import { SafeMath, isZeroAddress, validateAmount } from './utils.js'
import { logWithTimestamp } from './logging.js'

/**
 * Keeper - custodian of the solid-value reserve
 *
 * Holds the backing currency that gives every unit its redemption value.
 * Anyone may deposit; only the controller (the contract that deployed the
 * keeper) may move funds out. The keeper knows its controller only by
 * address and holds no reference back to it.
 */
export class Keeper extends Contract {
  private readonly controllerAddress: StoredValue<Address>
  private readonly reserve: StoredValue<Amount>

  /**
   * Must be constructed inside a deployment frame; the deployer becomes the
   * controller.
   */
  constructor(chain: Chain, address: Address) {
    super(chain, address)
    this.controllerAddress = chain.storedValue(this.msg.sender)
    this.reserve = chain.storedValue(0n)
  }

  controller(): Address {
    return this.controllerAddress.value
  }

  /** Deposits minus authorized withdrawals */
  reserveBalance(): Amount {
    return this.reserve.value
  }

  /**
   * Accept the value attached to the call. Any amount, including zero.
   */
  deposit(): void {
    this.credit(this.msg.value)
  }

  /**
   * Pay `amount` of the reserve to `to`.
   *
   * The reserve is reduced before the transfer; a failed transfer aborts the
   * frame, which restores it.
   *
   * @throws LedgerError `Unauthorized` | `ZeroAddress` | `InsufficientReserve` | `TransferFailed`
   */
  withdraw(to: Address, amount: Amount): void {
    validateAmount(amount)
    if (this.msg.sender !== this.controllerAddress.value) {
      throw new LedgerError('Unauthorized', `${this.msg.sender} is not the keeper's controller`)
    }
    if (isZeroAddress(to)) {
      throw new LedgerError('ZeroAddress', 'Cannot withdraw to the null address')
    }
    if (amount > this.reserve.value) {
      throw new LedgerError('InsufficientReserve', `Reserve ${this.reserve.value} cannot cover ${amount}`)
    }

    this.reserve.value -= amount

    const outcome = this.chain.trySendValue(this.address, to, amount)
    if (!outcome.ok) {
      throw new LedgerError('TransferFailed', `Keeper payout of ${amount} to ${to} failed`, { cause: outcome.error })
    }
    logWithTimestamp('Keeper', `Released ${amount} to ${to}; reserve now ${this.reserve.value}`)
  }

  protected override isPayable(method: string): boolean {
    return method === 'deposit'
  }

  protected override onValueReceived(payment: IncomingPayment): void {
    this.credit(payment.amount)
  }

  private credit(amount: Amount): void {
    this.reserve.value = SafeMath.add(this.reserve.value, amount)
  }
}
