import type { Address, Amount, BlockNumber, CallContext, IncomingPayment, LedgerEvent } from './types.js'
import type { Chain } from './Chain.js'
import { LedgerError } from './errors.js'

/**
 * Base class for code that lives at an address on a Chain.
 *
 * Subclasses keep their state in cells created through `chain.storedMap()`
 * and `chain.storedValue()` so that frame rollback covers it.
 */
export abstract class Contract {
  constructor(
    protected readonly chain: Chain,
    readonly address: Address
  ) {
    chain.setReceiver(address, payment => this.onValueReceived(payment))
  }

  /**
   * Handle to this contract whose every method call runs in its own frame
   * on behalf of `caller`, optionally carrying `value`.
   *
   * @example
   * ```typescript
   * token.connect(alice).transfer(bob, 10n)
   * token.connect(alice, 1_000n).enhanceTokenValue()
   * ```
   */
  connect(caller: Address, value: Amount = 0n): this {
    const chain = this.chain
    const target = this.address
    return new Proxy(this, {
      get(instance, property, receiver) {
        const member: unknown = Reflect.get(instance, property, receiver)
        if (typeof member !== 'function') {
          return member
        }
        return (...args: unknown[]) => {
          if (value > 0n && (typeof property !== 'string' || !instance.isPayable(property))) {
            throw new LedgerError('NotPayable', `${String(property)} on ${target} does not accept value`)
          }
          return chain.execute({ from: caller, to: target, value }, () => Reflect.apply(member, instance, args))
        }
      }
    })
  }

  /**
   * Methods that may be called with value attached. Calling any other
   * method with a nonzero value fails with `NotPayable` before currency
   * moves.
   */
  protected isPayable(method: string): boolean {
    return false
  }

  protected get msg(): CallContext {
    return this.chain.context
  }

  protected get blockNumber(): BlockNumber {
    return this.chain.blockNumber
  }

  protected emitEvent(event: LedgerEvent): void {
    this.chain.emit(this.address, event)
  }

  /**
   * Plain value transfers are refused unless a subclass accepts them.
   */
  protected onValueReceived(payment: IncomingPayment): void {
    throw new LedgerError('TransferFailed', `${this.address} does not accept plain transfers (from ${payment.from})`)
  }
}
