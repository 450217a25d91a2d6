import type { Chain } from './Chain.js'
import type { StoredValue } from './storage.js'
import { LedgerError } from './errors.js'

/**
 * Mutex around a contract's mutating entry points. While one is running,
 * any other guarded call into the same contract (typically from a receive
 * hook during an outbound transfer) fails with `ReentrantCall`.
 */
export class ReentrancyGuard {
  private readonly entered: StoredValue<boolean>

  constructor(chain: Chain, private readonly label: string) {
    this.entered = chain.storedValue(false)
  }

  run<T>(body: () => T): T {
    if (this.entered.value) {
      throw new LedgerError('ReentrantCall', `Reentrant call into ${this.label}`)
    }
    this.entered.value = true
    try {
      return body()
    } finally {
      this.entered.value = false
    }
  }
}
