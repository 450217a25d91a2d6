/**
 * Constant-product pricing for the ledger's own pool.
 *
 * Stateless: callers pass the reserves they read at call time. Because the
 * reserves are the ledger's live holdings, every swap moves the price for
 * the next one.
 */

import type { Amount, Reserves } from './types.js'
import { SafeMath, validateAmount } from './utils.js'

export const SwapEngine = {
  /**
   * Output of a swap of `value` against `reserves`.
   *
   * - buy (currency in, units out): `value * units / (currency + value)`
   * - sell (units in, currency out): `value * currency / (units + value)`
   *
   * Integer division rounds toward zero, in favour of the pool.
   *
   * @throws LedgerError `UndefinedValue` when both the input and the opposite reserve are zero
   */
  quote(value: Amount, isBuy: boolean, reserves: Reserves): Amount {
    validateAmount(value)
    if (isBuy) {
      return SafeMath.div(
        SafeMath.mul(value, reserves.units),
        SafeMath.add(reserves.currency, value)
      )
    }
    return SafeMath.div(
      SafeMath.mul(value, reserves.currency),
      SafeMath.add(reserves.units, value)
    )
  },

  /**
   * Spot price of one unit in currency, scaled by `scale`
   * (`currency * scale / units`).
   */
  spotPrice(reserves: Reserves, scale: Amount = 1n): Amount {
    return SafeMath.div(SafeMath.mul(reserves.currency, scale), reserves.units)
  }
}
