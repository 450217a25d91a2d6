import { SwapEngine } from '../SwapEngine.js'
import { MAX_UINT256 } from '../constants.js'
import type { Reserves } from '../types.js'
import { errorCodeOf } from './helpers.js'

describe('SwapEngine', () => {
  const reserves: Reserves = { currency: 1_000n, units: 500n }

  describe('quote', () => {
    it('should price a buy as value * units / (currency + value)', () => {
      expect(SwapEngine.quote(100n, true, reserves)).toBe(45n)
      expect(SwapEngine.quote(1_000n, true, reserves)).toBe(250n)
    })

    it('should price a sell as value * currency / (units + value)', () => {
      expect(SwapEngine.quote(100n, false, reserves)).toBe(166n)
      expect(SwapEngine.quote(500n, false, reserves)).toBe(500n)
    })

    it('should round down in favour of the pool', () => {
      expect(SwapEngine.quote(1n, true, reserves)).toBe(0n)
      expect(SwapEngine.quote(3n, true, reserves)).toBe(1n)
    })

    it('should quote zero for a zero input', () => {
      expect(SwapEngine.quote(0n, true, reserves)).toBe(0n)
      expect(SwapEngine.quote(0n, false, reserves)).toBe(0n)
    })

    it('should be undefined against an empty pool with no input', () => {
      expect(errorCodeOf(() => SwapEngine.quote(0n, true, { currency: 0n, units: 0n }))).toBe('UndefinedValue')
    })

    it('should reject amounts outside the uint256 domain', () => {
      expect(errorCodeOf(() => SwapEngine.quote(-1n, true, reserves))).toBe('InvalidAmount')
      expect(errorCodeOf(() => SwapEngine.quote(MAX_UINT256, true, reserves))).toBe('Overflow')
    })

    it('should never decrease the constant product', () => {
      const pools: Reserves[] = [
        { currency: 1_000n, units: 500n },
        { currency: 7n, units: 1_000_003n },
        { currency: 123_456_789n, units: 42n },
        { currency: 1n, units: 1n }
      ]
      const inputs = [1n, 2n, 99n, 1_000n, 987_654n]

      for (const pool of pools) {
        const k = pool.currency * pool.units
        for (const value of inputs) {
          const unitsOut = SwapEngine.quote(value, true, pool)
          expect((pool.currency + value) * (pool.units - unitsOut)).toBeGreaterThanOrEqual(k)

          const currencyOut = SwapEngine.quote(value, false, pool)
          expect((pool.units + value) * (pool.currency - currencyOut)).toBeGreaterThanOrEqual(k)
        }
      }
    })
  })

  describe('spotPrice', () => {
    it('should divide currency by units at the given scale', () => {
      expect(SwapEngine.spotPrice(reserves)).toBe(2n)
      expect(SwapEngine.spotPrice({ currency: 500n, units: 1_000n }, 1_000n)).toBe(500n)
    })

    it('should be undefined when the pool holds no units', () => {
      expect(errorCodeOf(() => SwapEngine.spotPrice({ currency: 500n, units: 0n }))).toBe('UndefinedValue')
    })
  })
})
