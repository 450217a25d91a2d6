import type { BlockNumber, BlockSource } from './types.js'
import { DEFAULT_START_BLOCK } from './constants.js'

/**
 * Block source advanced by hand. Tests use it to place calls in the same or
 * in consecutive blocks.
 *
 * @example
 * ```typescript
 * const blocks = new ManualBlockSource()
 * const chain = new Chain({ blockSource: blocks })
 * blocks.mine()      // next block
 * blocks.mine(10n)   // ten blocks later
 * ```
 */
export class ManualBlockSource implements BlockSource {
  private height: BlockNumber

  constructor(start: BlockNumber = DEFAULT_START_BLOCK) {
    this.height = start
  }

  current(): BlockNumber {
    return this.height
  }

  mine(count: BlockNumber = 1n): BlockNumber {
    if (count < 1n) {
      throw new RangeError(`Cannot mine ${count} blocks`)
    }
    this.height += count
    return this.height
  }
}

/**
 * Block source following wall-clock time: one block per `intervalMs`
 * (one second by default), so every call within the same second shares a
 * block.
 */
export class ClockBlockSource implements BlockSource {
  constructor(
    private readonly intervalMs: number = 1000,
    private readonly now: () => number = Date.now
  ) {}

  current(): BlockNumber {
    return BigInt(Math.floor(this.now() / this.intervalMs))
  }
}
