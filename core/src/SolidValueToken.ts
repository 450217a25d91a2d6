/**
 * SolidValueToken - reserve-backed unit ledger with a built-in market maker
 *
 * Main contract of the library. Provides:
 * - A fungible unit ledger (balances, allowances, total supply)
 * - Solid value: a Keeper-held currency reserve redeemable pro rata
 * - A constant-product pool made of the contract's own currency balance and
 *   the units credited to its own address
 * - One mutating call per caller per block
 *
 * Every balance change goes through `internalMove` (or `mint` during
 * deployment), which keeps `totalSupply == Σ balances` checkable in one place.
 */

import type {
  Address,
  Amount,
  IncomingPayment,
  Reserves,
  ResolvedSolidValueTokenConfig,
  SolidValueTokenConfig
} from './types.js'
import type { Chain } from './Chain.js'
import type { StoredMap, StoredValue } from './storage.js'
import { Contract } from './Contract.js'
import { Keeper } from './Keeper.js'
import { SameBlockGuard } from './SameBlockGuard.js'
import { ReentrancyGuard } from './ReentrancyGuard.js'
import { SwapEngine } from './SwapEngine.js'
import { LedgerError } from './errors.js'
import {
  DEFAULT_POOL_SUPPLY,
  DEFAULT_TOKEN_DECIMALS,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
  MAX_UINT256,
  ZERO_ADDRESS
} from './constants.js'
import { SafeMath, isZeroAddress, validateAddress, validateAmount } from './utils.js'
import { logWithTimestamp } from './logging.js'

/**
 * @example
 * ```typescript
 * const chain = new Chain({ genesis: [{ address: deployer, amount: 10_000n }] })
 *
 * // Deploy with 1 000 currency and 500 units in the pool
 * const token = SolidValueToken.deploy(chain, deployer, { poolSupply: 500n }, 1_000n)
 *
 * // Buy units by sending currency to the token
 * chain.sendValue(alice, token.address, 100n)
 *
 * // Sell units by transferring them to the token
 * token.connect(alice).transfer(token.address, 10n)
 *
 * // Back every unit with more currency, then redeem
 * token.connect(bob, 1_000n).enhanceTokenValue()
 * token.connect(alice).retrieveTokenValue(10n)
 * ```
 */
export class SolidValueToken extends Contract {
  private readonly config: ResolvedSolidValueTokenConfig
  private readonly balances: StoredMap<Address, Amount>
  private readonly allowances: StoredMap<string, Amount>
  private readonly supply: StoredValue<Amount>
  private readonly keeper: Keeper
  private readonly sameBlockGuard: SameBlockGuard
  private readonly reentrancyGuard: ReentrancyGuard

  /**
   * Must be constructed inside a deployment frame (see `deploy`). Creates the
   * Keeper, which records this contract as its controller, and mints the
   * configured bootstrap supply.
   */
  constructor(chain: Chain, address: Address, config: SolidValueTokenConfig = {}) {
    super(chain, address)
    this.config = SolidValueToken.resolveConfig(config)
    this.balances = chain.storedMap()
    this.allowances = chain.storedMap()
    this.supply = chain.storedValue(0n)
    this.sameBlockGuard = new SameBlockGuard(chain)
    this.reentrancyGuard = new ReentrancyGuard(chain, `token ${address}`)
    this.keeper = chain.deploy(address, keeperAddress => new Keeper(chain, keeperAddress))

    this.mint(address, this.config.poolSupply)
    for (const { account, amount } of this.config.allocations) {
      this.mint(account, amount)
    }
  }

  /**
   * Deploy a token. `value` is the pool's initial currency reserve.
   */
  static deploy(chain: Chain, deployer: Address, config: SolidValueTokenConfig = {}, value: Amount = 0n): SolidValueToken {
    return chain.deploy(deployer, address => new SolidValueToken(chain, address, config), value)
  }

  // ---------------------------------------------------------------------------
  // Metadata & views
  // ---------------------------------------------------------------------------

  name(): string {
    return this.config.name
  }

  symbol(): string {
    return this.config.symbol
  }

  decimals(): number {
    return this.config.decimals
  }

  totalSupply(): Amount {
    return this.supply.value
  }

  balanceOf(account: Address): Amount {
    return this.balances.get(account) ?? 0n
  }

  allowance(owner: Address, spender: Address): Amount {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n
  }

  /** Accounts holding a non-zero balance, including the pool itself */
  holders(): Address[] {
    return this.balances.entries()
      .filter(([, balance]) => balance > 0n)
      .map(([account]) => account)
  }

  keeperAddress(): Address {
    return this.keeper.address
  }

  /** Total currency backing the supply (the Keeper's reserve) */
  solidValue(): Amount {
    return this.keeper.reserveBalance()
  }

  /**
   * Backing currency per unit.
   *
   * @throws LedgerError `UndefinedValue` when nothing is in circulation
   */
  solidValuePerUnit(): Amount {
    const supply = this.supply.value
    if (supply === 0n) {
      throw new LedgerError('UndefinedValue', 'Solid value is undefined while total supply is zero')
    }
    return this.keeper.reserveBalance() / supply
  }

  getReserves(): Reserves {
    return {
      currency: this.chain.balanceOf(this.address),
      units: this.balanceOf(this.address)
    }
  }

  getAmountOut(value: Amount, isBuy: boolean): Amount {
    return SwapEngine.quote(value, isBuy, this.getReserves())
  }

  // ---------------------------------------------------------------------------
  // Unit transfers
  // ---------------------------------------------------------------------------

  /**
   * Move `amount` units from the caller to `to`. Transferring to the token's
   * own address sells the units to the pool; transferring to the null
   * address burns them.
   */
  transfer(to: Address, amount: Amount): boolean {
    return this.reentrancyGuard.run(() => {
      validateAddress(to)
      validateAmount(amount)
      if (to === this.address) {
        this.sell(amount)
      } else {
        this.internalMove(this.msg.sender, to, amount)
      }
      return true
    })
  }

  approve(spender: Address, amount: Amount): boolean {
    return this.reentrancyGuard.run(() => {
      validateAmount(amount)
      const owner = this.msg.sender
      if (isZeroAddress(owner) || isZeroAddress(spender)) {
        throw new LedgerError('ZeroAddress', 'Approval owner and spender must not be the null address')
      }
      validateAddress(spender)
      this.allowances.set(allowanceKey(owner, spender), amount)
      this.emitEvent({ name: 'Approval', owner, spender, amount })
      return true
    })
  }

  /**
   * Move units on behalf of `from` using the caller's allowance. An
   * allowance of `MAX_UINT256` is never consumed.
   */
  transferFrom(from: Address, to: Address, amount: Amount): boolean {
    return this.reentrancyGuard.run(() => {
      validateAddress(to)
      validateAmount(amount)
      const spender = this.msg.sender
      const allowed = this.allowance(from, spender)
      if (allowed < amount) {
        throw new LedgerError('InsufficientAllowance', `${spender} may spend ${allowed} of ${from}, not ${amount}`)
      }
      if (allowed !== MAX_UINT256) {
        this.allowances.set(allowanceKey(from, spender), allowed - amount)
      }
      this.internalMove(from, to, amount)
      return true
    })
  }

  // ---------------------------------------------------------------------------
  // Solid value
  // ---------------------------------------------------------------------------

  /**
   * Add the attached currency to the Keeper's reserve, raising the solid
   * value of every unit.
   */
  enhanceTokenValue(): void {
    this.reentrancyGuard.run(() => {
      const { sender, value } = this.msg
      if (value === 0n) {
        throw new LedgerError('ZeroValueNotAllowed', 'Enhancement requires a positive value')
      }
      this.keeper.connect(this.address, value).deposit()
      this.emitEvent({ name: 'ValueEnhanced', contributor: sender, amount: value })
    })
  }

  /**
   * Burn `amount` of the caller's units and pay out their share of the
   * reserve. The share is computed against the supply before the burn.
   *
   * @returns The currency paid out
   */
  retrieveTokenValue(amount: Amount): Amount {
    return this.reentrancyGuard.run(() => {
      validateAmount(amount)
      const retriever = this.msg.sender
      // With nothing in circulation the share is undefined whatever the
      // amount, so this is checked before the caller's own preconditions.
      const supply = this.supply.value
      if (supply === 0n) {
        throw new LedgerError('UndefinedValue', 'Solid value is undefined while total supply is zero')
      }
      if (amount === 0n) {
        throw new LedgerError('ZeroValueNotAllowed', 'Retrieval requires a positive amount')
      }
      const balance = this.balanceOf(retriever)
      if (balance < amount) {
        throw new LedgerError('InsufficientBalance', `${retriever} holds ${balance}, cannot retrieve ${amount}`)
      }

      const payout = SafeMath.div(SafeMath.mul(this.keeper.reserveBalance(), amount), supply)

      this.burn(retriever, amount)
      this.keeper.connect(this.address).withdraw(retriever, payout)
      this.emitEvent({ name: 'ValueRetrieved', retriever, amount: payout })
      logWithTimestamp('SolidValueToken', `${retriever} retrieved ${payout} for ${amount} units`)
      return payout
    })
  }

  // ---------------------------------------------------------------------------
  // Pool
  // ---------------------------------------------------------------------------

  protected override isPayable(method: string): boolean {
    return method === 'enhanceTokenValue'
  }

  /**
   * A plain currency transfer to the token buys units from the pool.
   */
  protected override onValueReceived(payment: IncomingPayment): void {
    this.reentrancyGuard.run(() => this.buy(payment))
  }

  private buy({ from: buyer, amount: value }: IncomingPayment): void {
    if (value === 0n) {
      throw new LedgerError('ZeroValueNotAllowed', 'Buying requires a positive value')
    }
    // The payment is already on our balance; price against the reserve as it
    // stood before it arrived.
    const reserves: Reserves = {
      currency: SafeMath.sub(this.chain.balanceOf(this.address), value),
      units: this.balanceOf(this.address)
    }
    if (reserves.units === 0n) {
      throw new LedgerError('InsufficientReserve', 'Pool holds no units')
    }
    const unitsOut = SwapEngine.quote(value, true, reserves)
    if (unitsOut === 0n) {
      throw new LedgerError('BuyTooLow', `${value} buys no units`)
    }

    this.internalMove(this.address, buyer, unitsOut)
    this.emitEvent({ name: 'Swap', sender: buyer, currencyIn: value, unitsIn: 0n, currencyOut: 0n, unitsOut })
    logWithTimestamp('SolidValueToken', `${buyer} bought ${unitsOut} units for ${value}`)
  }

  private sell(amount: Amount): void {
    const seller = this.msg.sender
    if (amount === 0n) {
      throw new LedgerError('SellTooLow', 'Cannot sell zero units')
    }
    const currencyOut = this.getAmountOut(amount, false)
    if (currencyOut === 0n) {
      throw new LedgerError('SellTooLow', `${amount} units sell for nothing`)
    }
    const available = this.chain.balanceOf(this.address)
    if (available < currencyOut) {
      throw new LedgerError('InsufficientReserve', `Pool holds ${available}, cannot pay ${currencyOut}`)
    }

    // Units are taken before the payout
    this.internalMove(seller, this.address, amount)

    const outcome = this.chain.trySendValue(this.address, seller, currencyOut)
    if (!outcome.ok) {
      throw new LedgerError('TransferFailed', `Payout of ${currencyOut} to ${seller} failed`, { cause: outcome.error })
    }
    this.emitEvent({ name: 'Swap', sender: seller, currencyIn: 0n, unitsIn: amount, currencyOut, unitsOut: 0n })
    logWithTimestamp('SolidValueToken', `${seller} sold ${amount} units for ${currencyOut}`)
  }

  // ---------------------------------------------------------------------------
  // Ledger primitives
  // ---------------------------------------------------------------------------

  /**
   * The single choke point for balance changes after deployment.
   *
   * Enforces the same-block guard for the caller, debits `from`, then
   * credits `to` or, when `to` is the null address, retires the units from
   * the supply.
   */
  private internalMove(from: Address, to: Address, amount: Amount): void {
    this.sameBlockGuard.enforce(this.msg.sender)
    if (isZeroAddress(from)) {
      throw new LedgerError('ZeroAddress', 'Cannot move units from the null address')
    }

    const fromBalance = this.balanceOf(from)
    if (fromBalance < amount) {
      throw new LedgerError('InsufficientBalance', `${from} holds ${fromBalance}, cannot move ${amount}`)
    }
    this.balances.set(from, fromBalance - amount)

    if (isZeroAddress(to)) {
      this.supply.value = SafeMath.sub(this.supply.value, amount)
    } else {
      this.balances.set(to, SafeMath.add(this.balanceOf(to), amount))
    }
    this.emitEvent({ name: 'Transfer', from, to, amount })
  }

  private mint(account: Address, amount: Amount): void {
    validateAmount(amount)
    if (isZeroAddress(account)) {
      throw new LedgerError('ZeroAddress', 'Cannot mint to the null address')
    }
    validateAddress(account)
    if (amount === 0n) return

    this.supply.value = SafeMath.add(this.supply.value, amount)
    this.balances.set(account, this.balanceOf(account) + amount)
    this.emitEvent({ name: 'Transfer', from: ZERO_ADDRESS, to: account, amount })
  }

  private burn(account: Address, amount: Amount): void {
    if (isZeroAddress(account)) {
      throw new LedgerError('ZeroAddress', 'Cannot burn from the null address')
    }
    this.internalMove(account, ZERO_ADDRESS, amount)
  }

  private static resolveConfig(config: SolidValueTokenConfig): ResolvedSolidValueTokenConfig {
    return {
      name: config.name ?? DEFAULT_TOKEN_NAME,
      symbol: config.symbol ?? DEFAULT_TOKEN_SYMBOL,
      decimals: config.decimals ?? DEFAULT_TOKEN_DECIMALS,
      poolSupply: config.poolSupply ?? DEFAULT_POOL_SUPPLY,
      allocations: config.allocations ?? []
    }
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`
}
