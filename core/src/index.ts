/**
 * solidvalue-core - reserve-backed token ledger
 *
 * This library provides:
 * - An in-process chain host with atomic call frames and value transfers
 * - SolidValueToken: unit ledger, solid-value enhancement and retrieval, and
 *   a constant-product pool against the ledger's own holdings
 * - Keeper: the controller-gated custodian of the solid-value reserve
 * - LiquidityLock: an independent, time-locked currency deposit
 *
 * @example
 * ```typescript
 * import { Chain, ManualBlockSource, SolidValueToken, addressFromLabel } from 'solidvalue-core'
 *
 * const deployer = addressFromLabel('deployer')
 * const alice = addressFromLabel('alice')
 * const blocks = new ManualBlockSource()
 * const chain = new Chain({
 *   blockSource: blocks,
 *   genesis: [{ address: deployer, amount: 10_000n }, { address: alice, amount: 1_000n }]
 * })
 *
 * const token = SolidValueToken.deploy(chain, deployer, { poolSupply: 500n }, 1_000n)
 * chain.sendValue(alice, token.address, 100n)   // buy
 * blocks.mine()
 * token.connect(alice).transfer(token.address, 10n)   // sell
 * ```
 *
 * @packageDocumentation
 */

// Host
export { Chain } from './Chain.js'
export type { TransferOutcome } from './Chain.js'
export { Contract } from './Contract.js'
export { ManualBlockSource, ClockBlockSource } from './blocks.js'
export { StoredMap, StoredValue } from './storage.js'
export type { StateCell } from './storage.js'

// Contracts & components
export { SolidValueToken } from './SolidValueToken.js'
export { Keeper } from './Keeper.js'
export { LiquidityLock } from './LiquidityLock.js'
export { SwapEngine } from './SwapEngine.js'
export { SameBlockGuard } from './SameBlockGuard.js'
export { ReentrancyGuard } from './ReentrancyGuard.js'

// Errors
export { LedgerError, isLedgerError, formatLedgerError } from './errors.js'
export type { LedgerErrorCode } from './errors.js'

// Logging
export { log, logWithTimestamp, setLoggingConfig, isLoggingEnabled } from './logging.js'

// Utilities
export {
  SafeMath,
  addressFromLabel,
  addressFromPublicKey,
  deriveContractAddress,
  formatUnits,
  isAddress,
  isZeroAddress,
  parseUnits,
  validateAddress,
  validateAmount
} from './utils.js'

// Types
export type {
  Address,
  Amount,
  BlockNumber,
  BlockSource,
  CallContext,
  CallRequest,
  ChainConfig,
  GenesisAllocation,
  IncomingPayment,
  ValueReceiver,
  LedgerEvent,
  LedgerEventName,
  TransferEvent,
  ApprovalEvent,
  ValueEnhancedEvent,
  ValueRetrievedEvent,
  SwapEvent,
  LiquidityAddedEvent,
  LiquidityLockExtendedEvent,
  LiquidityRemovedEvent,
  LogEntry,
  LogFilter,
  Reserves,
  LiquidityLockState,
  SolidValueTokenConfig,
  ResolvedSolidValueTokenConfig,
  UnitAllocation
} from './types.js'

// Constants
export {
  ZERO_ADDRESS,
  MAX_UINT256,
  ADDRESS_HEX_LENGTH,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
  DEFAULT_TOKEN_DECIMALS,
  DEFAULT_POOL_SUPPLY,
  DEFAULT_START_BLOCK,
  MAX_CALL_DEPTH
} from './constants.js'
