/**
 * SolidValue Core Type Definitions
 *
 * Type definitions shared by the chain host, the contracts and the backend.
 */

// ---------------------------------------------------------------------------
// Identity & Numeric Types
// ---------------------------------------------------------------------------

/** Account or contract identity: 40 lowercase hex characters */
export type Address = string

/** Unit or currency amount in the uint256 domain */
export type Amount = bigint

/** Block height */
export type BlockNumber = bigint

// ---------------------------------------------------------------------------
// Call Frames
// ---------------------------------------------------------------------------

/**
 * Describes an invocation to run inside a call frame.
 */
export interface CallRequest {
  /** Caller (becomes `msg.sender` inside the frame) */
  from: Address
  /** Contract or account being called */
  to: Address
  /** Backing currency moved from caller to target before the body runs */
  value?: Amount
}

/**
 * Context visible to contract code while a frame is active
 */
export interface CallContext {
  /** Immediate caller */
  sender: Address
  /** Address whose code is running */
  target: Address
  /** Currency that arrived with this call */
  value: Amount
  /** Externally-owned account that started the outermost frame */
  origin: Address
  /** Nesting depth, 1 for an external call */
  depth: number
}

/**
 * A plain value transfer as seen by its recipient
 */
export interface IncomingPayment {
  from: Address
  amount: Amount
}

/**
 * Hook run when an address receives a plain value transfer.
 * Throwing rejects the payment.
 */
export type ValueReceiver = (payment: IncomingPayment) => void

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface TransferEvent {
  name: 'Transfer'
  from: Address
  to: Address
  amount: Amount
}

export interface ApprovalEvent {
  name: 'Approval'
  owner: Address
  spender: Address
  amount: Amount
}

export interface ValueEnhancedEvent {
  name: 'ValueEnhanced'
  contributor: Address
  amount: Amount
}

export interface ValueRetrievedEvent {
  name: 'ValueRetrieved'
  retriever: Address
  amount: Amount
}

/**
 * One swap against the ledger's own pool. Exactly one of the `*In` legs and
 * one of the `*Out` legs is non-zero.
 */
export interface SwapEvent {
  name: 'Swap'
  sender: Address
  currencyIn: Amount
  unitsIn: Amount
  currencyOut: Amount
  unitsOut: Amount
}

export interface LiquidityAddedEvent {
  name: 'LiquidityAdded'
  provider: Address
  amount: Amount
  unlockBlock: BlockNumber
}

export interface LiquidityLockExtendedEvent {
  name: 'LiquidityLockExtended'
  unlockBlock: BlockNumber
}

export interface LiquidityRemovedEvent {
  name: 'LiquidityRemoved'
  recipient: Address
  amount: Amount
}

export type LedgerEvent =
  | TransferEvent
  | ApprovalEvent
  | ValueEnhancedEvent
  | ValueRetrievedEvent
  | SwapEvent
  | LiquidityAddedEvent
  | LiquidityLockExtendedEvent
  | LiquidityRemovedEvent

export type LedgerEventName = LedgerEvent['name']

/**
 * An event as recorded in the chain's log
 */
export interface LogEntry<E extends LedgerEvent = LedgerEvent> {
  /** Position in the chain log, starting at 0 */
  index: number
  /** Block in which the event was emitted */
  blockNumber: BlockNumber
  /** Emitting contract */
  address: Address
  event: E
}

/**
 * Filter for reading the chain log
 */
export interface LogFilter {
  address?: Address
  name?: LedgerEventName
  /** Only entries with an index greater than or equal to this */
  fromIndex?: number
}

// ---------------------------------------------------------------------------
// Swap Types
// ---------------------------------------------------------------------------

/**
 * Pool reserves of the ledger, read fresh at each call
 */
export interface Reserves {
  /** Ledger contract's own backing-currency balance */
  currency: Amount
  /** Units held by the ledger contract's own address */
  units: Amount
}

// ---------------------------------------------------------------------------
// Liquidity Lock Types
// ---------------------------------------------------------------------------

export type LiquidityLockState = 'unset' | 'locked' | 'unlockable'

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Source of the current block number
 */
export interface BlockSource {
  current(): BlockNumber
}

/**
 * Initial backing-currency balance of an account
 */
export interface GenesisAllocation {
  address: Address
  amount: Amount
}

/**
 * Chain configuration
 */
export interface ChainConfig {
  /** Block number source. Defaults to a manual source starting at `startBlock` */
  blockSource?: BlockSource
  /** First block of the default manual source */
  startBlock?: BlockNumber
  /** Currency balances credited before the first call */
  genesis?: GenesisAllocation[]
}

/**
 * Unit allocation minted at token deployment
 */
export interface UnitAllocation {
  account: Address
  amount: Amount
}

/**
 * Token configuration. Every field is optional; see `resolveTokenConfig`.
 */
export interface SolidValueTokenConfig {
  name?: string
  symbol?: string
  decimals?: number
  /**
   * Units minted to the ledger's own address, forming the pool's unit
   * reserve. Without it the buy path has nothing to sell.
   */
  poolSupply?: Amount
  /** Units minted to named accounts */
  allocations?: UnitAllocation[]
}

/**
 * Token configuration with all defaults applied
 */
export interface ResolvedSolidValueTokenConfig {
  name: string
  symbol: string
  decimals: number
  poolSupply: Amount
  allocations: UnitAllocation[]
}
