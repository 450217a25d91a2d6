/**
 * Chain - in-process host for SolidValue contracts
 *
 * Provides what the contracts expect from a blockchain:
 * - Backing-currency balances for every address
 * - The current block number (from an injectable BlockSource)
 * - Serialized call frames that roll back atomically on failure
 * - Value transfers that run the recipient's receive hook
 * - An append-only event log
 *
 * Execution is strictly sequential. The only way to re-enter a contract is
 * from inside a receive hook while an outbound transfer is in progress.
 */

import type {
  Address,
  Amount,
  BlockNumber,
  BlockSource,
  CallContext,
  CallRequest,
  ChainConfig,
  LedgerEvent,
  LogEntry,
  LogFilter,
  ValueReceiver
} from './types.js'
import { MAX_CALL_DEPTH, DEFAULT_START_BLOCK } from './constants.js'
import { LedgerError } from './errors.js'
import { ManualBlockSource } from './blocks.js'
import { StateCell, StoredMap, StoredValue } from './storage.js'
import { SafeMath, deriveContractAddress, validateAddress, validateAmount } from './utils.js'
import { logWithTimestamp } from './logging.js'

/**
 * Outcome of an outbound value transfer attempted from contract code
 */
export type TransferOutcome =
  | { ok: true }
  | { ok: false, error: unknown }

export class Chain {
  readonly blocks: BlockSource

  private readonly cells: StateCell[] = []
  private readonly currency: StoredMap<Address, Amount>
  private readonly receivers: StoredMap<Address, ValueReceiver>
  private readonly nonces: StoredMap<Address, number>
  private readonly contracts: StoredMap<Address, true>
  private readonly logCount: StoredValue<number>
  private logs: LogEntry[] = []
  private frames: CallContext[] = []

  constructor(config: ChainConfig = {}) {
    this.blocks = config.blockSource ?? new ManualBlockSource(config.startBlock ?? DEFAULT_START_BLOCK)
    this.currency = this.storedMap()
    this.receivers = this.storedMap()
    this.nonces = this.storedMap()
    this.contracts = this.storedMap()
    this.logCount = this.storedValue(0)

    for (const { address, amount } of config.genesis ?? []) {
      this.fund(address, amount)
    }
  }

  // ---------------------------------------------------------------------------
  // State registration
  // ---------------------------------------------------------------------------

  /**
   * Create a map whose contents are captured by every call frame.
   */
  storedMap<K, V>(): StoredMap<K, V> {
    const cell = new StoredMap<K, V>()
    this.cells.push(cell)
    return cell
  }

  /**
   * Create a value whose contents are captured by every call frame.
   */
  storedValue<T>(initial: T): StoredValue<T> {
    const cell = new StoredValue(initial)
    this.cells.push(cell)
    return cell
  }

  /** Number of state cells every frame captures */
  get registeredCells(): number {
    return this.cells.length
  }

  // ---------------------------------------------------------------------------
  // Blocks & currency
  // ---------------------------------------------------------------------------

  get blockNumber(): BlockNumber {
    return this.blocks.current()
  }

  /** Backing-currency balance of any address */
  balanceOf(address: Address): Amount {
    return this.currency.get(address) ?? 0n
  }

  /**
   * Credit currency out of thin air. Genesis and test setup only; contract
   * code never calls this.
   */
  fund(address: Address, amount: Amount): void {
    validateAddress(address)
    validateAmount(amount)
    this.currency.set(address, SafeMath.add(this.balanceOf(address), amount))
  }

  // ---------------------------------------------------------------------------
  // Call frames
  // ---------------------------------------------------------------------------

  /**
   * The frame currently executing.
   *
   * @throws Error if no frame is active (contract code called directly)
   */
  get context(): CallContext {
    const frame = this.frames[this.frames.length - 1]
    if (frame === undefined) {
      throw new Error('No active call frame. Invoke contracts through connect() or Chain.execute().')
    }
    return frame
  }

  /** Whether `address` was created through `deploy` */
  isContract(address: Address): boolean {
    return this.contracts.has(address)
  }

  /**
   * Run `body` inside a new call frame.
   *
   * Any value attached to the request moves from caller to target first.
   * If the body throws, every registered cell and the log are restored to
   * their state when the frame opened and the error is rethrown.
   *
   * A contract address may only be the sender of a frame opened by that
   * contract's own code, i.e. from inside a frame targeting it.
   *
   * @throws LedgerError `Unauthorized` when acting for a contract from outside it
   */
  execute<T>(request: CallRequest, body: () => T): T {
    const value = request.value ?? 0n
    validateAmount(value)

    const parent = this.frames[this.frames.length - 1]
    if (this.isContract(request.from) && parent?.target !== request.from) {
      throw new LedgerError('Unauthorized', `Only ${request.from} itself can act for ${request.from}`)
    }
    const depth = (parent?.depth ?? 0) + 1
    if (depth > MAX_CALL_DEPTH) {
      throw new LedgerError('CallDepthExceeded', `Call depth ${depth} exceeds ${MAX_CALL_DEPTH}`)
    }

    const restore = this.capture()
    this.frames.push({
      sender: request.from,
      target: request.to,
      value,
      origin: parent?.origin ?? request.from,
      depth
    })

    try {
      if (value > 0n) {
        this.moveCurrency(request.from, request.to, value)
      }
      return body()
    } catch (error) {
      restore()
      logWithTimestamp('chain', `Frame ${request.from} -> ${request.to} reverted at depth ${depth}:`, error instanceof Error ? error.message : error)
      throw error
    } finally {
      this.frames.pop()
    }
  }

  private capture(): () => void {
    const restorers = this.cells.map(cell => cell.capture())
    return () => {
      for (const restoreCell of restorers) {
        restoreCell()
      }
      // Drop cells registered inside the failed frame
      this.cells.length = restorers.length
      this.logs.length = this.logCount.value
    }
  }

  private moveCurrency(from: Address, to: Address, amount: Amount): void {
    const available = this.balanceOf(from)
    if (available < amount) {
      throw new LedgerError('InsufficientFunds', `${from} holds ${available}, needs ${amount}`)
    }
    this.currency.set(from, available - amount)
    this.currency.set(to, SafeMath.add(this.balanceOf(to), amount))
  }

  // ---------------------------------------------------------------------------
  // Value transfers
  // ---------------------------------------------------------------------------

  /**
   * Register the hook run when `address` receives a plain value transfer.
   * Contracts register themselves; external accounts may register one to
   * act as programmable recipients.
   */
  setReceiver(address: Address, receiver: ValueReceiver): void {
    validateAddress(address)
    this.receivers.set(address, receiver)
  }

  clearReceiver(address: Address): void {
    this.receivers.delete(address)
  }

  /**
   * Plain value transfer. Runs in its own frame: if the recipient's hook
   * throws, the transfer and everything the hook did are undone and the
   * error propagates.
   */
  sendValue(from: Address, to: Address, amount: Amount): void {
    validateAddress(to)
    this.execute({ from, to, value: amount }, () => {
      const receiver = this.receivers.get(to)
      if (receiver !== undefined) {
        receiver({ from, amount })
      }
    })
  }

  /**
   * Outbound transfer from contract code. A failure is reported rather than
   * thrown so the contract can abort with its own `TransferFailed`.
   */
  trySendValue(from: Address, to: Address, amount: Amount): TransferOutcome {
    try {
      this.sendValue(from, to, amount)
      return { ok: true }
    } catch (error) {
      logWithTimestamp('chain', `Transfer of ${amount} from ${from} to ${to} failed:`, error instanceof Error ? error.message : error)
      return { ok: false, error }
    }
  }

  // ---------------------------------------------------------------------------
  // Deployment
  // ---------------------------------------------------------------------------

  /**
   * Deploy a contract. `build` receives the derived address and runs inside
   * a frame whose sender is `deployer`, so constructors can read
   * `context.sender`. Value sent with the deployment lands on the new
   * contract's currency balance.
   */
  deploy<T>(deployer: Address, build: (address: Address) => T, value: Amount = 0n): T {
    const nonce = this.nonces.get(deployer) ?? 0
    const address = deriveContractAddress(deployer, nonce)
    this.nonces.set(deployer, nonce + 1)
    return this.execute({ from: deployer, to: address, value }, () => {
      this.contracts.set(address, true)
      return build(address)
    })
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  emit(address: Address, event: LedgerEvent): LogEntry {
    const entry: LogEntry = {
      index: this.logs.length,
      blockNumber: this.blockNumber,
      address,
      event
    }
    this.logs.push(entry)
    this.logCount.value = this.logs.length
    return entry
  }

  getLogs(filter: LogFilter = {}): LogEntry[] {
    return this.logs.filter(entry =>
      (filter.address === undefined || entry.address === filter.address) &&
      (filter.name === undefined || entry.event.name === filter.name) &&
      (filter.fromIndex === undefined || entry.index >= filter.fromIndex)
    )
  }
}
