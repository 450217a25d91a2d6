import { Db } from 'mongodb'
import { ZERO_ADDRESS, log } from 'solidvalue-core'
import type { Address, Chain, LedgerEvent, LogEntry } from 'solidvalue-core'
import { LedgerEventStorageManager } from './LedgerEventStorageManager.js'
import { LedgerEventQuery, LedgerEventRecord, LedgerEventStore } from './types.js'
import docs from '../docs/LedgerLookupDocs.js'

/**
 * Addresses an event names, in field order
 */
function accountsOf (event: LedgerEvent): Address[] {
  switch (event.name) {
    case 'Transfer':
      return [event.from, event.to]
    case 'Approval':
      return [event.owner, event.spender]
    case 'ValueEnhanced':
      return [event.contributor]
    case 'ValueRetrieved':
      return [event.retriever]
    case 'Swap':
      return [event.sender]
    case 'LiquidityAdded':
      return [event.provider]
    case 'LiquidityLockExtended':
      return []
    case 'LiquidityRemoved':
      return [event.recipient]
  }
}

/**
 * Flatten a log entry into its stored form.
 */
export function toLedgerEventRecord (entry: LogEntry): Omit<LedgerEventRecord, 'createdAt'> {
  const { name, ...payload } = entry.event
  const fields: Record<string, string> = {}
  for (const [key, value] of Object.entries(payload)) {
    fields[key] = String(value)
  }

  const accounts = accountsOf(entry.event).filter(account => account !== ZERO_ADDRESS)

  return {
    contract: entry.address,
    logIndex: entry.index,
    blockNumber: entry.blockNumber.toString(),
    event: name,
    accounts: Array.from(new Set(accounts)),
    fields
  }
}

/**
 * Indexes ledger logs and answers queries over them.
 * @public
 */
class LedgerLookupService {
  /** Highest log index stored; read from storage on first use */
  private cursor: number | undefined

  constructor (public storageManager: LedgerEventStore) { }

  /**
   * Store every entry above the cursor, in log order.
   *
   * @returns The number of records stored
   */
  async ingest (logs: LogEntry[]): Promise<number> {
    let cursor = await this.currentCursor()
    let stored = 0

    const pending = logs
      .filter(entry => entry.index > cursor)
      .sort((a, b) => a.index - b.index)

    for (const entry of pending) {
      try {
        await this.storageManager.storeRecord(toLedgerEventRecord(entry))
      } catch (error) {
        log.error('[LedgerLookupService] Error storing log entry', entry.index, error)
        throw error
      }
      cursor = entry.index
      this.cursor = cursor
      stored++
    }

    return stored
  }

  /**
   * Ingest everything the chain has logged since the last sync.
   */
  async sync (chain: Chain): Promise<number> {
    const cursor = await this.currentCursor()
    return await this.ingest(chain.getLogs({ fromIndex: cursor + 1 }))
  }

  async lookup (query: LedgerEventQuery): Promise<LedgerEventRecord[]> {
    if (query === undefined || query === null) {
      throw new Error('A valid query must be provided')
    }
    if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 1)) {
      throw new Error('limit must be a positive integer')
    }
    if (query.skip !== undefined && (!Number.isInteger(query.skip) || query.skip < 0)) {
      throw new Error('skip must be a non-negative integer')
    }

    const hasFilters = query.contract !== undefined || query.event !== undefined || query.account !== undefined

    if (hasFilters) {
      return await this.storageManager.findWithFilters(
        {
          contract: query.contract,
          event: query.event,
          account: query.account
        },
        query.limit,
        query.skip,
        query.sortOrder
      )
    }
    return await this.storageManager.findAllRecords(query.limit, query.skip, query.sortOrder)
  }

  /**
   * Events naming `account`, oldest first.
   */
  async getHistory (account: Address, limit: number = 50, skip: number = 0): Promise<LedgerEventRecord[]> {
    return await this.lookup({ account, limit, skip, sortOrder: 'asc' })
  }

  async getDocumentation (): Promise<string> {
    return docs
  }

  async getMetaData (): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'SolidValue Ledger Lookup',
      shortDescription: 'Find SolidValue ledger events by contract, event or account.'
    }
  }

  private async currentCursor (): Promise<number> {
    if (this.cursor === undefined) {
      const [latest] = await this.storageManager.findAllRecords(1, 0, 'desc')
      this.cursor = latest?.logIndex ?? -1
    }
    return this.cursor
  }
}

// Factory function
export default (db: Db, collectionName?: string): LedgerLookupService => {
  return new LedgerLookupService(new LedgerEventStorageManager(db, collectionName))
}

export { LedgerLookupService }
