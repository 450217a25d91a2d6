import type { Address, LedgerEventName } from 'solidvalue-core'

export const DEFAULT_COLLECTION = 'ledgerEvents'

/**
 * Query parameters for ledger event lookups
 */
export interface LedgerEventQuery {
  contract?: Address
  event?: LedgerEventName
  account?: Address
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * Filters accepted by the storage layer
 */
export interface LedgerEventFilters {
  contract?: Address
  event?: LedgerEventName
  account?: Address
}

/**
 * A ledger log entry as stored in the lookup database.
 * Amounts and block numbers are decimal strings.
 */
export interface LedgerEventRecord {
  contract: Address
  logIndex: number
  blockNumber: string
  event: LedgerEventName
  /** Non-null addresses named by the event */
  accounts: Address[]
  fields: Record<string, string>
  createdAt: Date
}

/**
 * Persistence used by the lookup service. `LedgerEventStorageManager` is
 * the MongoDB implementation.
 */
export interface LedgerEventStore {
  storeRecord (record: Omit<LedgerEventRecord, 'createdAt'>): Promise<void>
  findWithFilters (
    filters: LedgerEventFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ): Promise<LedgerEventRecord[]>
  findAllRecords (limit?: number, skip?: number, sortOrder?: 'asc' | 'desc'): Promise<LedgerEventRecord[]>
  findByLogIndex (contract: Address, logIndex: number): Promise<LedgerEventRecord | null>
  countRecords (filters?: LedgerEventFilters): Promise<number>
}
