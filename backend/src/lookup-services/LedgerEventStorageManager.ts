import { Collection, Db, Filter } from 'mongodb'
import { log } from 'solidvalue-core'
import type { Address } from 'solidvalue-core'
import { DEFAULT_COLLECTION, LedgerEventFilters, LedgerEventRecord, LedgerEventStore } from './types.js'

/**
 * Storage manager for ledger events using MongoDB.
 */
export class LedgerEventStorageManager implements LedgerEventStore {
  private readonly records: Collection<LedgerEventRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (db: Db, collectionName: string = DEFAULT_COLLECTION) {
    this.records = db.collection<LedgerEventRecord>(collectionName)

    this.records
      .createIndex({ contract: 1 })
      .catch(log.error)

    this.records
      .createIndex({ event: 1 })
      .catch(log.error)

    // Multikey index over every address an event names
    this.records
      .createIndex({ accounts: 1 })
      .catch(log.error)

    // A log entry is identified by its emitting contract and log index
    this.records
      .createIndex({ contract: 1, logIndex: 1 }, { unique: true })
      .catch(log.error)
  }

  /**
   * Insert a new ledger event record.
   */
  async storeRecord (record: Omit<LedgerEventRecord, 'createdAt'>): Promise<void> {
    await this.records.insertOne({ ...record, createdAt: new Date() })
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: LedgerEventFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    return await this.findRecordWithQuery(this.buildQuery(filters), limit, skip, sortOrder)
  }

  /**
   * Fetch all records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  async findByLogIndex (contract: Address, logIndex: number): Promise<LedgerEventRecord | null> {
    return await this.records.findOne({ contract, logIndex })
  }

  async countRecords (filters: LedgerEventFilters = {}): Promise<number> {
    return await this.records.countDocuments(this.buildQuery(filters))
  }

  private buildQuery (filters: LedgerEventFilters): Filter<LedgerEventRecord> {
    const query: Filter<LedgerEventRecord> = {}

    if (filters.contract !== undefined) {
      query.contract = filters.contract
    }

    if (filters.event !== undefined) {
      query.event = filters.event
    }

    if (filters.account !== undefined) {
      query.accounts = filters.account
    }

    return query
  }

  /**
   * Helper function for querying from the database. Log order, not
   * insertion time, decides the sort.
   */
  private async findRecordWithQuery (
    query: Filter<LedgerEventRecord>,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<LedgerEventRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.records
      .find(query)
      .sort({ logIndex: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
