import { ZERO_ADDRESS, log } from 'solidvalue-core'
import type { Address, Amount, SolidValueToken } from 'solidvalue-core'
import type { LedgerEventRecord } from '../lookup-services/types.js'

export interface SupplyAudit {
  totalSupply: Amount
  sumOfBalances: Amount
  holders: number
  balanced: boolean
}

export interface BalanceMismatch {
  account: Address
  /** Balance rebuilt from stored Transfer records */
  recorded: Amount
  /** Balance the ledger reports now */
  live: Amount
}

function requireField (record: LedgerEventRecord, key: string): string {
  const value = record.fields[key]
  if (value === undefined) {
    throw new Error(`Record ${record.contract}#${record.logIndex} has no ${key} field`)
  }
  return value
}

/**
 * Offline consistency checks between a live ledger and its indexed events.
 */
export class LedgerAuditor {
  /**
   * Compare the reported supply with the sum of all balances.
   */
  auditSupply (token: SolidValueToken): SupplyAudit {
    const holders = token.holders()
    const sumOfBalances = holders.reduce((sum, account) => sum + token.balanceOf(account), 0n)
    const totalSupply = token.totalSupply()
    const balanced = sumOfBalances === totalSupply
    if (!balanced) {
      log.warn(`[LedgerAuditor] Supply ${totalSupply} does not match balances ${sumOfBalances} for ${token.address}`)
    }
    return { totalSupply, sumOfBalances, holders: holders.length, balanced }
  }

  /**
   * Rebuild balances from Transfer records, applied in log order. Mints
   * come from the null address and burns go to it.
   *
   * @throws Error if a record would drive a balance below zero, which means
   * the records are incomplete or out of order
   */
  replayTransfers (records: LedgerEventRecord[]): Map<Address, Amount> {
    const balances = new Map<Address, Amount>()
    const transfers = records
      .filter(record => record.event === 'Transfer')
      .sort((a, b) => a.logIndex - b.logIndex)

    for (const record of transfers) {
      const from = requireField(record, 'from')
      const to = requireField(record, 'to')
      const amount = BigInt(requireField(record, 'amount'))

      if (from !== ZERO_ADDRESS) {
        const balance = (balances.get(from) ?? 0n) - amount
        if (balance < 0n) {
          throw new Error(`Replaying log ${record.logIndex} leaves ${from} with ${balance}`)
        }
        balances.set(from, balance)
      }
      if (to !== ZERO_ADDRESS) {
        balances.set(to, (balances.get(to) ?? 0n) + amount)
      }
    }

    return balances
  }

  /**
   * Accounts whose replayed balance differs from the ledger's, considering
   * only records emitted by `token`.
   */
  reconcile (token: SolidValueToken, records: LedgerEventRecord[]): BalanceMismatch[] {
    const recorded = this.replayTransfers(records.filter(record => record.contract === token.address))
    const accounts = new Set<Address>([...recorded.keys(), ...token.holders()])

    const mismatches: BalanceMismatch[] = []
    for (const account of accounts) {
      const replayed = recorded.get(account) ?? 0n
      const live = token.balanceOf(account)
      if (replayed !== live) {
        mismatches.push({ account, recorded: replayed, live })
      }
    }

    if (mismatches.length > 0) {
      log.warn(`[LedgerAuditor] ${mismatches.length} balance mismatch(es) for ${token.address}`)
    }
    return mismatches
  }
}
