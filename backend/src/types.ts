/**
 * Type definitions for SolidValue backend services
 * @module types
 */

// Re-export lookup service types
export type {
  LedgerEventQuery,
  LedgerEventFilters,
  LedgerEventRecord,
  LedgerEventStore
} from './lookup-services/types.js'
export { DEFAULT_COLLECTION } from './lookup-services/types.js'

// Re-export auditor types
export type { SupplyAudit, BalanceMismatch } from './auditors/LedgerAuditor.js'
