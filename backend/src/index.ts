/**
 * solidvalue-backend - event indexing and audits for SolidValue ledgers
 *
 * @packageDocumentation
 */

export { default as createLedgerLookupService, LedgerLookupService, toLedgerEventRecord } from './lookup-services/LedgerLookupService.js'
export { LedgerEventStorageManager } from './lookup-services/LedgerEventStorageManager.js'
export { LedgerAuditor } from './auditors/LedgerAuditor.js'
export * from './types.js'
