export default `# SolidValue Ledger Events

This lookup service indexes the event log of SolidValue contracts: the token ledger, its Keeper and any LiquidityLock.

Every log entry becomes one record keyed by the emitting contract and its log index. Amounts and block numbers are stored as decimal strings so that uint256 values survive the round trip.

## Events

- **Transfer** (from, to, amount): unit movement. \`from\` is the null address for mints, \`to\` for burns. A transfer to the token's own address is a sale to the pool.
- **Approval** (owner, spender, amount): allowance set.
- **ValueEnhanced** (contributor, amount): currency added to the Keeper's reserve.
- **ValueRetrieved** (retriever, amount): reserve paid out against burned units.
- **Swap** (sender, currencyIn, unitsIn, currencyOut, unitsOut): a trade against the token's pool.
- **LiquidityAdded** (provider, amount, unlockBlock), **LiquidityLockExtended** (unlockBlock), **LiquidityRemoved** (recipient, amount): lock lifecycle.

## Queries

A query may combine:

- \`contract\`: emitting contract address
- \`event\`: event name
- \`account\`: any non-null address named by the event
- \`limit\` (default 50), \`skip\` (default 0), \`sortOrder\` (\`desc\` by default, by log index)

An empty query returns the most recent records across all contracts.`
