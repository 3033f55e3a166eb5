export default `# Deferred Mint Lookup Service

Indexes the notification log of a deferred mint ledger and answers questions about its tokens.

A token is *prepared* when its creator registers a descriptor. It is *minted* on its first transfer, with the transfer's source as owner of record, and then moves to the transfer's destination.

## Indexed Notifications

- **Prepared**: creates the record with its creator and descriptor.
- **Minted**: marks the record minted and sets its first owner.
- **Transferred**: updates the current owner.
- **RoyaltySet**: replaces the royalty recipient and basis points.

Notifications are applied strictly in sequence. Each one must extend the hash chain of the last one applied; anything already applied is skipped.

## Queries

Send a question to \`ls_deferred_mint\` with any combination of:

- \`tokenId\`: a single token id
- \`creator\`: identity key of the creator
- \`owner\`: identity key of the current owner
- \`minted\`: \`true\` for minted tokens, \`false\` for prepared ones still awaiting their first transfer
- \`limit\`, \`skip\`: pagination; \`limit\` is capped by the service
- \`sortOrder\`: \`asc\` or \`desc\` by token id (default \`desc\`)

An empty query lists every token.`
