export { attemptCollect, denialMessage, describeResult } from './attemptCollect';
export { CollectionService } from './collectionService';
export type { CollectedResult } from './collectionService';
export { InMemoryWallet } from './wallet';
export type { LedgerEntry, WalletCreditor } from './wallet';
