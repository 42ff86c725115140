// Canonical serialization
export { canonicalStringify, canonicalBytes, computeHash } from './canonicalSerialize';

// Storage interfaces
export type {
  ILedgerStore,
  IRegistrationStore,
  IProposalStore,
  RegistryStores,
} from './interfaces';

// In-memory stores
export {
  InMemoryLedgerStore,
  InMemoryRegistrationStore,
  InMemoryProposalStore,
  createInMemoryStores,
} from './inMemoryStores';

// File-based stores
export { createFileStores } from './file';
export type { FileStores } from './file';

// SQLite stores
export { createSqliteStores } from './sqlite';
export type { SqliteStores } from './sqlite';
