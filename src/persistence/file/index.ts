import * as path from 'path';

export { FileLedgerStore } from './FileLedgerStore';
export { FileRegistrationStore } from './FileRegistrationStore';
export { FileProposalStore } from './FileProposalStore';
export { writeJsonAtomic, writeJsonExclusive } from './atomicFile';

import { FileLedgerStore } from './FileLedgerStore';
import { FileRegistrationStore } from './FileRegistrationStore';
import { FileProposalStore } from './FileProposalStore';

export interface FileStores {
  ledger: FileLedgerStore;
  registrations: FileRegistrationStore;
  proposals: FileProposalStore;
}

export function createFileStores(dataDir?: string): FileStores {
  const dir = dataDir ?? path.join(process.cwd(), 'data');
  return {
    ledger: new FileLedgerStore(dir),
    registrations: new FileRegistrationStore(dir),
    proposals: new FileProposalStore(dir),
  };
}
