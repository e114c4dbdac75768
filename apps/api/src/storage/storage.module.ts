import { Global, Module } from '@nestjs/common';
import { LedgerStoreService } from './ledger-store.service';
import { STORAGE_CONFIG, storageConfig } from './storage.config';

@Global()
@Module({
  providers: [
    { provide: STORAGE_CONFIG, useFactory: () => storageConfig() },
    LedgerStoreService,
  ],
  exports: [LedgerStoreService],
})
export class StorageModule {}
