import { Module } from '@nestjs/common';
import { TransactionStoreService } from './transaction-store.service';
import { TRANSACTION_STORE } from './transaction-store.interface';

@Module({
  providers: [
    TransactionStoreService,
    { provide: TRANSACTION_STORE, useExisting: TransactionStoreService },
  ],
  exports: [TransactionStoreService, TRANSACTION_STORE],
})
export class LedgerModule {}
