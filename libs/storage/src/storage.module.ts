import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LocalStorageService } from './local-storage.service';
import { STORAGE_CLIENT } from './storage.types';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    LocalStorageService,
    { provide: STORAGE_CLIENT, useExisting: LocalStorageService },
  ],
  exports: [STORAGE_CLIENT],
})
export class StorageModule {}
