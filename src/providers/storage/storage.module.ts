import { Module, Global } from '@nestjs/common';
import { StorageService } from './storage.service';
import { ObjectStore } from './object-store';

@Global()
@Module({
  providers: [StorageService, { provide: ObjectStore, useExisting: StorageService }],
  exports: [ObjectStore],
})
export class StorageModule {}
