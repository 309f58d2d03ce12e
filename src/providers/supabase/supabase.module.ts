import { Module, Global } from '@nestjs/common';
import { SupabaseService } from './supabase.service';
import { RowStore } from './row-store';

@Global()
@Module({
  providers: [SupabaseService, { provide: RowStore, useExisting: SupabaseService }],
  exports: [SupabaseService, RowStore],
})
export class SupabaseModule {}
