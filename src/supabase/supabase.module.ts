import { Global, Module } from '@nestjs/common';
import { VectorSearchService } from './vector-search.service.js';

@Global()
@Module({
  providers: [VectorSearchService],
  exports: [VectorSearchService],
})
export class SupabaseModule {}
