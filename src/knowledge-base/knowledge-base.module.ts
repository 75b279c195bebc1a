import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { EmbeddingModule } from '../embedding/embedding.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { KnowledgeBaseService } from './knowledge-base.service';

@Module({
  imports: [IngestionModule, EmbeddingModule, VectorStoreModule],
  providers: [KnowledgeBaseService],
  exports: [KnowledgeBaseService, EmbeddingModule],
})
export class KnowledgeBaseModule {}
