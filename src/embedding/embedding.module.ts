import { Module } from '@nestjs/common';
import { ProvidersModule } from '../providers/providers.module';
import { EmbeddingService } from './embedding.service';

@Module({
  imports: [ProvidersModule],
  providers: [EmbeddingService],
  exports: [EmbeddingService],
})
export class EmbeddingModule {}
