import { Module } from '@nestjs/common';
import { VectorStoreFactory } from './vector-store.factory';
import { VECTOR_STORE, type VectorStore } from './vector-store.types';

@Module({
  providers: [
    VectorStoreFactory,
    {
      provide: VECTOR_STORE,
      inject: [VectorStoreFactory],
      useFactory: async (factory: VectorStoreFactory): Promise<VectorStore> => {
        const store = factory.create();
        await store.initialize();
        return store;
      },
    },
  ],
  exports: [VECTOR_STORE],
})
export class VectorStoreModule {}
