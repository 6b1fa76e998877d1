/**
 * Embed Stage Module
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EMBEDDING_MODEL } from './embed.constants';
import { EmbedStage } from './embed.stage';
import { EmbeddingProviderFactory } from './embedding-provider.factory';

@Module({
  imports: [ConfigModule],
  providers: [
    EmbeddingProviderFactory,
    {
      provide: EMBEDDING_MODEL,
      useFactory: (factory: EmbeddingProviderFactory) =>
        factory.createEmbeddingModel(),
      inject: [EmbeddingProviderFactory],
    },
    EmbedStage,
  ],
  exports: [EmbedStage, EmbeddingProviderFactory],
})
export class EmbedStageModule {}
