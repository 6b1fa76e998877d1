/**
 * Embedding Provider Factory
 * Multi-provider support: OpenAI, Ollama, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type {
  EmbeddingProvider,
  EmbeddingProviderConfig,
} from './types/embed.types';

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  openai: 'text-embedding-ada-002',
  ollama: 'bge-m3',
  google: 'text-embedding-004',
};

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-ada-002': 1536,
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'bge-m3': 1024,
  'bge-m3:567m': 1024,
  'nomic-embed-text': 768,
  'text-embedding-004': 768,
  'embedding-001': 768,
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Create embedding model based on configuration
   */
  createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.getProviderConfig();

    this.logger.log(`Creating embedding model: ${provider}/${model} (${dimensions}D)`);

    switch (provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            'http://localhost:11434',
          ),
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          apiKey: this.requireKey('OPENAI_API_KEY'),
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireKey('GOOGLE_API_KEY'),
        });
    }
  }

  getProviderConfig(): EmbeddingProviderConfig {
    const provider = this.getProvider();
    const model = this.configService.get<string>(
      `EMBEDDING_MODEL_${provider.toUpperCase()}`,
      DEFAULT_MODELS[provider],
    );
    const configured = Number(this.configService.get('EMBEDDING_DIMENSIONS'));

    return {
      provider,
      model,
      dimensions:
        Number.isInteger(configured) && configured > 0
          ? configured
          : (MODEL_DIMENSIONS[model] ?? 1536),
    };
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>('EMBEDDING_PROVIDER', 'openai');

    if (provider !== 'ollama' && provider !== 'openai' && provider !== 'google') {
      this.logger.warn(`Invalid embedding provider: ${provider}, defaulting to openai`);
      return 'openai';
    }

    return provider;
  }

  private requireKey(key: string): string {
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new Error(`${key} is required for the configured embedding provider`);
    }
    return value;
  }
}
