import type { AppConfig } from './config';
import type { Embedder } from './ports/Embedder';
import type { LLM } from './ports/LLM';
import type { ChatStore } from './ports/ChatStore';
import type { VectorStore } from './ports/VectorStore';
import { OpenAiEmbedder } from './adapters/OpenAiEmbedder';
import { OpenAIChatAdapter } from './adapters/OpenAiLLM';
import { PostgresVectorStore } from './adapters/PostgresVectorStore';
import { PostgresChatStore } from './adapters/PostgresChatStore';
import { createPool, type SqlPool } from './adapters/pg';
import { Retriever } from './core/retriever';
import { AnswerSynthesizer } from './core/answer-synthesizer';
import { DocumentManager } from './core/document-manager';
import { DocumentSummarizer } from './core/summarizer';
import { IngestHandler } from './core/ingest-handler';
import { QueryHandler } from './core/query-handler';

export interface Container {
  config: AppConfig;
  vectorStore: VectorStore;
  chatStore: ChatStore;
  documents: DocumentManager;
  ingestHandler: IngestHandler;
  queryHandler: QueryHandler;
  summarizer: DocumentSummarizer;
  /** Creates the document and chat tables. */
  migrate(): Promise<void>;
  /** Ends the shared database pool. */
  close(): Promise<void>;
}

/** Collaborators that replace the production ones, mainly in tests. */
export interface ContainerOverrides {
  pool?: SqlPool;
  embedder?: Embedder;
  llm?: LLM;
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const pool = overrides.pool ?? createPool({ connectionString: config.database.url, max: config.database.poolMax });

  const embedder =
    overrides.embedder ??
    new OpenAiEmbedder({
      apiKey: config.openai.apiKey,
      baseURL: config.openai.baseURL,
      timeoutMs: config.openai.timeoutMs,
      maxRetries: config.openai.maxRetries,
      ...config.embedding,
    });

  const llm =
    overrides.llm ??
    new OpenAIChatAdapter({
      apiKey: config.openai.apiKey,
      baseURL: config.openai.baseURL,
      timeoutMs: config.openai.timeoutMs,
      maxRetries: config.openai.maxRetries,
      ...config.chat,
    });

  // Both stores share one pool, so the container ends it rather than either store.
  const vectorStore = new PostgresVectorStore(pool, {
    dimensions: embedder.dimensions,
    efSearch: config.database.efSearch,
  });
  const chatStore = new PostgresChatStore(pool);

  const documents = new DocumentManager(vectorStore, embedder, config.chunking);
  const retriever = new Retriever(vectorStore, embedder, config.retrieval);

  return {
    config,
    vectorStore,
    chatStore,
    documents,
    ingestHandler: new IngestHandler(documents, config.maxFileBytes),
    queryHandler: new QueryHandler(retriever, new AnswerSynthesizer(llm), chatStore),
    summarizer: new DocumentSummarizer(vectorStore, llm),
    migrate: async () => {
      await vectorStore.migrate();
      await chatStore.migrate();
    },
    close: () => pool.end(),
  };
}
