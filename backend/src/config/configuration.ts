import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // validate() has already rejected a bad environment by the time this runs
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    ai: {
      provider: env.AI_PROVIDER,
      openai: {
        apiKey: env.OPENAI_API_KEY,
        chatModel: env.OPENAI_CHAT_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL,
      },
      azure: {
        resourceName: env.AZURE_OPENAI_RESOURCE_NAME,
        apiKey: env.AZURE_OPENAI_API_KEY,
        chatDeployment: env.AZURE_OPENAI_CHAT_DEPLOYMENT,
        embeddingDeployment: env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT,
      },
    },
    database: {
      url: env.DATABASE_URL,
      ssl: env.DATABASE_SSL ?? false,
    },
    knowledge: {
      chunkSize: env.KNOWLEDGE_CHUNK_SIZE,
      embedCharLimit: env.KNOWLEDGE_EMBED_CHAR_LIMIT,
    },
    rfp: {
      topK: env.RFP_TOP_K,
      responseTitle: env.RFP_RESPONSE_TITLE,
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type DatabaseConfig = AppConfig['database'];
export type KnowledgeConfig = AppConfig['knowledge'];
export type RfpConfig = AppConfig['rfp'];
