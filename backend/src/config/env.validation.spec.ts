import { describe, expect, it } from '@jest/globals';
import { validateEnv } from './env.validation.js';

describe('validateEnv', () => {
  it('should apply defaults in the test environment', () => {
    const env = validateEnv({ NODE_ENV: 'test' });

    expect(env).toMatchObject({
      PORT: 3000,
      AI_PROVIDER: 'openai',
      OPENAI_CHAT_MODEL: 'gpt-4o-mini',
      OPENAI_EMBEDDING_MODEL: 'text-embedding-3-small',
      KNOWLEDGE_CHUNK_SIZE: 250,
      KNOWLEDGE_EMBED_CHAR_LIMIT: 8000,
      RFP_TOP_K: 5,
      RFP_RESPONSE_TITLE: 'RFP Response',
    });
  });

  it('should coerce numeric and boolean settings', () => {
    const env = validateEnv({
      NODE_ENV: 'test',
      PORT: '8080',
      RFP_TOP_K: '8',
      DATABASE_SSL: 'yes',
    });

    expect(env.PORT).toBe(8080);
    expect(env.RFP_TOP_K).toBe(8);
    expect(env.DATABASE_SSL).toBe(true);
  });

  it('should require an OpenAI key outside of test', () => {
    expect(() => validateEnv({ NODE_ENV: 'production' })).toThrow(
      'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
    );
  });

  it('should accept an OpenAI key', () => {
    const env = validateEnv({
      NODE_ENV: 'production',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(env.OPENAI_API_KEY).toBe('test-secret');
  });

  it('should require every Azure deployment setting', () => {
    expect(() =>
      validateEnv({
        NODE_ENV: 'development',
        AI_PROVIDER: 'azure',
        AZURE_OPENAI_RESOURCE_NAME: 'test-resource',
        AZURE_OPENAI_API_KEY: 'test-secret',
      }),
    ).toThrow('AZURE_OPENAI_CHAT_DEPLOYMENT');
  });

  it('should reject a topK of zero', () => {
    expect(() => validateEnv({ NODE_ENV: 'test', RFP_TOP_K: '0' })).toThrow(
      'Configuration validation failed',
    );
  });
});
