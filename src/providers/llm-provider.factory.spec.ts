import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import { createTestConfig } from '../../test/fixtures/test-config';
import { LLMProviderFactory } from './llm-provider.factory';

describe('LLMProviderFactory', () => {
  it('builds the configured provider with the configured model', () => {
    const factory = new LLMProviderFactory(
      createTestConfig({ LLM_MODEL: 'llama3.2:3b' }),
    );

    const model = factory.createChatModel();

    expect(model).toBeInstanceOf(ChatOllama);
    expect(model).toMatchObject({ model: 'llama3.2:3b' });
  });

  it('passes generation settings to OpenAI', () => {
    const factory = new LLMProviderFactory(
      createTestConfig({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-secret',
        TEMPERATURE: '0.2',
        MAX_TOKENS: '256',
      }),
    );

    const model = factory.createChatModel();

    expect(model).toBeInstanceOf(ChatOpenAI);
    expect(model).toMatchObject({
      model: 'gpt-4o-mini',
      temperature: 0.2,
      maxTokens: 256,
    });
  });
});
