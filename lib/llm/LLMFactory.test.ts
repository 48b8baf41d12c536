import { ClaudeProvider } from './ClaudeProvider';
import { GeminiProvider } from './GeminiProvider';
import { LLMFactory } from './LLMFactory';
import { OpenAIProvider } from './OpenAIProvider';

describe('LLMFactory', () => {
  it.each([
    ['openai' as const, OpenAIProvider, 'gpt-4o-mini'],
    ['claude' as const, ClaudeProvider, 'claude-3-5-haiku-latest'],
    ['gemini' as const, GeminiProvider, 'gemini-2.0-flash'],
  ])('creates the %s provider with its default model', (type, ProviderClass, model) => {
    const provider = LLMFactory.createProvider(type, 'test-key');

    expect(provider).toBeInstanceOf(ProviderClass);
    expect(provider.getModelName()).toBe(model);
  });

  it('honours a model override', () => {
    const provider = LLMFactory.createProvider('openai', 'test-key', 'gpt-4o');

    expect(provider.getModelName()).toBe('gpt-4o');
    expect(provider.getProviderName()).toBe('OpenAIProvider');
  });

  describe('fromConfig', () => {
    it('returns null without an API key', () => {
      expect(LLMFactory.fromConfig({ provider: 'openai', apiKey: null })).toBeNull();
    });

    it('builds the configured provider', () => {
      const provider = LLMFactory.fromConfig({ provider: 'gemini', apiKey: 'test-key', model: 'gemini-2.5-flash' });

      expect(provider).toBeInstanceOf(GeminiProvider);
      expect(provider?.getModelName()).toBe('gemini-2.5-flash');
    });
  });
});
