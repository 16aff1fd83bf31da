import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { VercelAIBackend } from '../../src/llm/vercel';
import { ConfigError } from '../../src/errors';

const providers = vi.hoisted(() => ({
  createOpenAI: vi.fn(),
  createAnthropic: vi.fn(),
  createCerebras: vi.fn(),
}));

vi.mock('@ai-sdk/openai', () => ({ createOpenAI: providers.createOpenAI }));
vi.mock('@ai-sdk/anthropic', () => ({ createAnthropic: providers.createAnthropic }));
vi.mock('@ai-sdk/cerebras', () => ({ createCerebras: providers.createCerebras }));

describe('VercelAIBackend', () => {
  beforeEach(() => {
    providers.createOpenAI.mockReturnValue({ chat: () => 'openai-model' });
    providers.createAnthropic.mockReturnValue(() => 'anthropic-model');
    providers.createCerebras.mockReturnValue(() => 'cerebras-model');
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('CEREBRAS_API_KEY', 'test-secret');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should pass the base URL from the environment to OpenAI', () => {
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:8080/v1');
    new VercelAIBackend({ provider: 'openai', name: 'gpt-4.1-mini' });

    expect(providers.createOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:8080/v1',
    });
  });

  it('should prefer the configured base URL over the environment', () => {
    vi.stubEnv('ANTHROPIC_BASE_URL', 'http://localhost:8080/v1');
    new VercelAIBackend({ provider: 'anthropic', name: 'claude-3-5-haiku-latest', baseURL: 'http://localhost:9090/v1' });

    expect(providers.createAnthropic).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:9090/v1',
    });
  });

  it('should give Cerebras its configured base URL', () => {
    new VercelAIBackend({ provider: 'cerebras', name: 'llama-3.3-70b', baseURL: 'http://localhost:7070/v1' });

    expect(providers.createCerebras).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:7070/v1',
    });
  });

  it('should require a base URL for unknown providers', () => {
    vi.stubEnv('ACME_BASE_URL', '');
    expect(() => new VercelAIBackend({ provider: 'acme', name: 'model' })).toThrow(ConfigError);
  });
});
