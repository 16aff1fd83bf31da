/**
 * VercelAIBackend - LLM backend using Vercel AI SDK
 *
 * Supports multiple providers through Vercel AI SDK:
 * - OpenAI
 * - Anthropic
 * - Cerebras
 * - OpenAI-compatible (Groq, Together, Fireworks, etc.)
 */

import { generateText, tool, type CoreMessage, type CoreTool, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createCerebras } from '@ai-sdk/cerebras';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { z } from 'zod';
import type { LLMBackend, LLMBackendConfig, LLMOptions, LLMResponse, Message, ToolDefinition } from './types';
import { ConfigError } from '../errors';

// Known provider base URLs for OpenAI-compatible providers
const PROVIDER_BASE_URLS: Record<string, string> = {
  cerebras: 'https://api.cerebras.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  together: 'https://api.together.xyz/v1',
  fireworks: 'https://api.fireworks.ai/inference/v1',
  deepseek: 'https://api.deepseek.com/v1',
  mistral: 'https://api.mistral.ai/v1',
  perplexity: 'https://api.perplexity.ai',
};

const DEFAULT_MAX_STEPS = 10;

const toolParameters = z.object({
  input: z.string().describe('Request for the sub-agent, in plain language'),
});

export class VercelAIBackend implements LLMBackend {
  totalCost = 0;
  totalApiCalls = 0;

  private model: LanguageModel;

  constructor(config: LLMBackendConfig) {
    this.model = this.createModel(config);
  }

  private createModel(config: LLMBackendConfig): LanguageModel {
    const { provider = 'openai', name: modelName, apiKey, baseURL } = config;
    const providerLower = provider.toLowerCase();
    const providerUpper = provider.toUpperCase().replace(/[^A-Z0-9]/g, '_');

    // Get API key from config or environment
    const resolvedApiKey = apiKey ?? process.env[`${providerUpper}_API_KEY`];
    const resolvedBaseURL = baseURL ?? process.env[`${providerUpper}_BASE_URL`] ?? PROVIDER_BASE_URLS[providerLower];

    if (providerLower === 'openai') {
      const openai = createOpenAI({ apiKey: resolvedApiKey, baseURL: resolvedBaseURL });
      return openai.chat(modelName);
    }

    if (providerLower === 'anthropic') {
      const anthropic = createAnthropic({ apiKey: resolvedApiKey, baseURL: resolvedBaseURL });
      return anthropic(modelName);
    }

    if (providerLower === 'cerebras') {
      const cerebras = createCerebras({ apiKey: resolvedApiKey, baseURL: resolvedBaseURL });
      return cerebras(modelName);
    }

    // Use createOpenAICompatible for any other OpenAI-compatible provider
    if (!resolvedBaseURL) {
      throw new ConfigError(
        `Unknown provider "${provider}". Set ${providerUpper}_BASE_URL environment variable.`
      );
    }

    const compatible = createOpenAICompatible({
      name: providerLower,
      baseURL: resolvedBaseURL,
      headers: {
        Authorization: `Bearer ${resolvedApiKey ?? ''}`,
      },
    });

    return compatible(modelName);
  }

  async call(messages: Message[], options?: LLMOptions): Promise<string> {
    const response = await this.callRaw(messages, options);
    return response.text;
  }

  async callRaw(messages: Message[], options: LLMOptions = {}): Promise<LLMResponse> {
    this.totalApiCalls++;

    // The system prompt goes in its own field; the rest is the conversation.
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation = messages.filter((m) => m.role !== 'system').map(toCoreMessage);
    const tools = options.tools?.length ? toCoreTools(options.tools) : undefined;

    const response = await generateText({
      model: this.model,
      system: system || undefined,
      messages: conversation,
      tools,
      maxSteps: tools ? options.maxSteps ?? DEFAULT_MAX_STEPS : 1,
      temperature: options.temperature,
      maxTokens: options.max_tokens,
      topP: options.top_p,
      topK: options.top_k,
      frequencyPenalty: options.frequency_penalty,
      presencePenalty: options.presence_penalty,
      seed: options.seed,
    });

    // Vercel AI SDK doesn't expose cost directly, so totalCost stays at 0.
    return {
      text: response.text,
      steps: response.steps.length,
      usage: {
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
      },
    };
  }
}

function toCoreMessage(message: Message): CoreMessage {
  return message.role === 'assistant'
    ? { role: 'assistant', content: message.content }
    : { role: 'user', content: message.content };
}

function toCoreTools(definitions: ToolDefinition[]): Record<string, CoreTool> {
  const tools: Record<string, CoreTool> = {};
  for (const definition of definitions) {
    tools[definition.name] = tool({
      description: definition.description,
      parameters: toolParameters,
      execute: async ({ input }) => definition.execute(input),
    });
  }
  return tools;
}
