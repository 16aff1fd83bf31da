/**
 * LLM Backend module exports
 */

import type { ModelConfig } from '../types';
import type { LLMBackend } from './types';
import { VercelAIBackend } from './vercel';

export type { LLMBackend, LLMBackendConfig, LLMOptions, LLMResponse, Message, ToolDefinition } from './types';
export { VercelAIBackend } from './vercel';
export { MockLLMBackend } from './mock';
export type { MockResponse, MockToolCall, RecordedCall } from './mock';

export type BackendFactory = (model: ModelConfig) => LLMBackend;

/** Default factory: one Vercel AI SDK backend per model configuration. */
export const createBackend: BackendFactory = (model) =>
  new VercelAIBackend({ provider: model.provider ?? 'openai', name: model.name, baseURL: model.base_url });
