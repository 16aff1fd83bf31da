/**
 * LLM Backend Types
 *
 * These types abstract over different LLM providers.
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A function the model may call. Every tool takes a single free-text input.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  execute(input: string): Promise<string>;
}

export interface LLMOptions {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  top_k?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  seed?: number;
  tools?: ToolDefinition[];
  /** Upper bound on model round trips when tools are called. */
  maxSteps?: number;
}

export interface LLMResponse {
  text: string;
  /** Model round trips taken, tool calls included. */
  steps: number;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

/**
 * Abstraction over LLM providers.
 */
export interface LLMBackend {
  /** Total cost accumulated across all calls. */
  totalCost: number;

  /** Total API calls made. */
  totalApiCalls: number;

  /**
   * Call LLM and return content string.
   */
  call(messages: Message[], options?: LLMOptions): Promise<string>;

  /**
   * Call LLM and return the response with step and usage details.
   */
  callRaw(messages: Message[], options?: LLMOptions): Promise<LLMResponse>;
}

/**
 * Configuration for creating an LLM backend.
 */
export interface LLMBackendConfig {
  provider: string;
  name: string;
  apiKey?: string;
  baseURL?: string;
}
