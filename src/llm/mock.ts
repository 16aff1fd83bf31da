/**
 * MockLLMBackend - Mock backend for testing
 *
 * Provides predictable responses for testing without hitting real APIs.
 */

import type { LLMBackend, LLMOptions, LLMResponse, Message } from './types';

export interface MockToolCall {
  tool: string;
  input: string;
}

export interface MockResponse {
  content: string;
  /** Tools to execute, in order, before `content` is returned. */
  toolCalls?: MockToolCall[];
}

export interface RecordedCall {
  messages: Message[];
  options: LLMOptions;
  /** Outputs of the tools the response asked for. */
  toolResults: string[];
}

export class MockLLMBackend implements LLMBackend {
  totalCost = 0;
  totalApiCalls = 0;
  readonly calls: RecordedCall[] = [];

  private responses: MockResponse[];
  private responseIndex = 0;
  private defaultResponse: MockResponse;

  /**
   * Create a mock backend with predefined responses.
   *
   * @param responses - Array of responses to return in order
   * @param defaultResponse - Response to use when responses are exhausted
   */
  constructor(responses: MockResponse[] = [], defaultResponse: MockResponse = { content: 'mock' }) {
    this.responses = responses;
    this.defaultResponse = defaultResponse;
  }

  async call(messages: Message[], options?: LLMOptions): Promise<string> {
    const response = await this.callRaw(messages, options);
    return response.text;
  }

  async callRaw(messages: Message[], options: LLMOptions = {}): Promise<LLMResponse> {
    this.totalApiCalls++;

    const response = this.responseIndex < this.responses.length
      ? this.responses[this.responseIndex++]
      : this.defaultResponse;

    const recorded: RecordedCall = { messages: [...messages], options, toolResults: [] };
    this.calls.push(recorded);

    for (const call of response.toolCalls ?? []) {
      const target = options.tools?.find((t) => t.name === call.tool);
      if (!target) {
        throw new Error(`Mock response requested unknown tool '${call.tool}'`);
      }
      recorded.toolResults.push(await target.execute(call.input));
    }

    return { text: response.content, steps: 1 + (response.toolCalls?.length ?? 0) };
  }

  /**
   * Reset the response index to start from the beginning.
   */
  reset(): void {
    this.responseIndex = 0;
    this.totalApiCalls = 0;
    this.totalCost = 0;
    this.calls.length = 0;
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responses.push(...responses);
  }
}
