/**
 * CompositeAgent: a rendered definition bound to a model, with its built
 * children exposed as tools.
 */

import type { DefinitionUnit, ModelConfig } from './types';
import type { LLMBackend, LLMOptions, Message, ToolDefinition } from './llm/types';
import type { BackendFactory } from './llm';
import type { SessionStore } from './session';
import { normalizeToolName } from './naming';
import { logger } from './logger';

export interface AgentTool extends ToolDefinition {
  agent: CompositeAgent;
}

export interface RunOptions {
  sessionId?: string;
  sessions?: SessionStore;
  maxSteps?: number;
}

export interface RunResult {
  output: string;
  /** The messages sent to the model followed by its reply. */
  messages: Message[];
}

export interface CompositeAgentInit {
  name: string;
  instructions: string;
  model: ModelConfig;
  tools?: AgentTool[];
  unit: DefinitionUnit;
  backendFactory: BackendFactory;
}

export class CompositeAgent {
  readonly name: string;
  readonly instructions: string;
  readonly model: ModelConfig;
  readonly tools: readonly AgentTool[];
  readonly unit: DefinitionUnit;

  private readonly backendFactory: BackendFactory;
  private backend: LLMBackend | undefined;

  constructor(init: CompositeAgentInit) {
    this.name = init.name;
    this.instructions = init.instructions;
    this.model = init.model;
    this.tools = Object.freeze([...(init.tools ?? [])]);
    this.unit = init.unit;
    this.backendFactory = init.backendFactory;
  }

  /**
   * Send `input` to the model with this agent's instructions and tools.
   * With a session, earlier turns are replayed and this turn is appended.
   */
  async run(input: string, options: RunOptions = {}): Promise<RunResult> {
    const { sessionId, sessions, maxSteps } = options;
    const session = sessionId !== undefined && sessions ? { id: sessionId, store: sessions } : undefined;

    const history = session ? await session.store.list(session.id) : [];
    const messages: Message[] = [
      { role: 'system', content: this.instructions },
      ...history,
      { role: 'user', content: input },
    ];

    logger.debug('Agent', `Running ${this.name}`, { model: this.model.name, tools: this.tools.length });
    const output = await this.getBackend().call(messages, {
      ...modelOptions(this.model),
      tools: [...this.tools],
      maxSteps,
    });

    const reply: Message = { role: 'assistant', content: output };
    if (session) {
      await session.store.append(session.id, { role: 'user', content: input });
      await session.store.append(session.id, reply);
    }

    return { output, messages: [...messages, reply] };
  }

  /**
   * Wrap this agent as a tool another agent can call.
   */
  asTool(
    name = normalizeToolName(this.unit.name),
    description = this.unit.description || `Tool for ${this.unit.name}`
  ): AgentTool {
    return {
      name,
      description,
      agent: this,
      execute: async (input: string): Promise<string> => {
        logger.debug('Agent', `Tool ${name} called`, { agent: this.name });
        const result = await this.run(input);
        return result.output;
      },
    };
  }

  private getBackend(): LLMBackend {
    if (!this.backend) {
      this.backend = this.backendFactory(this.model);
    }
    return this.backend;
  }
}

function modelOptions(model: ModelConfig): LLMOptions {
  return {
    temperature: model.temperature,
    max_tokens: model.max_tokens,
    top_p: model.top_p,
    top_k: model.top_k,
    frequency_penalty: model.frequency_penalty,
    presence_penalty: model.presence_penalty,
    seed: model.seed,
  };
}
