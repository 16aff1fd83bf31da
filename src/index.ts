/**
 * skillgraph
 * Builds trees of LLM agents from skill and agent definition files.
 */

export const VERSION = "0.1.0";

export type * from "./types";

export {
  SkillGraphError,
  NotFoundError,
  ParseError,
  ValidationError,
  TemplateError,
  BuildError,
  CyclicReferenceError,
  ConfigError,
  errorMessage,
} from "./errors";

export { logger, log, setLogLevel, getLogLevel, isLogLevel } from "./logger";
export type { LogLevel, LogContext } from "./logger";

export { loadEnvConfig } from "./config";
export type { EnvConfig } from "./config";

export { parseFrontmatter, parseMapping } from "./frontmatter";
export type { Frontmatter } from "./frontmatter";

export { discoverUnit, discoverAllUnits, findUnitByName, listDefinitionFiles } from "./discovery";
export type { DiscoverOptions } from "./discovery";

export {
  DefinitionValidator,
  validateDefinition,
  validateDefinitions,
  RECOMMENDED_MAX_LINES,
  RECOMMENDED_MAX_TOKENS,
} from "./validator";
export type { ValidatorOptions } from "./validator";

export { resolveReference, referenceBase } from "./resolver";
export { renderTemplate, renderUnitInstructions } from "./templating";
export type { RenderOptions } from "./templating";
export { normalizeToolName, toDisplayName, nameRuleViolations } from "./naming";

export { MemoryBuildCache, buildCacheKey } from "./cache";
export type { BuildCache, BuildComposition } from "./cache";

export { AgentGraphBuilder, composeSkillInstructions } from "./builder";
export type { BuilderOptions, BuildOptions } from "./builder";

export { CompositeAgent } from "./agent";
export type { AgentTool, RunOptions, RunResult } from "./agent";

export { loadUnit, loadUnitsFromDirectory, loadAgentsConfig, buildAgentFromPath } from "./loader";
export type { LoadOptions, BuildFromPathOptions } from "./loader";
export { loadAll, resolveEntryUnit } from "./registry";
export type { LoadAllOptions } from "./registry";

export { ProfileManager, resolveModelConfig, parseModelReference } from "./profiles";

export { MemorySessionStore, LocalFileSessionStore, createSessionStore } from "./session";
export type { SessionStore } from "./session";

export { VercelAIBackend, MockLLMBackend, createBackend } from "./llm";
export type {
  BackendFactory,
  LLMBackend,
  LLMBackendConfig,
  LLMOptions,
  LLMResponse,
  Message,
  ToolDefinition,
  MockResponse,
  MockToolCall,
  RecordedCall,
} from "./llm";
