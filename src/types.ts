/**
 * Core data model shared by discovery, validation, building and the registry.
 */

export type DefinitionLayout = "skill" | "sibling";

export interface AuxiliaryDirs {
  scripts?: string;
  references?: string;
  assets?: string;
}

export interface DefinitionUnit {
  name: string;
  description: string;
  /** Raw, unrendered template text. */
  instructions: string;
  basePath: string;
  layout: DefinitionLayout;
  metadataPath: string;
  instructionsPath: string;
  declaredModel?: string;
  subReferences: string[];
  toolDescriptions: Record<string, string>;
  toolNamePrefix: string;
  auxiliaryDirs: AuxiliaryDirs;
  license?: string;
  compatibility?: string;
  allowedTools?: string[];
  metadata: Record<string, unknown>;
}

export type ValidationSeverity = "error" | "warning" | "info";

export interface ValidationIssue {
  message: string;
  severity: ValidationSeverity;
  field?: string;
  line?: number;
}

export interface ValidationResult {
  readonly isValid: boolean;
  readonly issues: readonly ValidationIssue[];
  readonly path?: string;
  readonly errors: readonly ValidationIssue[];
  readonly warnings: readonly ValidationIssue[];
  readonly infos: readonly ValidationIssue[];
}

export type TemplateVariables = Record<string, unknown>;

export interface ModelConfig {
  name: string;
  provider?: string;
  base_url?: string;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  top_k?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  seed?: number;
}

export interface ModelProfileConfig extends Partial<ModelConfig> {
  name: string;
}

export interface ProfilesConfig {
  model_profiles?: Record<string, ModelProfileConfig>;
  default?: string;
  override?: string;
}

/** One entry of the `agents` list in agents.yaml. */
export interface TopLevelAgentEntry {
  name: string;
  skill: string;
  model?: string;
  sub_agents?: string[];
  tool_descriptions?: Record<string, string>;
  variables?: TemplateVariables;
}

export interface AgentsConfig {
  agents: TopLevelAgentEntry[];
  /** Falls back to DEFAULT_MODEL from the environment. */
  default_model?: string;
  skills_directory: string;
}
