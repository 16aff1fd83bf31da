/**
 * Loading entry points that gate on validation.
 */

import { readFileSync } from 'fs';
import type { AgentsConfig, DefinitionUnit, TemplateVariables, ValidationResult } from './types';
import type { CompositeAgent } from './agent';
import type { BackendFactory } from './llm';
import { AgentGraphBuilder } from './builder';
import { discoverAllUnits, discoverUnit } from './discovery';
import { loadEnvConfig } from './config';
import { ConfigError, ValidationError, errorMessage } from './errors';
import { parseMapping } from './frontmatter';
import { AgentsConfigSchema, formatZodIssues } from './schemas';
import { DefinitionValidator } from './validator';
import { isFile } from './path-utils';
import { logger } from './logger';

export interface LoadOptions {
  validate?: boolean;
  /** Treat warnings as errors. */
  strict?: boolean;
}

function logWarnings(unit: DefinitionUnit, result: ValidationResult): void {
  for (const warning of result.warnings) {
    logger.warn('Validator', `Definition '${unit.name}': ${warning.message}`, { path: unit.basePath });
  }
}

/**
 * Load one unit, optionally validating it first.
 *
 * @throws NotFoundError / ParseError from discovery
 * @throws ValidationError when validation reports errors
 */
export function loadUnit(path: string, options: LoadOptions = {}): DefinitionUnit {
  const { validate = true, strict = false } = options;
  const unit = discoverUnit(path);
  if (!validate) return unit;

  const result = new DefinitionValidator({ strict }).validateUnit(unit);
  if (!result.isValid) {
    throw new ValidationError(
      `Definition validation failed for '${unit.name}': ${result.errors.map((e) => e.message).join('; ')}`,
      result.errors
    );
  }
  logWarnings(unit, result);
  return unit;
}

/**
 * Load every unit under `dir`, keyed by name. Invalid units are logged and
 * left out; when two units share a name the first one found is kept.
 */
export function loadUnitsFromDirectory(dir: string, options: LoadOptions = {}): Map<string, DefinitionUnit> {
  const { validate = true, strict = false } = options;
  const validator = new DefinitionValidator({ strict });
  const units = new Map<string, DefinitionUnit>();

  for (const unit of discoverAllUnits(dir)) {
    if (validate) {
      const result = validator.validateDiscovered(unit);
      if (!result.isValid) {
        logger.error('Validator', `Skipping invalid definition '${unit.name}'`, {
          path: unit.basePath,
          errors: result.errors.map((e) => e.message),
        });
        continue;
      }
      logWarnings(unit, result);
    }

    const existing = units.get(unit.name);
    if (existing) {
      logger.warn('Discovery', `Duplicate definition name '${unit.name}', keeping the first`, {
        kept: existing.basePath,
        skipped: unit.basePath,
      });
      continue;
    }
    units.set(unit.name, unit);
  }

  logger.info('Discovery', `Loaded ${units.size} definitions`, { path: dir });
  return units;
}

/**
 * Read agents.yaml.
 *
 * @throws ConfigError when the file is missing or does not match the schema
 */
export function loadAgentsConfig(configPath: string): AgentsConfig {
  if (!isFile(configPath)) {
    throw new ConfigError(`Agents configuration not found: ${configPath}`, configPath);
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseMapping(readFileSync(configPath, 'utf-8'), configPath, 'Agents configuration');
  } catch (err) {
    throw new ConfigError(errorMessage(err), configPath, { cause: err });
  }

  const parsed = AgentsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid agents configuration: ${formatZodIssues(parsed.error).join('; ')}`,
      configPath
    );
  }
  return parsed.data;
}

export interface BuildFromPathOptions {
  model?: string;
  variables?: TemplateVariables;
  validate?: boolean;
  backendFactory?: BackendFactory;
}

/**
 * Load, validate and build a single definition with a fresh builder.
 */
export function buildAgentFromPath(path: string, options: BuildFromPathOptions = {}): CompositeAgent {
  const { model, variables = {}, validate = true, backendFactory } = options;
  const unit = loadUnit(path, { validate });
  const builder = new AgentGraphBuilder({ defaultModel: model ?? loadEnvConfig().DEFAULT_MODEL, backendFactory });
  return builder.build(unit, variables, { model });
}
