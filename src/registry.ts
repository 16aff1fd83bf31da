/**
 * Top-level registry: builds every agent listed in agents.yaml.
 *
 * One entry failing to resolve or build is logged and left out of the
 * result; the others still load.
 */

import { basename, dirname, isAbsolute, join, resolve } from 'path';
import type { DefinitionUnit, TemplateVariables, TopLevelAgentEntry } from './types';
import type { CompositeAgent } from './agent';
import type { BuildCache } from './cache';
import type { BackendFactory } from './llm';
import { AgentGraphBuilder } from './builder';
import { discoverUnit, findUnitByName } from './discovery';
import { loadEnvConfig } from './config';
import { errorMessage } from './errors';
import { loadAgentsConfig, loadUnitsFromDirectory } from './loader';
import { ProfileManager } from './profiles';
import { SKILL_FILE, findMetadataFile, isFile } from './path-utils';
import { logger } from './logger';

export interface LoadAllOptions {
  /** Overrides `skills_directory` from the configuration. */
  skillsDirectory?: string;
  validate?: boolean;
  profiles?: ProfileManager;
  backendFactory?: BackendFactory;
  cache?: BuildCache<CompositeAgent>;
}

/**
 * Load agents.yaml and build each configured agent.
 *
 * @param overrideVariables - merged over each entry's variables
 * @throws ConfigError only when the configuration file itself is unusable
 */
export function loadAll(
  configPath: string,
  overrideVariables: TemplateVariables = {},
  options: LoadAllOptions = {}
): Map<string, CompositeAgent> {
  const config = loadAgentsConfig(configPath);
  const configDir = dirname(resolve(configPath));
  const skillsDirectory = resolve(options.skillsDirectory ?? join(configDir, config.skills_directory));

  const known = loadUnitsFromDirectory(skillsDirectory, { validate: options.validate ?? true, strict: false });
  const builder = new AgentGraphBuilder({
    defaultModel: config.default_model ?? loadEnvConfig().DEFAULT_MODEL,
    profiles: options.profiles ?? ProfileManager.getInstance(configDir),
    backendFactory: options.backendFactory,
    cache: options.cache,
  });

  const agents = new Map<string, CompositeAgent>();
  for (const entry of config.agents) {
    const agent = buildEntry(entry, known, skillsDirectory, builder, overrideVariables);
    if (agent) agents.set(entry.name, agent);
  }

  logger.info('Registry', `Loaded ${agents.size} top-level agents`, { configured: config.agents.length });
  return agents;
}

function buildEntry(
  entry: TopLevelAgentEntry,
  known: Map<string, DefinitionUnit>,
  skillsDirectory: string,
  builder: AgentGraphBuilder,
  overrideVariables: TemplateVariables
): CompositeAgent | undefined {
  let root: DefinitionUnit | undefined;
  try {
    root = resolveEntryUnit(entry.skill, known, skillsDirectory);
  } catch (err) {
    logger.error('Registry', `Failed to load skill '${entry.skill}' for agent '${entry.name}'`, {
      error: errorMessage(err),
    });
    return undefined;
  }
  if (!root) {
    logger.error('Registry', `Skill '${entry.skill}' not found for agent '${entry.name}'`, { skillsDirectory });
    return undefined;
  }

  let children: DefinitionUnit[] | undefined;
  if (entry.sub_agents) {
    children = [];
    for (const reference of entry.sub_agents) {
      const child = tryResolve(reference, known, skillsDirectory, entry.name);
      if (child) {
        children.push(child);
      } else {
        logger.warn('Registry', `Sub-agent '${reference}' not found for agent '${entry.name}'`);
      }
    }
  }

  try {
    return builder.build(
      root,
      { ...entry.variables, ...overrideVariables },
      { model: entry.model, children, toolDescriptions: entry.tool_descriptions }
    );
  } catch (err) {
    logger.error('Registry', `Failed to build agent '${entry.name}'`, { error: errorMessage(err) });
    return undefined;
  }
}

function tryResolve(
  reference: string,
  known: Map<string, DefinitionUnit>,
  skillsDirectory: string,
  entryName: string
): DefinitionUnit | undefined {
  try {
    return resolveEntryUnit(reference, known, skillsDirectory);
  } catch (err) {
    logger.warn('Registry', `Failed to load sub-agent '${reference}' for agent '${entryName}'`, {
      error: errorMessage(err),
    });
    return undefined;
  }
}

/**
 * Name in the pre-loaded set, then a path (absolute, or relative to the
 * skills directory), then a search by name.
 */
export function resolveEntryUnit(
  reference: string,
  known: Map<string, DefinitionUnit>,
  skillsDirectory: string
): DefinitionUnit | undefined {
  const byName = known.get(reference);
  if (byName) return byName;

  const path = isAbsolute(reference) ? reference : join(skillsDirectory, reference);
  if (holdsUnit(path)) return discoverUnit(path);

  return findUnitByName(reference, skillsDirectory);
}

function holdsUnit(path: string): boolean {
  return (
    isFile(join(path, SKILL_FILE)) ||
    findMetadataFile(path, basename(path)) !== undefined ||
    findMetadataFile(dirname(path), basename(path)) !== undefined
  );
}
