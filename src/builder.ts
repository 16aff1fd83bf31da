/**
 * Graph builder.
 *
 * Turns a definition unit into a CompositeAgent whose sub-references are
 * built recursively and attached as tools. A build either returns a complete
 * tree or throws: there are no partial results.
 */

import type { DefinitionUnit, TemplateVariables } from './types';
import { CompositeAgent, type AgentTool } from './agent';
import { MemoryBuildCache, buildCacheKey, type BuildCache } from './cache';
import { discoverUnit } from './discovery';
import { CyclicReferenceError } from './errors';
import { createBackend, type BackendFactory } from './llm';
import { normalizeToolName, toDisplayName } from './naming';
import { ProfileManager } from './profiles';
import { referenceBase, resolveReference } from './resolver';
import { renderUnitInstructions } from './templating';
import { isDirectory, sortedEntries } from './path-utils';
import { logger } from './logger';

export interface BuilderOptions {
  /** Model reference used when neither the call nor the unit names one. */
  defaultModel?: string;
  cache?: BuildCache<CompositeAgent>;
  profiles?: ProfileManager;
  backendFactory?: BackendFactory;
}

export interface BuildOptions {
  /** Model reference taking precedence over the unit's own. */
  model?: string;
  /** Already-loaded children, used instead of the unit's sub-references. */
  children?: DefinitionUnit[];
  /** Merged over the unit's tool descriptions. */
  toolDescriptions?: Record<string, string>;
  /** Directory the unit's sub-references resolve from. */
  referenceBase?: string;
}

const RESOURCE_SECTIONS = [
  ['scripts', 'Scripts'],
  ['references', 'References'],
  ['assets', 'Assets'],
] as const;

function unitIdentity(unit: DefinitionUnit): string {
  return `${unit.basePath}#${unit.name}`;
}

export class AgentGraphBuilder {
  readonly defaultModel: string;
  private readonly cache: BuildCache<CompositeAgent>;
  private readonly profiles: ProfileManager;
  private readonly backendFactory: BackendFactory;

  constructor(options: BuilderOptions = {}) {
    this.defaultModel = options.defaultModel ?? 'gpt-4.1-mini';
    this.cache = options.cache ?? new MemoryBuildCache<CompositeAgent>();
    this.profiles = options.profiles ?? new ProfileManager();
    this.backendFactory = options.backendFactory ?? createBackend;
  }

  /**
   * Build `unit` and everything it references. Every node in the tree is
   * rendered with the same variables.
   *
   * @throws NotFoundError when a sub-reference cannot be found
   * @throws CyclicReferenceError when a unit references one of its ancestors
   * @throws TemplateError when instructions fail to render
   */
  build(unit: DefinitionUnit, variables: TemplateVariables = {}, options: BuildOptions = {}): CompositeAgent {
    return this.buildNode(unit, variables, options, []);
  }

  clearCache(): void {
    this.cache.clear();
    logger.debug('Builder', 'Cleared agent cache');
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private buildNode(
    unit: DefinitionUnit,
    variables: TemplateVariables,
    options: BuildOptions,
    ancestors: DefinitionUnit[]
  ): CompositeAgent {
    const cacheKey = buildCacheKey(unit.name, variables, {
      source: unit.metadataPath,
      model: options.model,
      children: options.children?.map(unitIdentity),
      toolDescriptions: options.toolDescriptions,
      referenceBase: options.referenceBase,
    });
    const cached = this.cache.get(cacheKey);
    if (cached) {
      logger.debug('Builder', `Returning cached agent for ${unit.name}`);
      return cached;
    }

    const identity = unitIdentity(unit);
    const cycleStart = ancestors.findIndex((ancestor) => unitIdentity(ancestor) === identity);
    if (cycleStart !== -1) {
      throw new CyclicReferenceError([...ancestors.slice(cycleStart), unit].map((u) => u.name));
    }

    const rendered = renderUnitInstructions(unit, variables);
    const instructions = unit.layout === 'skill' ? composeSkillInstructions(unit, rendered) : rendered;
    const model = this.profiles.resolveModelConfig(options.model ?? unit.declaredModel ?? this.defaultModel);

    const children = options.children ?? this.loadChildren(unit, options.referenceBase ?? referenceBase(unit));
    // A Map, so child names such as `constructor` never hit Object.prototype.
    const descriptions = new Map(Object.entries({ ...unit.toolDescriptions, ...options.toolDescriptions }));
    const lineage = [...ancestors, unit];

    const tools: AgentTool[] = children.map((child) => {
      const agent = this.buildNode(child, variables, {}, lineage);
      const toolName = normalizeToolName(child.name, unit.toolNamePrefix);
      logger.debug('Builder', `Added sub-agent '${child.name}' as tool '${toolName}'`, { parent: unit.name });
      return agent.asTool(toolName, descriptions.get(child.name) || child.description || `Tool for ${child.name}`);
    });

    const agent = new CompositeAgent({
      name: unit.layout === 'skill' ? toDisplayName(unit.name) : unit.name,
      instructions,
      model,
      tools,
      unit,
      backendFactory: this.backendFactory,
    });

    this.cache.set(cacheKey, agent);
    logger.info('Builder', `Built agent '${agent.name}'`, { definition: unit.name, tools: tools.length });
    return agent;
  }

  private loadChildren(unit: DefinitionUnit, base: string): DefinitionUnit[] {
    return unit.subReferences.map((reference) => discoverUnit(resolveReference(reference, base)));
  }
}

/**
 * Header with the skill's name and description, then the rendered body,
 * then a listing of its auxiliary files.
 */
export function composeSkillInstructions(unit: DefinitionUnit, rendered: string): string {
  const parts = [`# ${unit.name}`, '', `**Description**: ${unit.description}`, ''];

  if (unit.compatibility) {
    parts.push(`**Compatibility**: ${unit.compatibility}`, '');
  }

  parts.push('---', '', rendered);

  const { auxiliaryDirs } = unit;
  if (auxiliaryDirs.scripts || auxiliaryDirs.references || auxiliaryDirs.assets) {
    parts.push('', '## Available Resources', '');

    for (const [kind, title] of RESOURCE_SECTIONS) {
      const dir = auxiliaryDirs[kind];
      if (!dir || !isDirectory(dir)) continue;
      const files = sortedEntries(dir).map((entry) => entry.name);
      if (files.length === 0) continue;

      parts.push(`**${title}:**`);
      for (const file of files) {
        parts.push(`- \`${kind}/${file}\``);
      }
      parts.push('');
    }
  }

  return parts.join('\n');
}
