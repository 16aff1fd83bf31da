/**
 * Definition discovery.
 *
 * A definition unit is stored in one of two layouts:
 *
 * - skill: `<dir>/SKILL.md`, YAML frontmatter followed by the instructions.
 * - sibling: `<name>.yaml` (metadata) next to `<name>.md` (instructions).
 *
 * Optional `scripts/`, `references/` and `assets/` directories sit next to the
 * metadata file.
 */

import { readFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import type { AuxiliaryDirs, DefinitionUnit } from './types';
import { NotFoundError, ParseError, errorMessage } from './errors';
import { parseFrontmatter, parseMapping } from './frontmatter';
import { SiblingMetadataSchema, SkillFrontmatterSchema, formatZodIssues } from './schemas';
import {
  AUXILIARY_DIRS,
  INSTRUCTIONS_EXTENSION,
  SKILL_FILE,
  childDirectories,
  findMetadataFile,
  isDirectory,
  isFile,
  isMetadataFile,
  sortedEntries,
  stem,
} from './path-utils';
import { logger } from './logger';

interface UnitLocation {
  layout: DefinitionUnit['layout'];
  basePath: string;
  metadataPath: string;
}

export interface DiscoverOptions {
  recursive?: boolean;
  maxDepth?: number;
}

/**
 * Load a single definition unit.
 *
 * `path` may be a skill directory, a SKILL.md file, a `.yaml` metadata file,
 * a directory `d` containing `d/<basename(d)>.yaml`, or a flat reference `p`
 * for which `<dirname(p)>/<basename(p)>.yaml` exists.
 *
 * @throws NotFoundError when the metadata or instructions file is missing
 * @throws ParseError when the metadata is malformed or fails its schema
 */
export function discoverUnit(path: string): DefinitionUnit {
  const location = locateUnit(resolve(path));
  logger.debug('Discovery', 'Loading definition', { path: location.metadataPath });
  return location.layout === 'skill' ? loadSkill(location) : loadSibling(location);
}

/**
 * Discover every unit below `basePath`. Units that fail to load are logged and
 * skipped, so the result may be partial.
 */
export function discoverAllUnits(basePath: string, options: DiscoverOptions = {}): DefinitionUnit[] {
  const { recursive = true, maxDepth = 3 } = options;
  const root = resolve(basePath);

  if (!isDirectory(root)) {
    logger.warn('Discovery', 'Definitions directory does not exist or is not a directory', { path: root });
    return [];
  }

  const units: DefinitionUnit[] = [];
  for (const candidate of listDefinitionFiles(root, { recursive, maxDepth })) {
    const unit = tryDiscoverUnit(candidate);
    if (unit) units.push(unit);
  }

  logger.info('Discovery', `Discovered ${units.length} definitions`, { path: root });
  return units;
}

/**
 * Metadata files of every unit below `basePath` (SKILL.md files and `.yaml`
 * files with a matching `.md`), in walk order. Nothing is parsed.
 */
export function listDefinitionFiles(basePath: string, options: DiscoverOptions = {}): string[] {
  const { recursive = true, maxDepth = 3 } = options;
  const root = resolve(basePath);
  const candidates: string[] = [];
  if (isDirectory(root)) collectCandidates(root, recursive, maxDepth, 0, candidates);
  return candidates;
}

/**
 * Find a unit by its declared name: `basePath/<name>` first, then a full walk.
 */
export function findUnitByName(name: string, basePath: string): DefinitionUnit | undefined {
  const root = resolve(basePath);
  if (isFile(join(root, name, SKILL_FILE)) || findMetadataFile(root, name)) {
    return discoverUnit(join(root, name));
  }
  return discoverAllUnits(root).find((unit) => unit.name === name);
}

function collectCandidates(
  dir: string,
  recursive: boolean,
  maxDepth: number,
  depth: number,
  out: string[]
): void {
  const skillFile = join(dir, SKILL_FILE);
  if (isFile(skillFile)) out.push(skillFile);

  for (const entry of sortedEntries(dir)) {
    if (!entry.isFile() || !isMetadataFile(entry.name)) continue;
    if (isFile(join(dir, `${stem(entry.name)}${INSTRUCTIONS_EXTENSION}`))) {
      out.push(join(dir, entry.name));
    }
  }

  if (recursive && depth < maxDepth) {
    for (const child of childDirectories(dir)) {
      collectCandidates(child, recursive, maxDepth, depth + 1, out);
    }
  }
}

function tryDiscoverUnit(path: string): DefinitionUnit | undefined {
  try {
    return discoverUnit(path);
  } catch (err) {
    if (err instanceof NotFoundError) {
      logger.warn('Discovery', 'Definition file not found', { path, error: err.message });
    } else if (err instanceof ParseError) {
      logger.error('Discovery', 'Failed to parse definition', { path, error: err.message });
    } else {
      logger.error('Discovery', 'Unexpected error loading definition', { path, error: errorMessage(err) });
    }
    return undefined;
  }
}

function locateUnit(target: string): UnitLocation {
  if (isFile(target)) {
    if (basename(target) === SKILL_FILE) {
      return { layout: 'skill', basePath: dirname(target), metadataPath: target };
    }
    if (isMetadataFile(target)) {
      return { layout: 'sibling', basePath: dirname(target), metadataPath: target };
    }
    const metadataPath = findMetadataFile(dirname(target), stem(target));
    if (metadataPath) {
      return { layout: 'sibling', basePath: dirname(target), metadataPath };
    }
    throw new NotFoundError(`Definition metadata file not found for ${target}`, target);
  }

  const skillFile = join(target, SKILL_FILE);
  if (isDirectory(target) && isFile(skillFile)) {
    return { layout: 'skill', basePath: target, metadataPath: skillFile };
  }

  const name = basename(target);
  const inside = isDirectory(target) ? findMetadataFile(target, name) : undefined;
  if (inside) return { layout: 'sibling', basePath: target, metadataPath: inside };

  const flat = findMetadataFile(dirname(target), name);
  if (flat) return { layout: 'sibling', basePath: dirname(target), metadataPath: flat };

  throw new NotFoundError(
    `Definition metadata file not found: expected ${skillFile} or ${join(target, `${name}.yaml`)}`,
    target
  );
}

function loadSkill(location: UnitLocation): DefinitionUnit {
  const { basePath, metadataPath } = location;
  const { data, body } = parseFrontmatter(readFileSync(metadataPath, 'utf-8'), metadataPath);

  const parsed = SkillFrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ParseError(`Invalid SKILL.md frontmatter: ${issues.join('; ')}`, metadataPath, issues);
  }

  const {
    name,
    description,
    license,
    compatibility,
    metadata,
    'allowed-tools': allowedTools,
    model,
    sub_agents,
    tool_descriptions,
    tool_name_prefix,
    ...extra
  } = parsed.data;

  const dirName = basename(basePath);
  if (name !== dirName) {
    logger.warn('Discovery', `Skill name '${name}' does not match directory name '${dirName}'`, {
      path: metadataPath,
    });
  }

  return {
    name,
    description,
    instructions: body,
    basePath,
    layout: 'skill',
    metadataPath,
    instructionsPath: metadataPath,
    declaredModel: model,
    subReferences: sub_agents ?? [],
    toolDescriptions: tool_descriptions ?? {},
    toolNamePrefix: tool_name_prefix ?? '',
    auxiliaryDirs: findAuxiliaryDirs(basePath),
    license,
    compatibility,
    allowedTools: allowedTools ? allowedTools.split(/\s+/).filter(Boolean) : undefined,
    metadata: { ...(metadata ?? {}), ...extra },
  };
}

function loadSibling(location: UnitLocation): DefinitionUnit {
  const { basePath, metadataPath } = location;
  const fileStem = stem(metadataPath);
  const instructionsPath = join(basePath, `${fileStem}${INSTRUCTIONS_EXTENSION}`);

  if (!isFile(instructionsPath)) {
    throw new NotFoundError(`Agent instructions file not found: ${instructionsPath}`, instructionsPath);
  }

  const raw = parseMapping(readFileSync(metadataPath, 'utf-8'), metadataPath, 'Agent metadata');
  const parsed = SiblingMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ParseError(`Invalid agent metadata: ${issues.join('; ')}`, metadataPath, issues);
  }

  const { name, description, model, sub_agents, tool_descriptions, tool_name_prefix, ...extra } = parsed.data;

  return {
    name: name ?? fileStem,
    description: description ?? '',
    instructions: readFileSync(instructionsPath, 'utf-8'),
    basePath,
    layout: 'sibling',
    metadataPath,
    instructionsPath,
    declaredModel: model,
    subReferences: sub_agents ?? [],
    toolDescriptions: tool_descriptions ?? {},
    toolNamePrefix: tool_name_prefix ?? '',
    auxiliaryDirs: findAuxiliaryDirs(basePath),
    metadata: extra,
  };
}

function findAuxiliaryDirs(basePath: string): AuxiliaryDirs {
  const dirs: AuxiliaryDirs = {};
  for (const kind of AUXILIARY_DIRS) {
    const candidate = join(basePath, kind);
    if (isDirectory(candidate)) dirs[kind] = candidate;
  }
  return dirs;
}
