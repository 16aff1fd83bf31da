import { existsSync } from 'fs';
import { basename, dirname, isAbsolute, join } from 'path';
import type { DefinitionUnit } from './types';
import { childDirectories, findMetadataFile, hasUnitNamed, isDirectory } from './path-utils';
import { logger } from './logger';

/**
 * Resolve a sub-agent reference to a location `discoverUnit` can load.
 *
 * Resolution order, first match wins:
 * 1. an absolute path is used as is;
 * 2. a reference containing a path separator is tried as `base/ref`, then as
 *    `base/ref.yaml` (returning that file's directory joined with the last segment);
 * 3. a unit named `ref` directly inside `base`;
 * 4. a depth-first search of `base`'s subdirectories, in name order;
 * 5. otherwise `base/ref`, so that loading it reports what is missing.
 */
export function resolveReference(reference: string, base: string): string {
  if (isAbsolute(reference)) return reference;

  if (reference.includes('/') || reference.includes('\\')) {
    const relative = join(base, reference);
    if (existsSync(relative)) return relative;

    const metadata = findMetadataFile(dirname(relative), basename(relative));
    if (metadata) return join(dirname(metadata), lastSegment(reference));
  }

  if (hasUnitNamed(base, reference)) return join(base, reference);

  const found = searchSubdirectories(base, reference);
  if (found) {
    logger.debug('Resolver', `Resolved '${reference}' by search`, { base, path: found });
    return found;
  }

  return join(base, reference);
}

/**
 * Directory a unit's own sub-references resolve from: the unit's directory for
 * sibling-layout agents, the directory holding the skill for skills.
 */
export function referenceBase(unit: DefinitionUnit): string {
  return unit.layout === 'skill' ? dirname(unit.basePath) : unit.basePath;
}

function searchSubdirectories(dir: string, name: string): string | undefined {
  if (!isDirectory(dir)) return undefined;
  for (const child of childDirectories(dir)) {
    if (hasUnitNamed(child, name)) return join(child, name);
    const nested = searchSubdirectories(child, name);
    if (nested) return nested;
  }
  return undefined;
}

function lastSegment(reference: string): string {
  const parts = reference.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? reference;
}
