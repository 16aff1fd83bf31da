import { createHash } from 'crypto';
import stableStringify from 'fast-json-stable-stringify';
import { BuildError, errorMessage } from './errors';
import type { TemplateVariables } from './types';

/**
 * Memoization store for built agents. Injected into the builder so tests and
 * concurrent callers can each use their own.
 */
export interface BuildCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  clear(): void;
  readonly size: number;
}

export class MemoryBuildCache<T> implements BuildCache<T> {
  private entries = new Map<string, T>();

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T): void {
    this.entries.set(key, value);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Anything besides the variables that changes what a build produces.
 */
export interface BuildComposition {
  /** Metadata file of the unit, so same-named units in different places differ. */
  source?: string;
  model?: string;
  children?: string[];
  toolDescriptions?: Record<string, string>;
  referenceBase?: string;
}

/**
 * `<name>:<sha256>` where the hash covers the variables and the composition.
 * Key order inside objects does not affect the result.
 *
 * @throws BuildError when the variables cannot be serialized (BigInt values, cycles)
 */
export function buildCacheKey(
  name: string,
  variables: TemplateVariables,
  composition: BuildComposition = {}
): string {
  let serialized: string;
  try {
    serialized = stableStringify({ variables, composition });
  } catch (err) {
    throw new BuildError(`Cannot build cache key for '${name}': ${errorMessage(err)}`, name, { cause: err });
  }
  const digest = createHash('sha256').update(serialized).digest('hex');
  return `${name}:${digest}`;
}
