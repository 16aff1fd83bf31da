import { existsSync, readdirSync, statSync, type Dirent } from 'fs';
import { basename, extname, join } from 'path';

export const SKILL_FILE = 'SKILL.md';
export const METADATA_EXTENSIONS = ['.yaml', '.yml'];
export const INSTRUCTIONS_EXTENSION = '.md';
export const AUXILIARY_DIRS = ['scripts', 'references', 'assets'] as const;

export function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export function isMetadataFile(path: string): boolean {
  return METADATA_EXTENSIONS.includes(extname(path).toLowerCase());
}

export function stem(path: string): string {
  return basename(path, extname(path));
}

/**
 * Directory entries sorted by name (code unit order), so walks are the same
 * on every filesystem.
 */
export function sortedEntries(dir: string): Dirent[] {
  return readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
}

/**
 * Subdirectories worth descending into. Dot-directories are skipped, and so
 * are a skill's auxiliary directories: their files are resources, not units.
 */
export function childDirectories(dir: string): string[] {
  const auxiliary: readonly string[] = isFile(join(dir, SKILL_FILE)) ? AUXILIARY_DIRS : [];
  return sortedEntries(dir)
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && !auxiliary.includes(entry.name))
    .map((entry) => join(dir, entry.name));
}

/** `<dir>/<name>.yaml` or `<dir>/<name>.yml`, whichever exists first. */
export function findMetadataFile(dir: string, name: string): string | undefined {
  for (const ext of METADATA_EXTENSIONS) {
    const candidate = join(dir, `${name}${ext}`);
    if (isFile(candidate)) return candidate;
  }
  return undefined;
}

/** True when `dir` holds a unit called `name` in either layout. */
export function hasUnitNamed(dir: string, name: string): boolean {
  return findMetadataFile(dir, name) !== undefined || isFile(join(dir, name, SKILL_FILE));
}
