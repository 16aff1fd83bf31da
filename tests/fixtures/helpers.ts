import { vi } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import yaml from 'yaml'

/**
 * Create an empty scratch directory for one test
 */
export function createTempDir(prefix = 'skillgraph-'): string {
  return mkdtempSync(join(tmpdir(), prefix))
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

/**
 * Write a file, creating parent directories as needed
 */
export function writeFile(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, content)
  return path
}

export interface SkillFixture {
  description?: string
  body?: string
  /** Directory name when it should differ from the skill name */
  dirName?: string
  /** Extra frontmatter fields */
  fields?: Record<string, unknown>
}

export const DEFAULT_DESCRIPTION =
  'Helps with test tasks by following the instructions below in order.'

/**
 * Write `<root>/<dirName>/SKILL.md` and return the skill directory
 */
export function writeSkill(root: string, name: string, fixture: SkillFixture = {}): string {
  const dir = join(root, fixture.dirName ?? name)
  const frontmatter = yaml.stringify({
    name,
    description: fixture.description ?? DEFAULT_DESCRIPTION,
    ...fixture.fields,
  })
  writeFile(join(dir, 'SKILL.md'), `---\n${frontmatter}---\n\n${fixture.body ?? `You are ${name}.`}\n`)
  return dir
}

/**
 * Write `<dir>/<name>.yaml` and `<dir>/<name>.md` and return the metadata path
 */
export function writeSiblingAgent(
  dir: string,
  name: string,
  metadata: Record<string, unknown> = {},
  instructions = `You are ${name}.`
): string {
  writeFile(join(dir, `${name}.md`), instructions)
  return writeFile(join(dir, `${name}.yaml`), yaml.stringify({ name, ...metadata }))
}

/**
 * Replace console output with spies so log lines can be asserted on
 */
export function captureLogs() {
  return {
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
  }
}

/** All messages written to a console spy, joined by newlines */
export function loggedText(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => call.map(String).join(' ')).join('\n')
}
