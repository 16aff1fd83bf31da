/**
 * Definition validator.
 *
 * Reports problems instead of throwing: a missing or unreadable file becomes an
 * error issue. Warnings never affect `isValid` unless strict mode promotes them.
 */

import { readFileSync } from 'fs';
import { basename, extname, join, resolve } from 'path';
import type { DefinitionUnit, ValidationIssue, ValidationResult, ValidationSeverity } from './types';
import { discoverUnit, listDefinitionFiles } from './discovery';
import { errorMessage } from './errors';
import { isRecord, parseFrontmatter } from './frontmatter';
import { nameRuleViolations } from './naming';
import { MAX_COMPATIBILITY_LENGTH, MAX_DESCRIPTION_LENGTH, characterLength } from './schemas';
import { SKILL_FILE, isDirectory, isFile, sortedEntries } from './path-utils';

export const RECOMMENDED_MAX_LINES = 500;
export const RECOMMENDED_MAX_TOKENS = 5000;
export const SHORT_DESCRIPTION_LENGTH = 50;

const SCRIPT_EXTENSIONS = ['.py', '.sh', '.bash', '.js', '.ts'];
const REFERENCE_EXTENSIONS = ['.md', '.txt', '.json', '.yaml', '.yml'];

export interface ValidatorOptions {
  /** Append an error for every warning. */
  strict?: boolean;
  maxBodyLines?: number;
  maxBodyTokens?: number;
}

/**
 * Collects issues during a single validation call.
 */
class IssueCollector {
  private readonly issues: ValidationIssue[] = [];
  private valid = true;

  constructor(private readonly path?: string) {}

  add(severity: ValidationSeverity, message: string, field?: string, line?: number): void {
    const issue: ValidationIssue = { message, severity };
    if (field !== undefined) issue.field = field;
    if (line !== undefined) issue.line = line;
    this.issues.push(issue);
    if (severity === 'error') this.valid = false;
  }

  error(message: string, field?: string, line?: number): void {
    this.add('error', message, field, line);
  }

  warning(message: string, field?: string, line?: number): void {
    this.add('warning', message, field, line);
  }

  info(message: string, field?: string, line?: number): void {
    this.add('info', message, field, line);
  }

  bySeverity(severity: ValidationSeverity): ValidationIssue[] {
    return this.issues.filter((issue) => issue.severity === severity);
  }

  finish(): ValidationResult {
    const issues = Object.freeze(this.issues.map((issue) => Object.freeze({ ...issue })));
    const pick = (severity: ValidationSeverity) => Object.freeze(issues.filter((i) => i.severity === severity));
    const result: ValidationResult = {
      isValid: this.valid,
      issues,
      errors: pick('error'),
      warnings: pick('warning'),
      infos: pick('info'),
    };
    return Object.freeze(this.path === undefined ? result : { ...result, path: this.path });
  }
}

export class DefinitionValidator {
  readonly strict: boolean;
  private readonly maxBodyLines: number;
  private readonly maxBodyTokens: number;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
    this.maxBodyLines = options.maxBodyLines ?? RECOMMENDED_MAX_LINES;
    this.maxBodyTokens = options.maxBodyTokens ?? RECOMMENDED_MAX_TOKENS;
  }

  /**
   * Validate the unit stored at `path` (a skill directory, a SKILL.md file or a
   * sibling-layout metadata location).
   */
  validatePath(path: string): ValidationResult {
    const target = resolve(path);
    const skillDir = basename(target) === SKILL_FILE && isFile(target) ? resolve(target, '..') : target;
    const result = new IssueCollector(skillDir);

    if (isDirectory(skillDir) && isFile(join(skillDir, SKILL_FILE))) {
      this.checkSkillDirectory(skillDir, result);
    } else {
      this.checkOtherLocation(target, result);
    }

    return this.finish(result);
  }

  /**
   * Validate an already-loaded unit. Name rules and the name/directory match
   * only apply to skills.
   */
  validateUnit(unit: DefinitionUnit): ValidationResult {
    // Sibling-layout units share their directory, so report the metadata file.
    const result = new IssueCollector(unit.layout === 'skill' ? unit.basePath : unit.metadataPath);

    if (unit.layout === 'skill') {
      this.checkName(unit.name, result);
      this.checkDirectoryMatch(unit.name, unit.basePath, result);
    }
    if (unit.layout === 'skill' || unit.description) this.checkDescription(unit.description, result);
    if (unit.compatibility) this.checkCompatibility(unit.compatibility, result);
    this.checkBody(unit.instructions, result, unit.layout === 'skill' ? `${SKILL_FILE} body` : undefined);

    return this.finish(result);
  }

  /**
   * Validate every definition file found under `directory`, including ones
   * discovery would skip as unparseable.
   */
  validateMany(directory: string, options: { recursive?: boolean } = {}): ValidationResult[] {
    return listDefinitionFiles(directory, { recursive: options.recursive ?? true }).map((file) =>
      this.validatePath(file)
    );
  }

  /**
   * Validate a unit discovery returned: skills are re-read from disk so their
   * raw frontmatter and auxiliary directories are checked too.
   */
  validateDiscovered(unit: DefinitionUnit): ValidationResult {
    return unit.layout === 'skill' ? this.validatePath(unit.basePath) : this.validateUnit(unit);
  }

  private finish(result: IssueCollector): ValidationResult {
    if (this.strict) {
      for (const warning of result.bySeverity('warning')) {
        result.error(`[Strict] ${warning.message}`, warning.field, warning.line);
      }
    }
    return result.finish();
  }

  private checkSkillDirectory(skillDir: string, result: IssueCollector): void {
    const skillFile = join(skillDir, SKILL_FILE);

    let content: string;
    try {
      content = readFileSync(skillFile, 'utf-8');
    } catch (err) {
      result.error(`Failed to read ${SKILL_FILE}: ${errorMessage(err)}`);
      return;
    }

    let data: Record<string, unknown>;
    let body: string;
    try {
      ({ data, body } = parseFrontmatter(content, skillFile));
    } catch (err) {
      result.error(errorMessage(err));
      return;
    }

    this.checkFrontmatter(data, skillDir, result);
    this.checkBody(body, result, `${SKILL_FILE} body`);
    this.checkAuxiliaryDirectories(skillDir, result);
  }

  private checkOtherLocation(target: string, result: IssueCollector): void {
    if (!isFile(target) && !isDirectory(target)) {
      // Flat sibling references point at a path that need not exist itself.
      if (!isFile(`${target}.yaml`) && !isFile(`${target}.yml`)) {
        result.error(`Definition path does not exist: ${target}`);
        return;
      }
    }

    let unit: DefinitionUnit;
    try {
      unit = discoverUnit(target);
    } catch (err) {
      result.error(errorMessage(err));
      return;
    }

    // Sibling-layout agents may leave the description out.
    if (unit.description) this.checkDescription(unit.description, result);
    this.checkBody(unit.instructions, result);
    this.checkAuxiliaryDirectories(unit.basePath, result);
  }

  private checkFrontmatter(data: Record<string, unknown>, skillDir: string, result: IssueCollector): void {
    if (!('name' in data)) {
      result.error("Required field 'name' is missing", 'name');
    } else if (typeof data.name !== 'string') {
      result.error('Name must be a string', 'name');
    } else {
      this.checkName(data.name, result);
      this.checkDirectoryMatch(data.name, skillDir, result);
    }

    if (!('description' in data)) {
      result.error("Required field 'description' is missing", 'description');
    } else if (typeof data.description !== 'string') {
      result.error('Description must be a string', 'description');
    } else {
      this.checkDescription(data.description, result);
    }

    if ('compatibility' in data) {
      if (typeof data.compatibility === 'string') {
        this.checkCompatibility(data.compatibility, result);
      } else {
        result.error('Compatibility must be a string', 'compatibility');
      }
    }

    if ('metadata' in data) this.checkMetadata(data.metadata, result);

    if ('allowed-tools' in data && typeof data['allowed-tools'] !== 'string') {
      result.error('allowed-tools must be a space-delimited string', 'allowed-tools');
    }
  }

  private checkName(name: string, result: IssueCollector): void {
    for (const message of nameRuleViolations(name)) {
      result.error(message, 'name');
    }
  }

  private checkDirectoryMatch(name: string, dir: string, result: IssueCollector): void {
    const dirName = basename(dir);
    if (name !== dirName) {
      result.error(`Skill name '${name}' must match directory name '${dirName}'`, 'name');
    }
  }

  private checkDescription(description: string, result: IssueCollector): void {
    if (!description) {
      result.error('Description cannot be empty', 'description');
      return;
    }

    const length = characterLength(description);
    if (length > MAX_DESCRIPTION_LENGTH) {
      result.error(
        `Description exceeds maximum length of ${MAX_DESCRIPTION_LENGTH} characters`,
        'description'
      );
    }

    if (length < SHORT_DESCRIPTION_LENGTH) {
      result.warning(
        'Description is very short. Consider adding more detail about what the skill does and when to use it.',
        'description'
      );
    }
  }

  private checkCompatibility(compatibility: string, result: IssueCollector): void {
    if (characterLength(compatibility) > MAX_COMPATIBILITY_LENGTH) {
      result.error(
        `Compatibility exceeds maximum length of ${MAX_COMPATIBILITY_LENGTH} characters`,
        'compatibility'
      );
    }
  }

  private checkMetadata(metadata: unknown, result: IssueCollector): void {
    if (!isRecord(metadata)) {
      result.error('Metadata must be a mapping', 'metadata');
      return;
    }
    if (!('author' in metadata)) result.info("Consider adding 'author' to metadata", 'metadata');
    if (!('version' in metadata)) result.info("Consider adding 'version' to metadata", 'metadata');
  }

  private checkBody(body: string, result: IssueCollector, label = 'Instructions body'): void {
    if (!body.trim()) {
      result.warning(`${label} is empty. Consider adding instructions.`, 'body');
      return;
    }

    const lineCount = body.split('\n').length;
    if (lineCount > this.maxBodyLines) {
      result.warning(
        `${label} has ${lineCount} lines. Consider keeping under ${this.maxBodyLines} lines and moving detailed content to references/.`,
        'body'
      );
    }

    // ~4 characters per token
    const estimatedTokens = Math.floor(body.length / 4);
    if (estimatedTokens > this.maxBodyTokens) {
      result.warning(
        `${label} is approximately ${estimatedTokens} tokens. Consider keeping under ${this.maxBodyTokens} tokens.`,
        'body'
      );
    }
  }

  private checkAuxiliaryDirectories(dir: string, result: IssueCollector): void {
    const scripts = join(dir, 'scripts');
    if (isFile(scripts)) {
      result.error("'scripts' must be a directory");
    } else if (isDirectory(scripts)) {
      this.checkExtensions(scripts, SCRIPT_EXTENSIONS, result, (file) =>
        `Script '${file}' has unrecognized extension. Supported: ${SCRIPT_EXTENSIONS.join(', ')}`
      );
    }

    const references = join(dir, 'references');
    if (isFile(references)) {
      result.error("'references' must be a directory");
    } else if (isDirectory(references)) {
      this.checkExtensions(references, REFERENCE_EXTENSIONS, result, (file) =>
        `Reference file '${file}' has unusual extension. Consider using .md for documentation.`
      );
    }

    if (isFile(join(dir, 'assets'))) {
      result.error("'assets' must be a directory");
    }
  }

  private checkExtensions(
    dir: string,
    allowed: string[],
    result: IssueCollector,
    message: (file: string) => string
  ): void {
    for (const entry of sortedEntries(dir)) {
      if (!entry.isFile()) continue;
      if (!allowed.includes(extname(entry.name).toLowerCase())) {
        result.info(message(entry.name));
      }
    }
  }
}

export function validateDefinition(path: string, strict = false): ValidationResult {
  return new DefinitionValidator({ strict }).validatePath(path);
}

export function validateDefinitions(directory: string, strict = false, recursive = true): ValidationResult[] {
  return new DefinitionValidator({ strict }).validateMany(directory, { recursive });
}
