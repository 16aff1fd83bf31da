export const MAX_NAME_LENGTH = 64;
export const NAME_PATTERN = /^[a-z0-9-]+$/;

/**
 * Rule violations for a skill name, one message per broken rule.
 * An empty name reports only that it is empty.
 */
export function nameRuleViolations(name: string): string[] {
  if (!name) return ['Name cannot be empty'];

  const violations: string[] = [];
  if (name.length > MAX_NAME_LENGTH) {
    violations.push(`Name exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
  }
  if (!NAME_PATTERN.test(name)) {
    violations.push('Name may only contain lowercase letters, numbers, and hyphens');
  }
  if (name.startsWith('-') || name.endsWith('-')) {
    violations.push('Name must not start or end with a hyphen');
  }
  if (name.includes('--')) {
    violations.push('Name must not contain consecutive hyphens');
  }
  return violations;
}

/**
 * Tool name for a sub-agent: lowercased, every space and hyphen replaced by `_`.
 *
 * @example normalizeToolName('Data-Analyzer', 'ask_') // 'ask_data_analyzer'
 */
export function normalizeToolName(name: string, prefix = ''): string {
  return prefix + name.toLowerCase().replace(/[ -]/g, '_');
}

/**
 * Title case with hyphens as spaces. A letter is capitalized when it follows
 * anything that is not a letter, digits included.
 *
 * @example toDisplayName('pdf-reader') // 'Pdf Reader'
 * @example toDisplayName('v2x-tool') // 'V2X Tool'
 */
export function toDisplayName(name: string): string {
  return name
    .replace(/-/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}
