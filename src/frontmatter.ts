import matter from 'gray-matter';
import * as yaml from 'yaml';
import { ParseError, errorMessage } from './errors';

export const FRONTMATTER_DELIMITER = '---';

export interface Frontmatter {
  data: Record<string, unknown>;
  body: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a markdown document into its YAML frontmatter mapping and trimmed body.
 *
 * ```
 * ---
 * name: pdf-reader
 * ---
 * Body text...
 * ```
 */
export function parseFrontmatter(content: string, path?: string): Frontmatter {
  if (!content.startsWith(FRONTMATTER_DELIMITER)) {
    throw new ParseError('SKILL.md must start with YAML frontmatter (---)', path);
  }

  const lines = content.split('\n');
  const close = lines.findIndex((line, index) => index > 0 && line.trim() === FRONTMATTER_DELIMITER);
  if (close === -1) {
    throw new ParseError('YAML frontmatter closing delimiter (---) not found', path);
  }

  // gray-matter closes on the first line that starts with the delimiter.
  const normalized = [...lines.slice(0, close), FRONTMATTER_DELIMITER, ...lines.slice(close + 1)].join('\n');
  const { data, content: body } = matter(normalized, {
    engines: { yaml: (text: string) => parseMapping(text, path, 'YAML frontmatter') },
  });

  return { data, body: body.trim() };
}

/**
 * Parse YAML text that must be a mapping. Empty documents yield `{}`.
 */
export function parseMapping(text: string, path: string | undefined, label: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new ParseError(`${label} is not valid YAML: ${errorMessage(err)}`, path, [], { cause: err });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ParseError(`${label} must be a mapping`, path);
  }
  return parsed;
}
