import { describe, it, expect } from 'vitest';
import { parseFrontmatter, parseMapping } from '../../src/frontmatter';
import { ParseError } from '../../src/errors';

describe('parseFrontmatter', () => {
  it('should split the mapping from the trimmed body', () => {
    const content = '---\nname: pdf-reader\ndescription: Reads PDFs\n---\n\n  Body text.\n\n';
    const { data, body } = parseFrontmatter(content);

    expect(data).toEqual({ name: 'pdf-reader', description: 'Reads PDFs' });
    expect(body).toBe('Body text.');
  });

  it('should keep later delimiter lines in the body', () => {
    const content = '---\nname: a\n---\nfirst\n---\nsecond';
    expect(parseFrontmatter(content).body).toBe('first\n---\nsecond');
  });

  it('should close on a delimiter line with surrounding whitespace', () => {
    expect(parseFrontmatter('---\nname: a\n  ---  \nbody')).toEqual({ data: { name: 'a' }, body: 'body' });
  });

  it('should read documents with Windows line endings', () => {
    expect(parseFrontmatter('---\r\nname: a\r\n---\r\nbody\r\n')).toEqual({ data: { name: 'a' }, body: 'body' });
  });

  it('should return an empty mapping for an empty block', () => {
    expect(parseFrontmatter('---\n---\nbody')).toEqual({ data: {}, body: 'body' });
  });

  it('should reject content without an opening delimiter', () => {
    expect(() => parseFrontmatter('name: a\n---\nbody')).toThrow(
      'SKILL.md must start with YAML frontmatter (---)'
    );
  });

  it('should reject content without a closing delimiter', () => {
    expect(() => parseFrontmatter('---\nname: a\nbody')).toThrow(
      'YAML frontmatter closing delimiter (---) not found'
    );
  });

  it('should reject frontmatter that is not a mapping', () => {
    const attempt = () => parseFrontmatter('---\n- a\n- b\n---\nbody', '/skills/a/SKILL.md');
    expect(attempt).toThrow(ParseError);
    expect(attempt).toThrow('YAML frontmatter must be a mapping');
  });

  it('should carry the path on parse errors', () => {
    try {
      parseFrontmatter('no delimiter', '/skills/a/SKILL.md');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ path: '/skills/a/SKILL.md', name: 'ParseError' });
    }
  });
});

describe('parseMapping', () => {
  it('should wrap YAML syntax errors', () => {
    expect(() => parseMapping('key: [unclosed', 'x.yaml', 'Agent metadata')).toThrow(
      /^Agent metadata is not valid YAML: /
    );
  });

  it('should treat an empty document as an empty mapping', () => {
    expect(parseMapping('', undefined, 'Agent metadata')).toEqual({});
  });
});
