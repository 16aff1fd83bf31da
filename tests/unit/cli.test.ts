import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { agentsReport } from '../../src/cli/commands/agents';
import { listReport } from '../../src/cli/commands/list';
import { validateReport } from '../../src/cli/commands/validate';
import { formatSummary, formatUnitListing } from '../../src/cli/format';
import { discoverUnit } from '../../src/discovery';
import {
  DEFAULT_DESCRIPTION,
  captureLogs,
  createTempDir,
  removeTempDir,
  writeFile,
  writeSiblingAgent,
  writeSkill,
} from '../fixtures/helpers';

const SHORT_WARNING =
  'Description is very short. Consider adding more detail about what the skill does and when to use it.';

describe('cli', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
    captureLogs();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('validate', () => {
    it('should report a single valid skill', () => {
      const dir = writeSkill(root, 'helper');
      expect(validateReport(dir)).toEqual({ lines: ['✓ helper: valid'], exitCode: 0 });
    });

    it('should accept a SKILL.md path', () => {
      const dir = writeSkill(root, 'helper');
      expect(validateReport(join(dir, 'SKILL.md')).lines).toEqual(['✓ helper: valid']);
    });

    it('should report every definition in a directory with a summary', () => {
      writeSkill(root, 'helper');
      writeSkill(root, 'good-name', { dirName: 'other' });
      writeSkill(root, 'terse', { description: 'Too short' });

      expect(validateReport(root)).toEqual({
        lines: [
          '✓ helper: valid',
          '✗ other: invalid',
          "  ERROR [name]: Skill name 'good-name' must match directory name 'other'",
          '✓ terse: valid',
          `  WARNING [description]: ${SHORT_WARNING}`,
          '',
          'Summary: 2 valid, 1 invalid',
        ],
        exitCode: 1,
      });
    });

    it('should turn warnings into errors in strict mode', () => {
      const dir = writeSkill(root, 'terse', { description: 'Too short' });

      expect(validateReport(dir, { strict: true })).toEqual({
        lines: [
          '✗ terse: invalid',
          `  ERROR [description]: [Strict] ${SHORT_WARNING}`,
          `  WARNING [description]: ${SHORT_WARNING}`,
        ],
        exitCode: 1,
      });
    });

    it('should show infos only when verbose', () => {
      const dir = writeSkill(root, 'meta', { fields: { metadata: { author: 'someone' } } });

      expect(validateReport(dir).lines).toEqual(['✓ meta: valid']);
      expect(validateReport(dir, { verbose: true }).lines).toEqual([
        '✓ meta: valid',
        "  INFO [metadata]: Consider adding 'version' to metadata",
      ]);
    });

    it('should name sibling-layout agents by their metadata file', () => {
      writeSiblingAgent(root, 'writer');
      expect(validateReport(root).lines).toEqual(['✓ writer: valid', '', 'Summary: 1 valid, 0 invalid']);
    });

    it('should report a missing path', () => {
      const missing = join(root, 'missing');
      expect(validateReport(missing)).toEqual({ lines: [`Error: Path does not exist: ${missing}`], exitCode: 1 });
    });

    it('should report an empty directory', () => {
      expect(validateReport(root)).toEqual({ lines: [`No skills found in ${root}`], exitCode: 0 });
    });
  });

  describe('list', () => {
    it('should list definitions with their details', () => {
      writeSkill(root, 'analyzer', {
        fields: { license: 'MIT', compatibility: 'Node 20', sub_agents: ['helper'] },
      });
      writeSkill(root, 'helper');

      expect(listReport(root)).toEqual({
        lines: [
          'Found 2 definition(s):',
          '',
          '  analyzer',
          `    Description: ${DEFAULT_DESCRIPTION}`,
          '    License: MIT',
          '    Compatibility: Node 20',
          '    Sub-agents: helper',
          '',
          '  helper',
          `    Description: ${DEFAULT_DESCRIPTION}`,
          '',
        ],
        exitCode: 0,
      });
    });

    it('should report an empty directory', () => {
      expect(listReport(root)).toEqual({ lines: [`No skills found in ${root}`], exitCode: 0 });
    });

    it('should report a missing path', () => {
      expect(listReport(join(root, 'nope')).exitCode).toBe(1);
    });
  });

  describe('agents', () => {
    it('should show each agent with its model and tools', () => {
      writeSkill(join(root, 'skills'), 'orchestrator', { fields: { sub_agents: ['helper'] } });
      writeSkill(join(root, 'skills'), 'helper');
      const configPath = writeFile(join(root, 'agents.yaml'), 'agents:\n  - name: main\n    skill: orchestrator\n');

      expect(agentsReport(configPath)).toEqual({
        lines: [
          'Loaded 1 agent(s):',
          '',
          '  main (Orchestrator) model=openai/gpt-4.1-mini',
          `    tool helper: ${DEFAULT_DESCRIPTION}`,
          '',
        ],
        exitCode: 0,
      });
    });

    it('should report configuration errors', () => {
      const configPath = join(root, 'agents.yaml');
      expect(agentsReport(configPath)).toEqual({
        lines: [`Error: Agents configuration not found: ${configPath}`],
        exitCode: 1,
      });
    });
  });

  describe('format', () => {
    it('should shorten long descriptions', () => {
      const dir = writeSkill(root, 'wordy', { description: 'x'.repeat(100) });
      expect(formatUnitListing([discoverUnit(dir)])[3]).toBe(`    Description: ${'x'.repeat(80)}...`);
    });

    it('should summarize counts', () => {
      expect(formatSummary(3, 0)).toBe('Summary: 3 valid, 0 invalid');
    });
  });
});
