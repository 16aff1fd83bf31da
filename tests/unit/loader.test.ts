import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { buildAgentFromPath, loadAgentsConfig, loadUnit, loadUnitsFromDirectory } from '../../src/loader';
import { ConfigError, ValidationError } from '../../src/errors';
import { MockLLMBackend } from '../../src/llm';
import { captureLogs, createTempDir, loggedText, removeTempDir, writeFile, writeSkill } from '../fixtures/helpers';

describe('loader', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('loadUnit', () => {
    it('should load a valid skill', () => {
      const unit = loadUnit(writeSkill(root, 'helper'));
      expect(unit.name).toBe('helper');
      expect(unit.layout).toBe('skill');
    });

    it('should reject a skill that fails validation', () => {
      const dir = writeSkill(root, 'good-name', { dirName: 'other' });

      expect(() => loadUnit(dir)).toThrow(ValidationError);
      expect(() => loadUnit(dir)).toThrow(
        "Definition validation failed for 'good-name': Skill name 'good-name' must match directory name 'other'"
      );
    });

    it('should skip validation when asked', () => {
      captureLogs();
      const dir = writeSkill(root, 'good-name', { dirName: 'other' });
      expect(loadUnit(dir, { validate: false }).name).toBe('good-name');
    });

    it('should reject warnings in strict mode', () => {
      const dir = writeSkill(root, 'terse', { description: 'Too short' });

      expect(loadUnit(dir).name).toBe('terse');
      expect(() => loadUnit(dir, { strict: true })).toThrow(ValidationError);
    });
  });

  describe('loadUnitsFromDirectory', () => {
    it('should key units by name and leave out invalid ones', () => {
      const logs = captureLogs();
      writeSkill(root, 'helper');
      writeSkill(root, 'analyzer');
      writeSkill(root, 'good-name', { dirName: 'other' });

      const units = loadUnitsFromDirectory(root);

      expect([...units.keys()]).toEqual(['analyzer', 'helper']);
      expect(loggedText(logs.error)).toContain("Skipping invalid definition 'good-name'");
    });

    it('should keep the first of two units with the same name', () => {
      const logs = captureLogs();
      const first = writeSkill(root, 'dup');
      writeSkill(root, 'dup', { dirName: join('nested', 'dup') });

      const units = loadUnitsFromDirectory(root);

      expect(units.get('dup')?.basePath).toBe(first);
      expect(loggedText(logs.warn)).toContain("Duplicate definition name 'dup', keeping the first");
    });

    it('should keep invalid units when validation is off', () => {
      captureLogs();
      writeSkill(root, 'good-name', { dirName: 'other' });
      expect([...loadUnitsFromDirectory(root, { validate: false }).keys()]).toEqual(['good-name']);
    });
  });

  describe('loadAgentsConfig', () => {
    it('should apply defaults', () => {
      const path = writeFile(join(root, 'agents.yaml'), 'agents:\n  - name: main\n    skill: helper\n');

      expect(loadAgentsConfig(path)).toEqual({
        agents: [{ name: 'main', skill: 'helper' }],
        skills_directory: 'skills',
      });
    });

    it('should reject a missing file', () => {
      const path = join(root, 'agents.yaml');
      expect(() => loadAgentsConfig(path)).toThrow(`Agents configuration not found: ${path}`);
    });

    it('should reject entries without a skill', () => {
      const path = writeFile(join(root, 'agents.yaml'), 'agents:\n  - name: main\n');

      expect(() => loadAgentsConfig(path)).toThrow(ConfigError);
      expect(() => loadAgentsConfig(path)).toThrow('Invalid agents configuration: agents.0.skill: Required');
    });

    it('should wrap YAML errors', () => {
      const path = writeFile(join(root, 'agents.yaml'), 'agents: [unclosed\n');
      expect(() => loadAgentsConfig(path)).toThrow(ConfigError);
    });
  });

  describe('buildAgentFromPath', () => {
    it('should load and build in one step', () => {
      const dir = writeSkill(root, 'helper', { body: 'Help with {{ topic }}.' });

      const agent = buildAgentFromPath(dir, {
        model: 'anthropic/claude-3-5-haiku-latest',
        variables: { topic: 'taxes' },
        backendFactory: () => new MockLLMBackend(),
      });

      expect(agent.name).toBe('Helper');
      expect(agent.model).toEqual({ name: 'claude-3-5-haiku-latest', provider: 'anthropic' });
      expect(agent.instructions.endsWith('Help with taxes.')).toBe(true);
    });

    it('should fall back to DEFAULT_MODEL from the environment', () => {
      vi.stubEnv('DEFAULT_MODEL', 'cerebras/llama-3.3-70b');
      try {
        const agent = buildAgentFromPath(writeSkill(root, 'helper'), { backendFactory: () => new MockLLMBackend() });
        expect(agent.model).toEqual({ name: 'llama-3.3-70b', provider: 'cerebras' });
      } finally {
        vi.unstubAllEnvs();
      }
    });
  });
});
