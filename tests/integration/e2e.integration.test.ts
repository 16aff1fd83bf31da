import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { loadAll } from '../../src/registry';
import { validateDefinitions } from '../../src/validator';
import { MockLLMBackend } from '../../src/llm';
import { LocalFileSessionStore } from '../../src/session';
import { ProfileManager } from '../../src/profiles';
import { DEFAULT_DESCRIPTION, createTempDir, removeTempDir, writeFile, writeSkill } from '../fixtures/helpers';

const AGENTS = `
skills_directory: skills
agents:
  - name: reporter
    skill: orchestrator
    variables:
      dataset: sales
    tool_descriptions:
      helper: Gathers background notes
`;

describe('skill tree end to end', () => {
  let root: string;
  let backend: MockLLMBackend;

  beforeEach(() => {
    root = createTempDir();
    ProfileManager.clearCache();

    const skills = join(root, 'skills');
    writeSkill(skills, 'orchestrator', {
      body: 'Produce a report on {{ dataset }} using your tools.',
      fields: { sub_agents: ['helper', 'data-analyzer'] },
    });
    writeSkill(skills, 'helper', { body: 'Collect notes about {{ dataset }}.' });
    const analyzer = writeSkill(skills, 'data-analyzer', {
      body: 'Analyze {{ dataset }}.\n\n{% include "method.md" %}',
    });
    writeFile(join(analyzer, 'references', 'method.md'), 'Use medians.');
    writeFile(join(root, 'agents.yaml'), AGENTS);

    // One queue for the whole tree: the parent's reply is taken before its tools run.
    backend = new MockLLMBackend([
      {
        content: 'Report ready',
        toolCalls: [
          { tool: 'helper', input: 'gather notes' },
          { tool: 'data_analyzer', input: 'crunch numbers' },
        ],
      },
      { content: 'notes gathered' },
      { content: 'numbers crunched' },
    ]);
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should validate every skill in the tree', () => {
    const results = validateDefinitions(join(root, 'skills'));
    expect(results.map((r) => r.isValid)).toEqual([true, true, true]);
  });

  it('should load, build and run the configured agent', async () => {
    const agents = loadAll(join(root, 'agents.yaml'), {}, { backendFactory: () => backend });
    const reporter = agents.get('reporter');
    if (!reporter) throw new Error('reporter was not built');

    expect(reporter.name).toBe('Orchestrator');
    expect(reporter.tools.map((t) => [t.name, t.description])).toEqual([
      ['helper', 'Gathers background notes'],
      ['data_analyzer', DEFAULT_DESCRIPTION],
    ]);

    const sessions = new LocalFileSessionStore(join(root, '.sessions'));
    const result = await reporter.run('Prepare the report', { sessionId: 'e2e', sessions });

    expect(result.output).toBe('Report ready');
    expect(backend.calls).toHaveLength(3);
    expect(backend.calls[0].toolResults).toEqual(['notes gathered', 'numbers crunched']);
    expect(backend.calls[1].messages).toEqual([
      { role: 'system', content: expect.stringContaining('Collect notes about sales.') },
      { role: 'user', content: 'gather notes' },
    ]);
    expect(backend.calls[2].messages[0].content).toMatch(
      /---\n\nAnalyze sales\.\n\nUse medians\.\n\n## Available Resources\n\n\*\*References:\*\*\n- `references\/method\.md`\n$/
    );
    expect(await sessions.list('e2e')).toEqual([
      { role: 'user', content: 'Prepare the report' },
      { role: 'assistant', content: 'Report ready' },
    ]);
  });
});
