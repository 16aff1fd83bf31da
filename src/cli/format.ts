import type { DefinitionUnit, ValidationIssue, ValidationResult } from '../types';
import type { CompositeAgent } from '../agent';

const DESCRIPTION_PREVIEW = 80;

function issueLine(label: string, issue: ValidationIssue): string {
  const field = issue.field ? ` [${issue.field}]` : '';
  return `  ${label}${field}: ${issue.message}`;
}

/**
 * Status line followed by one line per issue. Infos only when `showInfo`.
 */
export function formatValidationResult(result: ValidationResult, name: string, showInfo = false): string[] {
  const lines = [result.isValid ? `✓ ${name}: valid` : `✗ ${name}: invalid`];
  lines.push(...result.errors.map((issue) => issueLine('ERROR', issue)));
  lines.push(...result.warnings.map((issue) => issueLine('WARNING', issue)));
  if (showInfo) {
    lines.push(...result.infos.map((issue) => issueLine('INFO', issue)));
  }
  return lines;
}

export function formatSummary(valid: number, invalid: number): string {
  return `Summary: ${valid} valid, ${invalid} invalid`;
}

function preview(text: string): string {
  return text.length > DESCRIPTION_PREVIEW ? `${text.slice(0, DESCRIPTION_PREVIEW)}...` : text;
}

export function formatUnitListing(units: DefinitionUnit[]): string[] {
  const lines = [`Found ${units.length} definition(s):`, ''];
  for (const unit of units) {
    lines.push(`  ${unit.name}`);
    if (unit.description) lines.push(`    Description: ${preview(unit.description)}`);
    if (unit.license) lines.push(`    License: ${unit.license}`);
    if (unit.compatibility) lines.push(`    Compatibility: ${unit.compatibility}`);
    if (unit.subReferences.length) lines.push(`    Sub-agents: ${unit.subReferences.join(', ')}`);
    lines.push('');
  }
  return lines;
}

export function formatAgents(agents: Map<string, CompositeAgent>): string[] {
  const lines = [`Loaded ${agents.size} agent(s):`, ''];
  for (const [key, agent] of agents) {
    const provider = agent.model.provider ? `${agent.model.provider}/` : '';
    lines.push(`  ${key} (${agent.name}) model=${provider}${agent.model.name}`);
    for (const tool of agent.tools) {
      lines.push(`    tool ${tool.name}: ${preview(tool.description)}`);
    }
    lines.push('');
  }
  return lines;
}
