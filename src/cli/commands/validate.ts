import type { CommandModule } from 'yargs';
import { basename, join, resolve } from 'path';
import { existsSync } from 'fs';
import { DefinitionValidator } from '../../validator';
import { SKILL_FILE, isFile, isMetadataFile, stem } from '../../path-utils';
import { formatSummary, formatValidationResult } from '../format';

interface ValidateArgs {
  path: string;
  strict: boolean;
  verbose: boolean;
}

export interface CommandReport {
  lines: string[];
  exitCode: number;
}

/**
 * One skill when `path` is a SKILL.md or a directory holding one, otherwise
 * every definition below `path`.
 */
export function validateReport(path: string, options: { strict?: boolean; verbose?: boolean } = {}): CommandReport {
  const target = resolve(path);
  if (!existsSync(target)) {
    return { lines: [`Error: Path does not exist: ${path}`], exitCode: 1 };
  }

  const validator = new DefinitionValidator({ strict: options.strict ?? false });

  if (isFile(target) || isFile(join(target, SKILL_FILE))) {
    const result = validator.validatePath(target);
    return {
      lines: formatValidationResult(result, resultName(result.path ?? target), options.verbose),
      exitCode: result.isValid ? 0 : 1,
    };
  }

  const results = validator.validateMany(target);
  if (results.length === 0) {
    return { lines: [`No skills found in ${path}`], exitCode: 0 };
  }

  const lines: string[] = [];
  let valid = 0;
  for (const result of results) {
    lines.push(...formatValidationResult(result, result.path ? resultName(result.path) : 'unknown', options.verbose));
    if (result.isValid) valid++;
  }
  const invalid = results.length - valid;
  lines.push('', formatSummary(valid, invalid));
  return { lines, exitCode: invalid > 0 ? 1 : 0 };
}

function resultName(path: string): string {
  return isMetadataFile(path) ? stem(path) : basename(path);
}

export const validateCommand: CommandModule<object, ValidateArgs> = {
  command: 'validate [path]',
  describe: 'Validate a skill or every definition in a directory',
  builder: (yargs) =>
    yargs
      .positional('path', {
        type: 'string',
        description: 'Skill directory, SKILL.md file or directory of definitions',
        default: '.',
      })
      .option('strict', {
        type: 'boolean',
        description: 'Treat warnings as errors',
        default: false,
      })
      .option('verbose', {
        alias: 'v',
        type: 'boolean',
        description: 'Show info messages',
        default: false,
      }),
  handler: (argv) => {
    const report = validateReport(argv.path, { strict: argv.strict, verbose: argv.verbose });
    for (const line of report.lines) {
      console.log(line);
    }
    process.exitCode = report.exitCode;
  },
};
