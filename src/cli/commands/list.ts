import type { CommandModule } from 'yargs';
import { existsSync } from 'fs';
import { discoverAllUnits } from '../../discovery';
import { formatUnitListing } from '../format';
import type { CommandReport } from './validate';

interface ListArgs {
  path: string;
}

export function listReport(path: string): CommandReport {
  if (!existsSync(path)) {
    return { lines: [`Error: Path does not exist: ${path}`], exitCode: 1 };
  }

  const units = discoverAllUnits(path);
  if (units.length === 0) {
    return { lines: [`No skills found in ${path}`], exitCode: 0 };
  }
  return { lines: formatUnitListing(units), exitCode: 0 };
}

export const listCommand: CommandModule<object, ListArgs> = {
  command: 'list [path]',
  describe: 'List discovered definitions',
  builder: (yargs) =>
    yargs.positional('path', {
      type: 'string',
      description: 'Directory containing definitions',
      default: '.',
    }),
  handler: (argv) => {
    const report = listReport(argv.path);
    for (const line of report.lines) {
      console.log(line);
    }
    process.exitCode = report.exitCode;
  },
};
