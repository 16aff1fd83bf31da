import type { CommandModule } from 'yargs';
import { loadEnvConfig } from '../../config';
import { errorMessage } from '../../errors';
import { ProfileManager } from '../../profiles';
import { loadAll } from '../../registry';
import { formatAgents } from '../format';
import type { CommandReport } from './validate';

interface AgentsArgs {
  config: string;
  skills?: string;
  profiles?: string;
}

export function agentsReport(
  configPath: string,
  options: { skillsDirectory?: string; profilesFile?: string } = {}
): CommandReport {
  try {
    const agents = loadAll(configPath, {}, {
      skillsDirectory: options.skillsDirectory,
      profiles: options.profilesFile ? new ProfileManager(options.profilesFile) : undefined,
    });
    return { lines: formatAgents(agents), exitCode: 0 };
  } catch (err) {
    return { lines: [`Error: ${errorMessage(err)}`], exitCode: 1 };
  }
}

export const agentsCommand: CommandModule<object, AgentsArgs> = {
  command: 'agents <config>',
  describe: 'Build the agents listed in an agents.yaml and show their tools',
  builder: (yargs) =>
    yargs
      .positional('config', {
        type: 'string',
        description: 'Path to agents.yaml',
        demandOption: true,
      })
      .option('skills', {
        type: 'string',
        description: 'Skills directory (defaults to skills_directory from the config)',
      })
      .option('profiles', {
        type: 'string',
        description: 'Path to profiles.yml (defaults to SKILLGRAPH_PROFILES)',
      }),
  handler: (argv) => {
    const report = agentsReport(argv.config, {
      skillsDirectory: argv.skills,
      profilesFile: argv.profiles ?? loadEnvConfig().SKILLGRAPH_PROFILES,
    });
    for (const line of report.lines) {
      console.log(line);
    }
    process.exitCode = report.exitCode;
  },
};
