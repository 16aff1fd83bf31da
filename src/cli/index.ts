#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadEnvConfig } from '../config';
import { setLogLevel } from '../logger';
import { validateCommand } from './commands/validate';
import { listCommand } from './commands/list';
import { agentsCommand } from './commands/agents';

setLogLevel(loadEnvConfig().LOG_LEVEL);

yargs(hideBin(process.argv))
  .scriptName('skillgraph')
  .usage('$0 <command> [options]')
  .command(validateCommand)
  .command(listCommand)
  .command(agentsCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parse();
