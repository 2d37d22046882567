#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { parseCommand } from './commands/parse';

yargs(hideBin(process.argv))
  .scriptName('docsection')
  .usage('$0 <command> [options]')
  .command(parseCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parse();
