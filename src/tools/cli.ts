#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { generateIdsCommand } from './commands/generate-ids';
import { sendEventsCommand } from './commands/send-events';

yargs(hideBin(process.argv))
  .scriptName('epc-tools')
  .command(sendEventsCommand)
  .command(generateIdsCommand)
  .demandCommand(1)
  .strict()
  .help()
  .alias('help', 'h')
  .parse();
