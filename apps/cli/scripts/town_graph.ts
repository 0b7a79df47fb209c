#!/usr/bin/env node
/*
  Town nodes/edges → graph

  Reads `nodes.elements` and `edges.elements` ([record, rect] pairs keyed by
  id). Edges to nodes that do not exist are dropped with a warning.

  Usage:
    npm run graph:town -- town.json --out town.svg
*/

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runGraphCommand } from '../src/commands/graphCommand.js';
import { commandOptionsFrom, withOutputOptions } from '../src/commands/options.js';
import { reportFailure } from '../src/commands/reportFailure.js';

yargs(hideBin(process.argv))
  .scriptName('town-graph')
  .command(
    '$0 <path>',
    'Render the street graph of a town document',
    (y) => withOutputOptions(y.positional('path', { type: 'string', demandOption: true, desc: 'Town JSON document' })),
    (argv) => {
      runGraphCommand(commandOptionsFrom('town', argv));
    }
  )
  .strict()
  .fail(false)
  .parseAsync()
  .catch((err: unknown) => reportFailure('TOWN', err));
