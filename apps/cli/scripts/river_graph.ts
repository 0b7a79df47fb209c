#!/usr/bin/env node
/*
  River network → graph

  Nodes below sea level with no inlets are left out. Every retained node is
  joined to each of its inlets; the edge is drawn in the flow colour with the
  inlet's Strahler order as its width.

  Usage:
    npm run graph:river -- graph rivers.json --out rivers.svg
*/

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runGraphCommand } from '../src/commands/graphCommand.js';
import { commandOptionsFrom, withOutputOptions } from '../src/commands/options.js';
import { reportFailure } from '../src/commands/reportFailure.js';

yargs(hideBin(process.argv))
  .scriptName('river-graph')
  .command(
    'graph <path>',
    'Display the river graph of a generated map',
    (y) => withOutputOptions(y.positional('path', { type: 'string', demandOption: true, desc: 'River JSON document' })),
    (argv) => {
      runGraphCommand(commandOptionsFrom('river', argv));
    }
  )
  .demandCommand(1, 'Choose a command')
  .strict()
  .fail(false)
  .parseAsync()
  .catch((err: unknown) => reportFailure('RIVER', err));
