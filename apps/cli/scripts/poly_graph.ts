#!/usr/bin/env node
/*
  Polygons / points → graph

  Walks any JSON document for `exterior` rings and bare {x, y} points, builds
  the graph (one node per ring point, ring edges closing each polygon) and
  renders it.

  Usage:
    npm run graph:poly -- shapes.json --out shapes.svg
    npm run graph:poly -- shapes.json --format json --out -
*/

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runGraphCommand } from '../src/commands/graphCommand.js';
import { commandOptionsFrom, withOutputOptions } from '../src/commands/options.js';
import { reportFailure } from '../src/commands/reportFailure.js';

yargs(hideBin(process.argv))
  .scriptName('poly-graph')
  .command(
    '$0 <path>',
    'Discover polygons and points in a JSON document and render their graph',
    (y) => withOutputOptions(y.positional('path', { type: 'string', demandOption: true, desc: 'JSON document' })),
    (argv) => {
      runGraphCommand(commandOptionsFrom('nested', argv));
    }
  )
  .strict()
  .fail(false)
  .parseAsync()
  .catch((err: unknown) => reportFailure('POLY', err));
