import type { Argv } from 'yargs';
import { z } from 'zod';
import type { DocumentKind } from '../types/graph.js';
import { LOG_LEVELS } from '../utils/logger.js';
import type { GraphCommandOptions } from './graphCommand.js';

/** Output flags shared by every graph script. */
export const withOutputOptions = <T>(y: Argv<T>) =>
  y
    .option('out', { alias: 'o', type: 'string', desc: 'Output file ("-" for stdout). Defaults to <input name>.<format>' })
    .option('format', { type: 'string', choices: ['svg', 'json'], default: 'svg', desc: 'Output format' })
    .option('node-size', { type: 'number', desc: 'Node radius in pixels (SVG only)' })
    .option('log-level', { type: 'string', choices: LOG_LEVELS, desc: 'Log verbosity' });

const RawArgsSchema = z.object({
  path: z.string().min(1),
  out: z.string().optional(),
  format: z.enum(['svg', 'json']).default('svg'),
  'node-size': z.number().positive().optional(),
  'log-level': z.enum(LOG_LEVELS).optional(),
});

/** Maps parsed yargs arguments onto command options. */
export function commandOptionsFrom(kind: DocumentKind, argv: Record<string, unknown>): GraphCommandOptions {
  const args = RawArgsSchema.parse(argv);
  return {
    kind,
    path: args.path,
    out: args.out,
    format: args.format,
    nodeSize: args['node-size'],
    logLevel: args['log-level'],
  };
}
