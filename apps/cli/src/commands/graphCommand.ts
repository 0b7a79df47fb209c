import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, type AppConfig } from '../config.js';
import { discover } from '../discovery/index.js';
import { GraphBuilder } from '../graph/builder.js';
import type { Graph } from '../graph/graph.js';
import { toNodeLink } from '../graph/nodeLink.js';
import { loadDocument } from '../io/loadDocument.js';
import { renderSvg } from '../render/svg.js';
import type { DocumentKind, GraphDiagnostic } from '../types/graph.js';
import { createLogger, type LogLevel } from '../utils/logger.js';

export type OutputFormat = 'svg' | 'json';

export interface GraphCommandOptions {
  path: string;
  kind: DocumentKind;
  /** Output file; `-` writes to stdout. Defaults to `<input name>.<format>` in the working directory. */
  out?: string;
  format?: OutputFormat;
  nodeSize?: number;
  logLevel?: LogLevel;
}

export interface GraphCommandResult {
  graph: Graph;
  /** Where the output went, or null for stdout. */
  outPath: string | null;
}

const TAGS: Record<DocumentKind, string> = { nested: 'POLY', river: 'RIVER', town: 'TOWN' };
const PROGRESS_EVERY = 10_000;
const MAX_LISTED_DIAGNOSTICS = 20;

export function describeDiagnostic(d: GraphDiagnostic): string {
  switch (d.kind) {
    case 'dangling-reference':
      return `dropped ${d.origin} edge (${d.source}, ${d.target}): node ${d.missing} is not in the graph`;
    case 'node-redefined':
      return `node ${d.id} redefined: (${d.previous.x}, ${d.previous.y}) -> (${d.current.x}, ${d.current.y})`;
  }
}

const defaultOutPath = (input: string, format: OutputFormat): string =>
  path.resolve(`${path.parse(input).name}.${format}`);

/**
 * Load → discover → build → render. Anything thrown by the core reaches the
 * caller unchanged; diagnostics are logged as warnings.
 */
export function runGraphCommand(options: GraphCommandOptions, config: AppConfig = loadConfig()): GraphCommandResult {
  const format = options.format ?? 'svg';
  const toStdout = options.out === '-';
  const log = createLogger(TAGS[options.kind], {
    level: options.logLevel ?? config.logLevel,
    stderrOnly: toStdout,
  });

  log.info(`Loading ${options.path}...`);
  const doc = loadDocument(options.path);

  const builder = new GraphBuilder();
  let records = 0;
  for (const entity of discover(doc, { expect: options.kind })) {
    builder.add(entity);
    if (++records % PROGRESS_EVERY === 0) log.debug(`Adding records... ${records}`);
  }
  log.info(`Discovered ${records} records`);

  const graph = builder.build();
  log.info(`Graph: ${graph.order} nodes, ${graph.size} edges`);

  graph.diagnostics.slice(0, MAX_LISTED_DIAGNOSTICS).forEach((d) => log.warn(describeDiagnostic(d)));
  if (graph.diagnostics.length > MAX_LISTED_DIAGNOSTICS) {
    log.warn(`...and ${graph.diagnostics.length - MAX_LISTED_DIAGNOSTICS} more diagnostics`);
  }

  const output =
    format === 'json'
      ? `${JSON.stringify(toNodeLink(graph), null, 2)}\n`
      : renderSvg(graph, {
          nodeSize: options.nodeSize ?? config.nodeSize,
          canvasSize: config.canvasSize,
          flowColor: config.flowColor,
        });

  if (toStdout) {
    process.stdout.write(output);
    return { graph, outPath: null };
  }

  const outPath = options.out ? path.resolve(options.out) : defaultOutPath(options.path, format);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, output);
  log.info(`Output: ${outPath}`);
  return { graph, outPath };
}
