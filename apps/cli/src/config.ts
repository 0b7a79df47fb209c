/**
 * Runtime configuration from the environment. CLI flags override these.
 *
 *   SHAPEGRAPH_LOG_LEVEL    debug | info | warn | error | silent (default info)
 *   SHAPEGRAPH_NODE_SIZE    node radius in output pixels (default 2)
 *   SHAPEGRAPH_CANVAS_SIZE  longest side of the rendered SVG (default 800)
 *   SHAPEGRAPH_FLOW_COLOR   stroke colour for river flow edges (default blue)
 */

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export interface AppConfig {
  logLevel: LogLevel;
  nodeSize: number;
  canvasSize: number;
  flowColor: string;
}

const EnvSchema = z.object({
  SHAPEGRAPH_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SHAPEGRAPH_NODE_SIZE: z.coerce.number().positive().default(2),
  SHAPEGRAPH_CANVAS_SIZE: z.coerce.number().int().positive().default(800),
  SHAPEGRAPH_FLOW_COLOR: z.string().min(1).default('blue'),
});

export class ConfigError extends Error {
  constructor(public readonly violations: string[]) {
    super(`Invalid configuration:\n${violations.map((v) => `  - ${v}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    logLevel: e.SHAPEGRAPH_LOG_LEVEL,
    nodeSize: e.SHAPEGRAPH_NODE_SIZE,
    canvasSize: e.SHAPEGRAPH_CANVAS_SIZE,
    flowColor: e.SHAPEGRAPH_FLOW_COLOR,
  };
}
