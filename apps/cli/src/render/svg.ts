import { XMLBuilder } from 'fast-xml-parser';
import type { Graph } from '../graph/graph.js';
import type { EdgeAttributes } from '../types/graph.js';
import { FLOW_EDGE } from '../types/graph.js';
import { bounds } from '../utils/geometry.js';

export interface SvgOptions {
  /** Node radius in output pixels. */
  nodeSize?: number;
  /** Length of the longer side of the drawing area, before padding. */
  canvasSize?: number;
  flowColor?: string;
  edgeColor?: string;
  nodeColor?: string;
}

const PADDING = 10;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  suppressEmptyNode: true,
});

// two decimals keeps files small and output stable across platforms
const fmt = (n: number): string => String(Math.round(n * 100) / 100);

/**
 * Draws the graph with equal axis scaling and the y axis pointing up.
 * Edge stroke width comes from the edge weight, colour from its tag.
 */
export function renderSvg(graph: Graph, options: SvgOptions = {}): string {
  const {
    nodeSize = 2,
    canvasSize = 800,
    flowColor = 'blue',
    edgeColor = 'black',
    nodeColor = '#1f78b4',
  } = options;

  const b = bounds(Array.from(graph.nodes.values(), (n) => n.pos));
  const spanX = b ? b.maxX - b.minX : 0;
  const spanY = b ? b.maxY - b.minY : 0;
  const span = Math.max(spanX, spanY);
  const scale = span > 0 ? canvasSize / span : 1;
  const pad = PADDING + nodeSize;

  const px = (x: number) => pad + (x - (b?.minX ?? 0)) * scale;
  const py = (y: number) => pad + ((b?.maxY ?? 0) - y) * scale;
  const width = spanX * scale + 2 * pad;
  const height = spanY * scale + 2 * pad;

  const stroke = (attributes?: EdgeAttributes) => (attributes?.color === FLOW_EDGE ? flowColor : edgeColor);

  const lines: Array<Record<string, string>> = [];
  for (const edge of graph.edges) {
    const a = graph.position(edge.source);
    const c = graph.position(edge.target);
    if (!a || !c) continue;
    lines.push({
      '@_x1': fmt(px(a.x)),
      '@_y1': fmt(py(a.y)),
      '@_x2': fmt(px(c.x)),
      '@_y2': fmt(py(c.y)),
      '@_stroke': stroke(edge.attributes),
      '@_stroke-width': fmt(edge.attributes?.weight ?? 1),
    });
  }

  const circles = Array.from(graph.nodeEntries(), ([id, pos]) => ({
    '@_data-id': String(id),
    '@_cx': fmt(px(pos.x)),
    '@_cy': fmt(py(pos.y)),
    '@_r': fmt(nodeSize),
    '@_fill': nodeColor,
  }));

  return builder.build({
    svg: {
      '@_xmlns': 'http://www.w3.org/2000/svg',
      '@_width': fmt(width),
      '@_height': fmt(height),
      '@_viewBox': `0 0 ${fmt(width)} ${fmt(height)}`,
      g: [
        { '@_class': 'edges', line: lines },
        { '@_class': 'nodes', circle: circles },
      ],
    },
  });
}
