import dagre from 'dagre';
import type { CompiledWorkflow, GraphNode } from '../compiler/graph.ts';
import { STEP_SECTIONS } from '../parser/schema.ts';

export interface DiagramNode {
  id: string;
  label: string;
  kind: Exclude<GraphNode['kind'], 'jump'>;
  /** Mermaid class */
  style: 'shell' | 'ai' | 'human' | 'control' | 'action';
}

export interface DiagramEdge {
  from: string;
  to: string;
  label?: string;
  dotted: boolean;
}

export interface DiagramGroup {
  id: string;
  title: string;
  nodes: DiagramNode[];
}

export interface Diagram {
  groups: DiagramGroup[];
  edges: DiagramEdge[];
}

function safeId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, '_');
}

function styleOf(node: GraphNode): DiagramNode['style'] {
  if (node.kind !== 'action') return 'control';
  const uses = node.step.uses;
  if (uses === undefined || uses === 'run' || uses.startsWith('script/')) return 'shell';
  if (uses.startsWith('llm/')) return 'ai';
  if (uses.startsWith('human/')) return 'human';
  return 'action';
}

function labelOf(node: Exclude<GraphNode, { kind: 'jump' }>): string {
  switch (node.kind) {
    case 'action':
      return `${node.stepId}\n${node.step.uses ?? 'run'}`;
    case 'branch':
      return `if ${String(node.condition)}`;
    case 'loop_head':
      return `loop ${node.stepId}`;
    case 'loop_tail':
      return node.breakIf === null ? `next ${node.stepId}` : `break_if ${String(node.breakIf)}`;
  }
}

/**
 * Flatten a compiled workflow into boxes and arrows. Jump nodes become the edges they stand for.
 */
export function buildDiagram(compiled: CompiledWorkflow): Diagram {
  const groups: DiagramGroup[] = [];
  const edges: DiagramEdge[] = [];

  for (const graph of [...compiled.jobs, compiled.document]) {
    const owner = graph.job ?? 'workflow';
    for (const section of STEP_SECTIONS) {
      const segment = graph.segments[section];
      if (segment.order.length === 0) continue;

      // Follow jumps to the node they land on
      const resolve = (id: string | null): { id: string; via?: string } | null => {
        if (id === null) return null;
        const node = segment.nodes[id];
        if (node?.kind !== 'jump') return { id };
        return node.target === null ? null : { id: node.target, via: node.reason };
      };
      const link = (from: string, to: string | null, label?: string, dotted = false): void => {
        const target = resolve(to);
        if (!target) return;
        const viaLabel = target.via === 'loop_back' ? 'next item' : undefined;
        const edgeLabel = label ?? viaLabel;
        edges.push({
          from: safeId(from),
          to: safeId(target.id),
          ...(edgeLabel !== undefined ? { label: edgeLabel } : {}),
          dotted: dotted || target.via === 'loop_back',
        });
      };

      const nodes: DiagramNode[] = [];
      for (const id of segment.order) {
        const node = segment.nodes[id];
        if (!node || node.kind === 'jump') continue;
        nodes.push({ id: safeId(node.id), label: labelOf(node), kind: node.kind, style: styleOf(node) });

        switch (node.kind) {
          case 'action':
            link(node.id, node.next);
            link(node.id, node.onFailure, 'failure', true);
            link(node.id, node.guardrailTarget, 'guardrail', true);
            break;
          case 'branch':
            link(node.id, node.next, 'yes');
            link(node.id, node.onFalse, 'no');
            break;
          case 'loop_head':
            link(node.id, node.next, 'each');
            link(node.id, node.exit, 'done');
            link(node.id, node.onFailure, 'failure', true);
            break;
          case 'loop_tail':
            link(node.id, node.next);
            if (node.breakIf !== null) link(node.id, node.exit, 'break');
            break;
        }
      }
      groups.push({ id: `${safeId(owner)}__${section}`, title: `${owner}: ${section}`, nodes });
    }
  }
  return { groups, edges };
}

function quote(text: string): string {
  return `"${text.replace(/"/g, '#quot;').replace(/\n/g, '\\n')}"`;
}

const SHAPES: Record<DiagramNode['kind'], [string, string]> = {
  action: ['[', ']'],
  branch: ['{', '}'],
  loop_head: ['[[', ']]'],
  loop_tail: ['([', '])'],
};

export function generateMermaidGraph(compiled: CompiledWorkflow): string {
  const diagram = buildDiagram(compiled);
  const lines = ['flowchart TD'];

  for (const group of diagram.groups) {
    lines.push(`  subgraph ${group.id}[${quote(group.title)}]`);
    for (const node of group.nodes) {
      const [open, close] = SHAPES[node.kind];
      lines.push(`    ${node.id}${open}${quote(node.label)}${close}:::${node.style}`);
    }
    lines.push('  end');
  }

  for (const edge of diagram.edges) {
    if (edge.label === undefined) {
      lines.push(`  ${edge.from} ${edge.dotted ? '-.->' : '-->'} ${edge.to}`);
    } else if (edge.dotted) {
      lines.push(`  ${edge.from} -. ${edge.label} .-> ${edge.to}`);
    } else {
      lines.push(`  ${edge.from} -- ${edge.label} --> ${edge.to}`);
    }
  }

  lines.push('  classDef ai fill:#e1f5fe,stroke:#01579b,stroke-width:2px;');
  lines.push('  classDef human fill:#fff3e0,stroke:#e65100,stroke-width:2px,stroke-dasharray: 5 5;');
  lines.push('  classDef shell fill:#f3e5f5,stroke:#4a148c,stroke-width:1px;');
  lines.push('  classDef control fill:#f5f5f5,stroke:#616161,stroke-width:1px;');
  lines.push('  classDef action fill:#fff,stroke:#333,stroke-width:1px;');

  return lines.join('\n');
}

/**
 * Renders a compiled workflow as ASCII boxes laid out by dagre
 */
export function renderWorkflowAsAscii(compiled: CompiledWorkflow): string {
  const diagram = buildDiagram(compiled);
  const g = new dagre.graphlib.Graph();
  g.setGraph({ rankdir: 'TB', nodesep: 2, edgesep: 1, ranksep: 4 });
  g.setDefaultEdgeLabel(() => ({}));

  const nodeHeight = 3;
  for (const group of diagram.groups) {
    for (const node of group.nodes) {
      const label = node.label.replace(/\n/g, ' (') + (node.kind === 'action' ? ')' : '');
      g.setNode(node.id, { label, width: Math.max(16, label.length + 4), height: nodeHeight });
    }
  }
  for (const edge of diagram.edges) {
    // Loop-back edges would turn the layout upside down
    if (edge.label === 'next item') continue;
    g.setEdge(edge.from, edge.to);
  }
  if (g.nodeCount() === 0) return '';

  dagre.layout(g);

  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  const extend = (x: number, y: number): void => {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  };
  for (const v of g.nodes()) {
    const node = g.node(v);
    extend(node.x - node.width / 2, node.y - node.height / 2);
    extend(node.x + node.width / 2, node.y + node.height / 2);
  }
  for (const e of g.edges()) {
    for (const point of g.edge(e).points) extend(point.x, point.y);
  }

  const width = Math.ceil(maxX - minX) + 10;
  const height = Math.ceil(maxY - minY) + 4;
  const canvas: string[][] = Array.from({ length: height }, () => new Array<string>(width).fill(' '));
  const offsetX = Math.floor(-minX) + 2;
  const offsetY = Math.floor(-minY) + 1;

  const draw = (x: number, y: number, char: string): void => {
    const row = canvas[Math.floor(y) + offsetY];
    const ix = Math.floor(x) + offsetX;
    if (row && ix >= 0 && ix < row.length) row[ix] = char;
  };

  for (const e of g.edges()) {
    const points = g.edge(e).points;
    for (let i = 0; i < points.length - 1; i++) {
      const x1 = Math.floor(points[i].x);
      const y1 = Math.floor(points[i].y);
      const x2 = Math.floor(points[i + 1].x);
      const y2 = Math.floor(points[i + 1].y);
      if (x1 !== x2) {
        const step = x2 > x1 ? 1 : -1;
        for (let x = x1; x !== x2; x += step) draw(x, y1, '-');
      }
      if (y1 !== y2) {
        const step = y2 > y1 ? 1 : -1;
        for (let y = y1; y !== y2; y += step) draw(x2, y, '|');
      }
    }
    const last = points[points.length - 1];
    const previous = points[points.length - 2];
    if (last && previous) {
      const arrow =
        last.y > previous.y ? 'v' : last.y < previous.y ? '^' : last.x > previous.x ? '>' : '<';
      draw(last.x, last.y, arrow);
    }
  }

  // Boxes go on top of the edges
  for (const v of g.nodes()) {
    const node = g.node(v);
    const left = Math.floor(node.x - node.width / 2);
    const top = Math.floor(node.y - node.height / 2);
    const right = left + Math.floor(node.width) - 1;
    const bottom = top + Math.floor(node.height) - 1;
    for (let x = left; x <= right; x++) {
      for (let y = top; y <= bottom; y++) {
        const edge = y === top || y === bottom;
        const side = x === left || x === right;
        draw(x, y, edge && side ? '+' : edge ? '-' : side ? '|' : ' ');
      }
    }
    const label = node.label ?? '';
    const labelX = left + Math.floor((node.width - label.length) / 2);
    const labelY = top + Math.floor(node.height / 2);
    for (let i = 0; i < label.length; i++) draw(labelX + i, labelY, label[i]);
  }

  return canvas
    .map((row) => row.join('').trimEnd())
    .join('\n')
    .replace(/^\n+|\n+$/g, '');
}
