import type { GuardrailsConfig, ResolvedStep, StepSection } from '../parser/schema.ts';

export type NodeKind = 'action' | 'branch' | 'loop_head' | 'loop_tail' | 'jump';

interface NodeBase {
  /** Unique within the graph: the step id, or `<step>#<role>` for control nodes */
  id: string;
  kind: NodeKind;
  stepId: string;
  /** Success successor; null leaves the segment */
  next: string | null;
}

export interface ActionNode extends NodeBase {
  kind: 'action';
  step: ResolvedStep;
  /** Failure successor; null aborts the segment */
  onFailure: string | null;
  /** Loop step id when this node is a loop body */
  loop: string | null;
  /** Effective guardrails (workflow defaults merged with the step's), null when disabled */
  guardrails: GuardrailsConfig | null;
  /** Successor taken when a guardrail with a step-id on_fail trips */
  guardrailTarget: string | null;
  /** Seconds */
  timeout: number;
}

export interface BranchNode extends NodeBase {
  kind: 'branch';
  condition: string | boolean;
  /** Taken when the condition is false */
  onFalse: string | null;
  /** Inside a loop a false condition skips the current iteration, not the step */
  perIteration: boolean;
}

export interface LoopHeadNode extends NodeBase {
  kind: 'loop_head';
  step: ResolvedStep;
  source: string | unknown[];
  /** Taken once the sequence is exhausted */
  exit: string | null;
  /** Taken when the sequence cannot be materialized, or every iteration failed */
  onFailure: string | null;
}

export interface LoopTailNode extends NodeBase {
  kind: 'loop_tail';
  step: ResolvedStep;
  breakIf: string | boolean | null;
  /** Taken when break_if holds */
  exit: string | null;
}

export interface JumpNode extends NodeBase {
  kind: 'jump';
  target: string | null;
  reason: 'loop_back' | 'on_failure' | 'guardrail';
}

export type GraphNode = ActionNode | BranchNode | LoopHeadNode | LoopTailNode | JumpNode;

export interface Segment {
  section: StepSection;
  entry: string | null;
  nodes: Record<string, GraphNode>;
  /** Node ids in compilation order */
  order: string[];
}

export interface Graph {
  /** Owning job; null for the document-level handler lists */
  job: string | null;
  segments: Record<StepSection, Segment>;
}

export interface CompiledWorkflow {
  name: string;
  jobs: Graph[];
  document: Graph;
}

export function getNode(segment: Segment, id: string): GraphNode {
  const node = segment.nodes[id];
  if (!node) {
    throw new Error(`Unknown node "${id}" in segment "${segment.section}"`);
  }
  return node;
}
