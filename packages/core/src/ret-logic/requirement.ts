/**
 * Requirement trees
 *
 * Builds validated requirement trees from authored expressions and
 * evaluates them left to right with short-circuiting, recording a plan of
 * which nodes were evaluated and which were skipped.
 */

import { RequirementError } from '../errors/index.ts';
import { conditionId as toConditionId, type ConditionId } from '../identifiers/index.ts';
import { and, not, or, requireGroup, type LogicMode, type TriState } from './tristate.ts';
import { parseRequirement } from './dsl.ts';

// =============================================================================
// Types
// =============================================================================

export type RequirementNode =
  | { readonly kind: 'leaf'; readonly conditionId: ConditionId }
  | { readonly kind: 'and'; readonly children: readonly RequirementNode[] }
  | { readonly kind: 'or'; readonly children: readonly RequirementNode[] }
  | { readonly kind: 'not'; readonly child: RequirementNode }
  | { readonly kind: 'at_least'; readonly min: number; readonly children: readonly RequirementNode[] };

export type RequirementKind = RequirementNode['kind'];

/** Authored, not yet validated requirement expression */
export type RequirementExpr =
  | { kind: 'leaf'; conditionId: string }
  | { kind: 'and'; children: RequirementExpr[] }
  | { kind: 'or'; children: RequirementExpr[] }
  | { kind: 'not'; child: RequirementExpr }
  | { kind: 'at_least'; min: number; children: RequirementExpr[] };

export const DEFAULT_MAX_TREE_DEPTH = 32;
export const DEFAULT_MAX_TREE_NODES = 1024;

export interface BuildOptions {
  /** Condition ids that leaves may reference */
  conditionIds: Iterable<string>;
  maxDepth?: number;
  maxNodes?: number;
}

export type PlanStatus = 'evaluated' | 'skipped';

export interface PlanEntry {
  path: string;
  kind: RequirementKind;
  conditionId?: ConditionId;
  status: PlanStatus;
  /** `null` for skipped nodes */
  result: TriState | null;
}

export interface Plan {
  result: TriState;
  entries: readonly PlanEntry[];
  visited: number;
  skipped: number;
}

export interface EvaluationOutcome {
  result: TriState;
  plan: Plan;
}

export type LeafResolver = (conditionId: ConditionId) => TriState;

export interface EvaluateOptions {
  mode?: LogicMode;
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Validate an authored expression (tree or DSL text) and return a frozen
 * requirement tree. Malformed trees are rejected here so evaluation never
 * sees them.
 */
export function buildRequirement(expr: RequirementExpr | string, options: BuildOptions): RequirementNode {
  const known = new Set(options.conditionIds);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_TREE_DEPTH;
  const maxNodes = options.maxNodes ?? DEFAULT_MAX_TREE_NODES;
  const source = typeof expr === 'string'
    ? parseRequirement(expr, known, { maxNesting: maxDepth })
    : expr;

  let nodes = 0;

  const build = (node: RequirementExpr, path: string, depth: number): RequirementNode => {
    if (depth > maxDepth) {
      throw new RequirementError('depth_exceeded', `Requirement deeper than ${maxDepth} levels`, path);
    }
    nodes++;
    if (nodes > maxNodes) {
      throw new RequirementError('node_limit_exceeded', `Requirement has more than ${maxNodes} nodes`, path);
    }

    switch (node.kind) {
      case 'leaf':
        if (!known.has(node.conditionId)) {
          throw new RequirementError(
            'dangling_leaf',
            `Leaf references unknown condition ${JSON.stringify(node.conditionId)}`,
            path
          );
        }
        return Object.freeze({ kind: 'leaf', conditionId: toConditionId(node.conditionId) });
      case 'and':
      case 'or': {
        if (node.children.length === 0) {
          throw new RequirementError('empty_group', `Empty ${node.kind} group`, path);
        }
        const children = Object.freeze(
          node.children.map((child, i) => build(child, `${path}.${i}`, depth + 1))
        );
        return node.kind === 'and'
          ? Object.freeze({ kind: 'and', children })
          : Object.freeze({ kind: 'or', children });
      }
      case 'not':
        return Object.freeze({ kind: 'not', child: build(node.child, `${path}.0`, depth + 1) });
      case 'at_least': {
        if (node.children.length === 0) {
          throw new RequirementError('empty_group', 'Empty at_least group', path);
        }
        if (!Number.isInteger(node.min) || node.min < 1 || node.min > node.children.length) {
          throw new RequirementError(
            'invalid_threshold',
            `at_least threshold ${node.min} outside 1..${node.children.length}`,
            path
          );
        }
        const children = Object.freeze(
          node.children.map((child, i) => build(child, `${path}.${i}`, depth + 1))
        );
        return Object.freeze({ kind: 'at_least', min: node.min, children });
      }
    }
  };

  return build(source, '$', 1);
}

// =============================================================================
// Evaluation
// =============================================================================

function childrenOf(node: RequirementNode): readonly RequirementNode[] {
  switch (node.kind) {
    case 'leaf':
      return [];
    case 'not':
      return [node.child];
    case 'and':
    case 'or':
    case 'at_least':
      return node.children;
  }
}

function entryFor(node: RequirementNode, path: string, status: PlanStatus): PlanEntry {
  const entry: PlanEntry = { path, kind: node.kind, status, result: null };
  if (node.kind === 'leaf') entry.conditionId = node.conditionId;
  return entry;
}

/**
 * Evaluate a requirement tree. AND stops at the first false child, OR at
 * the first true one, and at_least once its threshold is decided. Under
 * Bochvar logic AND and OR also stop at the first indeterminate child.
 * The same tree and leaf results always yield a deep-equal outcome.
 */
export function evaluateRequirement(
  tree: RequirementNode,
  resolveLeaf: LeafResolver,
  options: EvaluateOptions = {}
): EvaluationOutcome {
  const mode = options.mode ?? 'kleene';
  const entries: PlanEntry[] = [];

  const skip = (node: RequirementNode, path: string): void => {
    entries.push(entryFor(node, path, 'skipped'));
    childrenOf(node).forEach((child, i) => skip(child, `${path}.${i}`));
  };

  const visit = (node: RequirementNode, path: string): TriState => {
    const entry = entryFor(node, path, 'evaluated');
    entries.push(entry);
    let result: TriState;

    switch (node.kind) {
      case 'leaf':
        result = resolveLeaf(node.conditionId);
        break;
      case 'not':
        result = not(visit(node.child, `${path}.0`));
        break;
      case 'and':
      case 'or': {
        const combine = node.kind === 'and' ? and : or;
        const decisive: TriState = node.kind === 'and' ? 'false' : 'true';
        let acc: TriState = node.kind === 'and' ? 'true' : 'false';
        let stopped = false;
        for (const [i, child] of node.children.entries()) {
          const childPath = `${path}.${i}`;
          if (stopped) {
            skip(child, childPath);
            continue;
          }
          acc = combine(acc, visit(child, childPath), mode);
          if (acc === decisive || (mode === 'bochvar' && acc === 'indeterminate')) {
            stopped = true;
          }
        }
        result = acc;
        break;
      }
      case 'at_least': {
        const counts = { satisfied: 0, failed: 0, unknown: 0 };
        const total = node.children.length;
        let stopped = false;
        for (const [i, child] of node.children.entries()) {
          const childPath = `${path}.${i}`;
          if (stopped) {
            skip(child, childPath);
            continue;
          }
          const childResult = visit(child, childPath);
          if (childResult === 'true') counts.satisfied++;
          else if (childResult === 'false') counts.failed++;
          else counts.unknown++;
          const remaining = total - i - 1;
          if (counts.satisfied >= node.min || counts.satisfied + counts.unknown + remaining < node.min) {
            stopped = true;
          }
        }
        result = requireGroup(node.min, counts);
        break;
      }
    }

    entry.result = result;
    return result;
  };

  const result = visit(tree, '$');
  const frozen = entries.map((entry) => Object.freeze(entry));
  const visited = frozen.filter((entry) => entry.status === 'evaluated').length;

  return {
    result,
    plan: Object.freeze({
      result,
      entries: Object.freeze(frozen),
      visited,
      skipped: frozen.length - visited,
    }),
  };
}

// =============================================================================
// Inspection
// =============================================================================

/**
 * Human-readable plan lines, e.g. `$.1 leaf age_check → false`.
 */
export function explainPlan(plan: Plan): string[] {
  return plan.entries.map((entry) => {
    const label = entry.conditionId === undefined ? entry.kind : `${entry.kind} ${entry.conditionId}`;
    if (entry.status === 'skipped' || entry.result === null) {
      return `${entry.path} ${label} skipped`;
    }
    return `${entry.path} ${label} → ${entry.result}`;
  });
}

/**
 * Condition ids referenced by a tree, in first-appearance order.
 */
export function collectLeaves(tree: RequirementNode): ConditionId[] {
  const seen = new Set<ConditionId>();
  const walk = (node: RequirementNode): void => {
    if (node.kind === 'leaf') {
      seen.add(node.conditionId);
      return;
    }
    childrenOf(node).forEach(walk);
  };
  walk(tree);
  return [...seen];
}
