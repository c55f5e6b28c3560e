/**
 * Requirement logic
 *
 * Tri-state algebra, requirement trees and their DSL.
 */

export {
  fromBoolean,
  and,
  or,
  not,
  requireGroup,
  tally,
  LOGIC_MODES,
  type TriState,
  type LogicMode,
  type GroupCounts,
} from './tristate.ts';

export {
  buildRequirement,
  evaluateRequirement,
  explainPlan,
  collectLeaves,
  DEFAULT_MAX_TREE_DEPTH,
  DEFAULT_MAX_TREE_NODES,
  type RequirementNode,
  type RequirementKind,
  type RequirementExpr,
  type BuildOptions,
  type PlanStatus,
  type PlanEntry,
  type Plan,
  type EvaluationOutcome,
  type LeafResolver,
  type EvaluateOptions,
} from './requirement.ts';

export {
  parseRequirement,
  formatRequirement,
  MAX_DSL_INPUT_BYTES,
  MAX_DSL_NESTING,
  type DslLimits,
} from './dsl.ts';
