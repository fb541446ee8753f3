export { parseRules, RULE_MARKER } from './parser.js';
export {
  RuleEngine,
  isSatisfied,
  unsatisfiedRules,
  type RuleEngineOptions,
  type UnsatisfiedRule,
} from './engine.js';
export { InMemoryTeamResolver, memoizeTeamResolver } from './resolvers.js';
export type {
  Rule,
  MatchResult,
  MatchReason,
  Diagnostic,
  DiagnosticCode,
  EvaluationReport,
  ApproverSet,
  TeamResolver,
  ApprovalSource,
} from './types.js';
