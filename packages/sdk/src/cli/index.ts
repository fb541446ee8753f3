export { parseArgs, splitList, type ParsedArgs } from './args.js';
export { check, type CheckOptions, type CheckResult } from './commands/check.js';
export {
  evaluate,
  parseTeamsFile,
  type EvaluateOptions,
  type EvaluateResult,
} from './commands/evaluate.js';
export { rules, type RulesOptions, type RulesResult, type RuleSummary } from './commands/rules.js';
export { formatReport, formatAnnotations, reportToJson, type JsonReport } from './report.js';
