// Model types
export type { ChangeAction, ImpactLevel, PlanChange, FieldSnapshot } from './model/change.js';
export { CHANGE_ACTIONS, IMPACT_LEVELS, IMPACT_SEVERITY, isChangeAction, isImpactLevel } from './model/change.js';
export type { PlanSummary, ResourceTypeCounts, CountedAction } from './model/summary.js';
export { ResourceBreakdown } from './model/summary.js';

// Analysis
export type { RawPlan, RawResourceChange, RawChange } from './plan/schema.js';
export { RawPlanSchema } from './plan/schema.js';
export { normalizeChange, classifyActions, resolveAction, resolveImpact, parseAddress } from './plan/normalizer.js';
export type { ActionClassification, ParsedAddress } from './plan/normalizer.js';
export { summarizePlan, analyzePlan } from './plan/aggregator.js';
export { getChangesByType, getChangesByAction, getChangesByImpact, filterSummary, matchesFilters } from './plan/query.js';
export type { ChangeFilters } from './plan/query.js';
export { decodePlan, parsePlanJson, loadPlanFile } from './plan/loader.js';

// Errors
export {
  PlanDigestError,
  PlanFileNotFoundError,
  InvalidPlanError,
  PlanNotAnalyzedError,
  ConfigError,
  TerraformCommandError,
} from './errors.js';
export type { PlanDigestErrorCode } from './errors.js';

// Config
export { loadConfig, defaultConfig, resolveFormat, OUTPUT_FORMATS } from './config/config.js';
export type { PlanDigestConfig, OutputConfig, OutputFormat } from './config/config.js';

// Formatters
export { formatSummary, formatJson, formatNarrative, formatTable, formatTerminal, formatText } from './cli/formatters/index.js';
export type { FormatOptions } from './cli/formatters/index.js';
