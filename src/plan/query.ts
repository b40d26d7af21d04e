import type { ChangeAction, ImpactLevel, PlanChange } from '../model/change.js';
import { IMPACT_SEVERITY } from '../model/change.js';
import type { PlanSummary } from '../model/summary.js';
import { PlanNotAnalyzedError } from '../errors.js';
import { summarizePlan } from './aggregator.js';

export interface ChangeFilters {
  /** Empty or absent means every type */
  includeResourceTypes?: readonly string[];
  excludeResourceTypes?: readonly string[];
  minImpact?: ImpactLevel;
  /** Empty or absent means every action */
  includeActions?: readonly ChangeAction[];
}

function requireSummary(summary: PlanSummary | undefined): PlanSummary {
  if (!summary) throw new PlanNotAnalyzedError();
  return summary;
}

export function getChangesByType(summary: PlanSummary | undefined, resourceType: string): PlanChange[] {
  return requireSummary(summary).changes.filter(c => c.resourceType === resourceType);
}

export function getChangesByAction(summary: PlanSummary | undefined, action: ChangeAction): PlanChange[] {
  return requireSummary(summary).changes.filter(c => c.action === action);
}

export function getChangesByImpact(summary: PlanSummary | undefined, impactLevel: ImpactLevel): PlanChange[] {
  return requireSummary(summary).changes.filter(c => c.impactLevel === impactLevel);
}

export function matchesFilters(change: PlanChange, filters: ChangeFilters): boolean {
  const { includeResourceTypes, excludeResourceTypes, minImpact, includeActions } = filters;

  if (includeResourceTypes?.length && !includeResourceTypes.includes(change.resourceType)) return false;
  if (excludeResourceTypes?.includes(change.resourceType)) return false;
  if (minImpact && IMPACT_SEVERITY[change.impactLevel] < IMPACT_SEVERITY[minImpact]) return false;
  if (includeActions?.length && !includeActions.includes(change.action)) return false;

  return true;
}

/** Re-aggregates the changes that pass `filters` into a fresh summary. */
export function filterSummary(summary: PlanSummary | undefined, filters: ChangeFilters): PlanSummary {
  const source = requireSummary(summary);
  return summarizePlan(source.changes.filter(c => matchesFilters(c, filters)));
}
